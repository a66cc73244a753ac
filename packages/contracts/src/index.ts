export * from "./schema/gas_reading_v1";
export * from "./schema/diagnosis_v1";
export * from "./schema/evaluation_report_v1";
export * from "./schema/ternary_plot_v1";
