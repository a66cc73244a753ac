// @dga/diagnostic-kernel
// Entry point exports for the DGA diagnostic kernel.

export * from "./kernel";
export * from "./geometry/ternary";
export * from "./inputs/gas_projection";
export * from "./ruleset/types";
export * from "./ruleset/evaluator";
export * from "./methods/ratio";
export * from "./methods/duval_triangle";
export * from "./methods/duval_t1";
export * from "./methods/duval_t4";
export * from "./methods/duval_t5";
export * from "./methods/rogers_ratio";
export * from "./methods/doernenburg";
export * from "./methods/duval_pentagon";
export * from "./regions/fault_region_catalog";
export * from "./plot/ternary_plot";
export * from "./format/diagnosis_text";
