// Plain-text rendering of an evaluation report for the analyze CLI.

import type { EvaluationReportV1 } from "@dga/contracts";

export function renderReportTable(report: EvaluationReportV1): string {
  const header = ["Model", "Diagnosis"];
  const width = Math.max(header[0].length, ...report.rows.map((r) => r.model.length));
  const lines = [
    `${header[0].padEnd(width)}  ${header[1]}`,
    `${"-".repeat(width)}  ${"-".repeat(header[1].length)}`,
    ...report.rows.map((r) => `${r.model.padEnd(width)}  ${r.diagnosis}`),
    "",
    `TCG (Total Combustible Gas): ${report.tcg_ppm.toFixed(1)} ppm`,
    "",
    "Doernenburg ratios:",
    ...report.doernenburg_ratio_table.map((r) => `  ${r.ratio.padEnd(12)} ${r.value.toFixed(2).padStart(6)}  ${r.threshold}`)
  ];
  return lines.join("\n");
}
