// Diagnostic Kernel - Pure evaluation entrypoint (v1)
//
// Runs every diagnostic method once against a single GasReading and returns the
// summary report. Each method is independent; there is no cross-method voting.
//
// No IO. No side effects. No state between calls: the same reading always
// produces the same report.

import type { DiagnosisV1, DiagnosticMethodIdV1, EvaluationReportV1, GasReadingV1 } from "@dga/contracts";

import { totalCombustibleGas } from "./inputs/gas_projection";
import { diagnoseDuvalT1 } from "./methods/duval_t1";
import { diagnoseDuvalT4 } from "./methods/duval_t4";
import { diagnoseDuvalT5 } from "./methods/duval_t5";
import { diagnoseRogersRatio } from "./methods/rogers_ratio";
import { diagnoseDoernenburg, doernenburgRatioTableV1 } from "./methods/doernenburg";
import { diagnoseDuvalPentagon } from "./methods/duval_pentagon";

export interface DiagnosticMethodEntryV1 {
  method: DiagnosticMethodIdV1;
  model: string;
  diagnose: (reading: GasReadingV1) => DiagnosisV1;
}

// Methods in summary-table order.
const METHODS_V1: DiagnosticMethodEntryV1[] = [
  { method: "duval_t1", model: "Duval's Triangle 1 (T1/T2/D1)", diagnose: diagnoseDuvalT1 },
  { method: "duval_t4", model: "Duval's Triangle 4 (T3/D2/S)", diagnose: diagnoseDuvalT4 },
  { method: "duval_t5", model: "Duval's Triangle 5 (HC/T1/T2)", diagnose: diagnoseDuvalT5 },
  { method: "rogers_ratio", model: "Rogers Ratio Method (R1/R2/R5)", diagnose: diagnoseRogersRatio },
  { method: "doernenburg", model: "Doernenburg's Method", diagnose: diagnoseDoernenburg },
  { method: "duval_pentagon", model: "Duval's Pentagon (Conceptual)", diagnose: diagnoseDuvalPentagon }
];

export const DIAGNOSTIC_METHODS_V1: ReadonlyArray<DiagnosticMethodEntryV1> = Object.freeze(METHODS_V1);

export function diagnoseWithMethodV1(method: DiagnosticMethodIdV1, reading: GasReadingV1): DiagnosisV1 | null {
  const entry = DIAGNOSTIC_METHODS_V1.find((m) => m.method === method);
  return entry ? entry.diagnose(reading) : null;
}

// Freezes a plain JSON-shaped value and everything it contains.
function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Evaluates all diagnostic methods against one reading.
 *
 * @param reading - Validated gas concentrations (ppm).
 * @returns Deep-frozen summary report: table rows, structured diagnoses, TCG and
 *   the Doernenburg ratio table.
 */
export function evaluateReadingV1(reading: GasReadingV1): Readonly<EvaluationReportV1> {
  // Copy so the report never aliases the caller's object.
  const snapshot: GasReadingV1 = { H2: reading.H2, CH4: reading.CH4, C2H4: reading.C2H4, C2H2: reading.C2H2, CO: reading.CO };

  const diagnoses = DIAGNOSTIC_METHODS_V1.map((m) => m.diagnose(snapshot));
  const rows = DIAGNOSTIC_METHODS_V1.map((m, i) => ({ model: m.model, method: m.method, diagnosis: diagnoses[i].text }));

  const report: EvaluationReportV1 = {
    type: "dga_evaluation_report_v1",
    schema_version: "1.0.0",
    reading: snapshot,
    tcg_ppm: totalCombustibleGas(snapshot),
    rows,
    diagnoses,
    doernenburg_ratio_table: doernenburgRatioTableV1(snapshot)
  };

  return deepFreeze(report);
}
