// Diagnostic Kernel - Rogers Ratio method (v1)
//
// Three ratios are bucketed into ordinal digits {0,1,2}; the digits, in the
// order R1, R2, R5, form a code looked up in a fixed table. Unknown codes map
// to "Undefined/Developing Fault".

import type { FaultCodeV1, GasReadingV1, RogersDiagnosisV1, RogersRatiosV1 } from "@dga/contracts";

import { formatRatioList } from "../format/diagnosis_text";
import { safeRatio } from "./ratio";

export type RogersDigitV1 = "0" | "1" | "2";

/**
 * Two cutoffs per ratio: below `low` is 0, above `high` is 2, anything in
 * between (both cutoffs included) is 1.
 */
export interface RatioCutoffsV1 {
  low: number;
  high: number;
}

export const ROGERS_CUTOFFS_V1: Readonly<Record<keyof RogersRatiosV1, RatioCutoffsV1>> = Object.freeze({
  R1: { low: 0.1, high: 1.0 },
  R2: { low: 1.0, high: 3.0 },
  R5: { low: 0.5, high: 3.0 }
});

export const ROGERS_RULESET_ID_V1 = "rogers_ratio_v1";

export const ROGERS_CODE_TABLE_V1: Readonly<Record<string, { code: FaultCodeV1; label: string }>> = Object.freeze({
  "100": { code: "T1", label: "T1 (Thermal Fault T < 300°C)" },
  "110": { code: "T2", label: "T2 (Thermal Fault 300°C–700°C)" },
  "210": { code: "T3", label: "T3 (Thermal Fault T > 700°C)" },
  "102": { code: "D1", label: "D1 (Low Energy Discharge/PD)" },
  "001": { code: "D2", label: "D2 (High Energy Discharge/Arcing)" },
  "000": { code: "NORMAL", label: "No fault / Normal aging" },
  "010": { code: "MIXED", label: "Undefined/Mixed thermal" },
  "011": { code: "MIXED", label: "Undefined/Mixed thermal" },
  "111": { code: "DT", label: "Mixed thermal and electrical" }
});

export const ROGERS_FALLBACK_V1 = Object.freeze({ code: "UNDEFINED", label: "Undefined/Developing Fault" } as const);

export function bucketRatioV1(value: number, cutoffs: RatioCutoffsV1): RogersDigitV1 {
  if (value < cutoffs.low) return "0";
  if (value > cutoffs.high) return "2";
  return "1";
}

export function computeRogersRatiosV1(reading: GasReadingV1): RogersRatiosV1 {
  return {
    R1: safeRatio(reading.CH4, reading.H2),
    R2: safeRatio(reading.C2H4, reading.CH4),
    R5: safeRatio(reading.C2H2, reading.C2H4)
  };
}

export function rogersCodeV1(ratios: RogersRatiosV1): string {
  return (
    bucketRatioV1(ratios.R1, ROGERS_CUTOFFS_V1.R1) +
    bucketRatioV1(ratios.R2, ROGERS_CUTOFFS_V1.R2) +
    bucketRatioV1(ratios.R5, ROGERS_CUTOFFS_V1.R5)
  );
}

export function diagnoseRogersRatio(reading: GasReadingV1): RogersDiagnosisV1 {
  const ratios = computeRogersRatiosV1(reading);
  const ratioCode = rogersCodeV1(ratios);
  const hit = Object.prototype.hasOwnProperty.call(ROGERS_CODE_TABLE_V1, ratioCode) ? ROGERS_CODE_TABLE_V1[ratioCode] : undefined;
  const entry = hit ?? ROGERS_FALLBACK_V1;

  const detail = formatRatioList([
    ["R1", ratios.R1],
    ["R2", ratios.R2],
    ["R5", ratios.R5]
  ]);

  return {
    method: "rogers_ratio",
    code: entry.code,
    label: entry.label,
    text: `Code: ${ratioCode}, Diagnosis: ${entry.label} (${detail})`,
    rule_ref: hit ? { ruleset_id: ROGERS_RULESET_ID_V1, rule_id: `code_${ratioCode}` } : null,
    ratio_code: ratioCode,
    ratios
  };
}
