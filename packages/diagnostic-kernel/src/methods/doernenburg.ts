// Diagnostic Kernel - Doernenburg ratio method (v1)
//
// Hard applicability gate first: if any gas is below its minimum the method
// answers "inconclusive" and computes no ratios. Past the gate, two ordered
// ratio checks choose between discharge and thermal fault.

import type {
  DoernenburgDiagnosisV1,
  DoernenburgRatiosV1,
  GasKeyV1,
  GasReadingV1,
  RatioTableRowV1
} from "@dga/contracts";

import { formatRatioList } from "../format/diagnosis_text";
import { defineRuleSetV1, evaluateRuleSetV1 } from "../ruleset/evaluator";
import { safeRatio } from "./ratio";

/**
 * Minimum concentrations (ppm) for the method to apply, in gate order.
 */
export const DOERNENBURG_MINIMUMS_V1: ReadonlyArray<{ gas: GasKeyV1; min_ppm: number }> = [
  { gas: "H2", min_ppm: 100 },
  { gas: "CH4", min_ppm: 10 },
  { gas: "C2H2", min_ppm: 0.5 },
  { gas: "C2H4", min_ppm: 50 }
];

export const DOERNENBURG_INCONCLUSIVE_LABEL = "Inconclusive (Gas limits below Doernenburg thresholds)";

export const DOERNENBURG_RULESET_V1 = defineRuleSetV1<DoernenburgRatiosV1>({
  type: "diagnostic_ruleset_v1",
  ruleset_id: "doernenburg_v1",
  method: "doernenburg",
  combine_strategy: "FIRST_MATCH",
  rules: [
    { rule_id: "d1_discharge", when: (r) => r.c2h2_c2h4 > 0.3 && r.c2h2_ch4 < 0.7, code: "D1", label: "D1 (Discharge/Arcing)" },
    { rule_id: "t2_thermal", when: (r) => r.c2h2_c2h4 < 0.3 && r.ch4_h2 > 1.0, code: "T2", label: "T2 (Thermal fault 300°C–700°C)" }
  ],
  fallback: { code: "MIXED", label: "Mixed/Other fault" }
});

/**
 * Gases whose concentration is below the Doernenburg minimum, in gate order.
 */
export function unmetDoernenburgMinimumsV1(reading: GasReadingV1): GasKeyV1[] {
  return DOERNENBURG_MINIMUMS_V1.filter((m) => reading[m.gas] < m.min_ppm).map((m) => m.gas);
}

export function computeDoernenburgRatiosV1(reading: GasReadingV1): DoernenburgRatiosV1 {
  return {
    ch4_h2: safeRatio(reading.CH4, reading.H2),
    c2h2_c2h4: safeRatio(reading.C2H2, reading.C2H4),
    c2h2_ch4: safeRatio(reading.C2H2, reading.CH4),
    c2h2_h2: safeRatio(reading.C2H2, reading.H2)
  };
}

export function diagnoseDoernenburg(reading: GasReadingV1): DoernenburgDiagnosisV1 {
  const unmet = unmetDoernenburgMinimumsV1(reading);
  if (unmet.length > 0) {
    return {
      method: "doernenburg",
      code: "INCONCLUSIVE",
      label: DOERNENBURG_INCONCLUSIVE_LABEL,
      text: DOERNENBURG_INCONCLUSIVE_LABEL,
      rule_ref: null,
      applicable: false,
      unmet_minimums: unmet,
      ratios: null
    };
  }

  const ratios = computeDoernenburgRatiosV1(reading);
  const outcome = evaluateRuleSetV1(DOERNENBURG_RULESET_V1, ratios);
  const detail = formatRatioList(
    [
      ["CH4/H2", ratios.ch4_h2],
      ["C2H2/C2H4", ratios.c2h2_c2h4],
      ["C2H2/CH4", ratios.c2h2_ch4]
    ],
    ": "
  );

  return {
    method: "doernenburg",
    code: outcome.code,
    label: outcome.label,
    text: `${outcome.label} (${detail})`,
    rule_ref: outcome.rule_ref,
    applicable: true,
    unmet_minimums: [],
    ratios
  };
}

/**
 * Display rows for the ratio table, available whether or not the gate passed.
 */
export function doernenburgRatioTableV1(reading: GasReadingV1): RatioTableRowV1[] {
  const r = computeDoernenburgRatiosV1(reading);
  return [
    { ratio: "CH4 / H2", value: r.ch4_h2, threshold: "> 1.0 (for T2)" },
    { ratio: "C2H2 / C2H4", value: r.c2h2_c2h4, threshold: "> 0.3 (for D1/D2)" },
    { ratio: "C2H2 / CH4", value: r.c2h2_ch4, threshold: "< 0.7 (for D1)" }
  ];
}
