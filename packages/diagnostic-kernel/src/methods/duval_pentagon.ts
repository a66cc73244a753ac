// Duval Pentagon (conceptual).
//
// Rule-based stand-in for the five-axis pentagon placement: ordered checks on
// absolute concentrations (ppm) of all five gases.

import type { GasReadingV1, PentagonDiagnosisV1 } from "@dga/contracts";

import { defineRuleSetV1, evaluateRuleSetV1 } from "../ruleset/evaluator";

export const DUVAL_PENTAGON_RULESET_V1 = defineRuleSetV1<GasReadingV1>({
  type: "diagnostic_ruleset_v1",
  ruleset_id: "duval_pentagon_v1",
  method: "duval_pentagon",
  combine_strategy: "FIRST_MATCH",
  rules: [
    {
      rule_id: "d2_t3_arcing_hotspot",
      when: (g) => g.C2H2 > 10 && g.C2H4 > 50,
      code: "D2_T3",
      label: "D2 / T3 (High Energy Arcing + Hotspot)"
    },
    {
      rule_id: "pd_d1_discharge",
      when: (g) => g.H2 > 500 && g.C2H4 < 50,
      code: "PD_D1",
      label: "PD / D1 (Partial Discharge / Low Energy Discharge)"
    },
    {
      rule_id: "c_cellulose",
      when: (g) => g.CO > 1000 && g.C2H4 < 10,
      code: "C",
      label: "C (Cellulose/Paper degradation - thermal)"
    },
    { rule_id: "t2_thermal", when: (g) => g.C2H4 > 200 && g.H2 < 50, code: "T2", label: "T2 (Thermal Fault 300°C-700°C)" }
  ],
  fallback: { code: "UNDEFINED", label: "Mixed/Unclassified Fault Zone" }
});

export function diagnoseDuvalPentagon(reading: GasReadingV1): PentagonDiagnosisV1 {
  const outcome = evaluateRuleSetV1(DUVAL_PENTAGON_RULESET_V1, reading);
  return {
    method: "duval_pentagon",
    code: outcome.code,
    label: outcome.label,
    text: outcome.label,
    rule_ref: outcome.rule_ref
  };
}
