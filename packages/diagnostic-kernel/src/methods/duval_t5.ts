// Duval Triangle 5 (CH4 / C2H4 / C2H2), thermal-fault differentiation.
//
// Same gases and axis order as Triangle 1; only the boundaries differ.

import type { GasReadingV1, TriangleDiagnosisV1 } from "@dga/contracts";

import { defineRuleSetV1 } from "../ruleset/evaluator";
import { diagnoseTriangleV1, type DuvalTriangleMethodV1 } from "./duval_triangle";
import type { DuvalT1FactsV1 } from "./duval_t1";

export type DuvalT5FactsV1 = DuvalT1FactsV1;

export const DUVAL_T5_RULESET_V1 = defineRuleSetV1<DuvalT5FactsV1>({
  type: "diagnostic_ruleset_v1",
  ruleset_id: "duval_t5_v1",
  method: "duval_t5",
  combine_strategy: "FIRST_MATCH",
  rules: [
    { rule_id: "hc_hot_cellulose", when: (f) => f.C2H4 > 50 && f.CH4 > 40, code: "HC", label: "HC (Hot cellulosic materials)" },
    {
      rule_id: "t1_cellulose",
      when: (f) => f.CH4 > 70 && f.C2H4 < 10,
      code: "T1",
      label: "T1 (Thermal T < 300°C - Cellulose/Paper)"
    },
    { rule_id: "t2_mid_temp", when: (f) => f.C2H4 > 30 && f.C2H2 < 1, code: "T2", label: "T2 (Thermal T 300°C–770°C)" }
  ],
  fallback: { code: "MIXED", label: "Mixed Oil Fault" }
});

const DUVAL_T5_V1: DuvalTriangleMethodV1<DuvalT5FactsV1> = {
  method: "duval_t5",
  axes: ["CH4", "C2H4", "C2H2"],
  ruleset: DUVAL_T5_RULESET_V1,
  toFacts: (n) => ({ CH4: n.p1, C2H4: n.p2, C2H2: n.p3 })
};

export function diagnoseDuvalT5(reading: GasReadingV1): TriangleDiagnosisV1 {
  return diagnoseTriangleV1(DUVAL_T5_V1, reading);
}
