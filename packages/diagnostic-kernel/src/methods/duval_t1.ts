// Duval Triangle 1 (CH4 / C2H4 / C2H2).
//
// Simplified boundaries; rule order is the precedence between overlapping
// regions (e.g. T2 shadows part of T3).

import type { GasReadingV1, TriangleDiagnosisV1 } from "@dga/contracts";

import { defineRuleSetV1 } from "../ruleset/evaluator";
import { diagnoseTriangleV1, type DuvalTriangleMethodV1 } from "./duval_triangle";

export interface DuvalT1FactsV1 {
  CH4: number;
  C2H4: number;
  C2H2: number;
}

export const DUVAL_T1_RULESET_V1 = defineRuleSetV1<DuvalT1FactsV1>({
  type: "diagnostic_ruleset_v1",
  ruleset_id: "duval_t1_v1",
  method: "duval_t1",
  combine_strategy: "FIRST_MATCH",
  rules: [
    { rule_id: "t1_low_temp", when: (f) => f.C2H2 < 0.5 && f.CH4 > 80, code: "T1", label: "T1 (Thermal fault T < 300°C)" },
    { rule_id: "t2_mid_temp", when: (f) => f.C2H4 > 25 && f.C2H2 < 1, code: "T2", label: "T2 (Thermal fault 300°C–700°C)" },
    { rule_id: "d2_arcing", when: (f) => f.C2H2 > 5 && f.C2H4 > 15, code: "D2", label: "D2 (Arcing in oil)" },
    { rule_id: "t3_high_temp", when: (f) => f.C2H4 > 50 && f.C2H2 < 2, code: "T3", label: "T3 (Thermal fault T > 700°C)" }
  ],
  fallback: { code: "UNDEFINED", label: "Undefined/Mixed Fault" }
});

const DUVAL_T1_V1: DuvalTriangleMethodV1<DuvalT1FactsV1> = {
  method: "duval_t1",
  axes: ["CH4", "C2H4", "C2H2"],
  ruleset: DUVAL_T1_RULESET_V1,
  toFacts: (n) => ({ CH4: n.p1, C2H4: n.p2, C2H2: n.p3 })
};

export function diagnoseDuvalT1(reading: GasReadingV1): TriangleDiagnosisV1 {
  return diagnoseTriangleV1(DUVAL_T1_V1, reading);
}
