// Duval Triangle 4 (H2 / C2H2 / C2H4): stray gassing vs. severe thermal vs. arcing.

import type { GasReadingV1, TriangleDiagnosisV1 } from "@dga/contracts";

import { defineRuleSetV1 } from "../ruleset/evaluator";
import { diagnoseTriangleV1, type DuvalTriangleMethodV1 } from "./duval_triangle";

export interface DuvalT4FactsV1 {
  H2: number;
  C2H2: number;
  C2H4: number;
}

export const DUVAL_T4_RULESET_V1 = defineRuleSetV1<DuvalT4FactsV1>({
  type: "diagnostic_ruleset_v1",
  ruleset_id: "duval_t4_v1",
  method: "duval_t4",
  combine_strategy: "FIRST_MATCH",
  rules: [
    { rule_id: "s_stray_gassing", when: (f) => f.H2 > 80 && f.C2H2 < 5, code: "S", label: "S (Stray Gassing / Hot metal contacts)" },
    { rule_id: "t3_severe_thermal", when: (f) => f.C2H4 > 60 && f.H2 < 10, code: "T3", label: "T3 (Severe Thermal Fault T > 700°C)" },
    { rule_id: "d2_high_energy", when: (f) => f.C2H2 > 15, code: "D2", label: "D2 (High Energy Arcing)" }
  ],
  fallback: { code: "UNDEFINED", label: "Mixed or Undefined Region" }
});

const DUVAL_T4_V1: DuvalTriangleMethodV1<DuvalT4FactsV1> = {
  method: "duval_t4",
  axes: ["H2", "C2H2", "C2H4"],
  ruleset: DUVAL_T4_RULESET_V1,
  toFacts: (n) => ({ H2: n.p1, C2H2: n.p2, C2H4: n.p3 })
};

export function diagnoseDuvalT4(reading: GasReadingV1): TriangleDiagnosisV1 {
  return diagnoseTriangleV1(DUVAL_T4_V1, reading);
}
