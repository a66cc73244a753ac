// Diagnostic Kernel - shared Duval triangle evaluation
//
// All three triangles follow the same pattern: normalize three gases, report
// "not applicable" on a zero total, otherwise run the triangle's ordered
// ruleset over the percentages.

import type { GasReadingV1, TriangleDiagnosisV1, TriangleMethodIdV1 } from "@dga/contracts";

import { toPercentageTriple, type NormalizedTripleV1 } from "../geometry/ternary";
import { projectTriangleGases, type GasAxesV1 } from "../inputs/gas_projection";
import { evaluateRuleSetV1 } from "../ruleset/evaluator";
import type { DiagnosticRuleSetV1 } from "../ruleset/types";
import { formatTriangleText, NOT_APPLICABLE_LABEL } from "../format/diagnosis_text";

/**
 * Static description of one Duval triangle method.
 *
 * `toFacts` names the normalized percentages after their gases so rule
 * predicates read like the published boundaries.
 */
export interface DuvalTriangleMethodV1<F> {
  method: TriangleMethodIdV1;
  axes: GasAxesV1;
  ruleset: Readonly<DiagnosticRuleSetV1<F>>;
  toFacts: (n: NormalizedTripleV1) => F;
}

export function diagnoseTriangleV1<F>(spec: DuvalTriangleMethodV1<F>, reading: GasReadingV1): TriangleDiagnosisV1 {
  const gases: TriangleDiagnosisV1["gases"] = [spec.axes[0], spec.axes[1], spec.axes[2]];
  const n = projectTriangleGases(reading, spec.axes);

  if (n.zero_total) {
    return {
      method: spec.method,
      code: "NOT_APPLICABLE",
      label: NOT_APPLICABLE_LABEL,
      text: NOT_APPLICABLE_LABEL,
      rule_ref: null,
      gases,
      percentages: [0, 0, 0],
      total_ppm: 0
    };
  }

  const outcome = evaluateRuleSetV1(spec.ruleset, spec.toFacts(n));
  const percentages = toPercentageTriple(n);

  return {
    method: spec.method,
    code: outcome.code,
    label: outcome.label,
    text: formatTriangleText(outcome.label, gases, percentages),
    rule_ref: outcome.rule_ref,
    gases,
    percentages,
    total_ppm: n.total
  };
}
