// Diagnostic Kernel - RuleSet types (v1)
//
// A diagnostic method's boundary checks are an ordered list of rules. The
// regions they approximate overlap, so list order is the tie-break: the first
// rule whose predicate holds decides the category.

import type { DiagnosticMethodIdV1, FaultCodeV1, RuleRefV1 } from "@dga/contracts";

/**
 * Combine strategies supported by the evaluator.
 */
export type CombineStrategyV1 = "FIRST_MATCH";

/**
 * One ordered boundary check.
 */
export interface DiagnosticRuleV1<F> {
  // Stable rule identifier (unique within its ruleset).
  rule_id: string;

  // Pure predicate over the method's facts (percentages, ratios or raw ppm).
  when: (facts: F) => boolean;

  // Category emitted when the predicate matches.
  code: FaultCodeV1;

  // Human-facing label for the category.
  label: string;
}

/**
 * Ordered rules of one diagnostic method plus the label used when none match.
 */
export interface DiagnosticRuleSetV1<F> {
  type: "diagnostic_ruleset_v1";
  ruleset_id: string;
  method: DiagnosticMethodIdV1;
  combine_strategy: CombineStrategyV1;
  rules: ReadonlyArray<DiagnosticRuleV1<F>>;
  fallback: { code: FaultCodeV1; label: string };
}

/**
 * Result of evaluating a ruleset: the category and, when a rule matched, a
 * reference to it.
 */
export interface RuleOutcomeV1 {
  code: FaultCodeV1;
  label: string;
  rule_ref: RuleRefV1 | null;
}
