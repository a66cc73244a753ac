// Diagnostic Kernel - RuleSet evaluator (v1)
//
// Evaluates a DiagnosticRuleSetV1 against a method's facts. Rulesets are
// declared with defineRuleSetV1 so structural mistakes (duplicate or empty
// rule ids) fail at module load, never during an evaluation.

import type { DiagnosticRuleSetV1, RuleOutcomeV1 } from "./types";

/**
 * Validates and freezes a ruleset declaration.
 *
 * @throws when a rule id is empty or repeated.
 */
export function defineRuleSetV1<F>(ruleset: DiagnosticRuleSetV1<F>): Readonly<DiagnosticRuleSetV1<F>> {
  const seen = new Set<string>();
  for (const r of ruleset.rules) {
    if (!r.rule_id) {
      throw new Error(`RULE_ID_EMPTY @ ruleset:${ruleset.ruleset_id}`);
    }
    if (seen.has(r.rule_id)) {
      throw new Error(`RULE_ID_DUPLICATE: ${r.rule_id} @ ruleset:${ruleset.ruleset_id}`);
    }
    seen.add(r.rule_id);
  }

  return Object.freeze({ ...ruleset, rules: Object.freeze([...ruleset.rules]) });
}

/**
 * Evaluates rules in declaration order and returns the first match, or the
 * ruleset's fallback when nothing matches.
 */
export function evaluateRuleSetV1<F>(ruleset: Readonly<DiagnosticRuleSetV1<F>>, facts: F): RuleOutcomeV1 {
  if (ruleset.combine_strategy === "FIRST_MATCH") {
    for (const r of ruleset.rules) {
      if (r.when(facts)) {
        return {
          code: r.code,
          label: r.label,
          rule_ref: { ruleset_id: ruleset.ruleset_id, rule_id: r.rule_id }
        };
      }
    }
    return { code: ruleset.fallback.code, label: ruleset.fallback.label, rule_ref: null };
  }

  // Exhaustiveness guard.
  const _never: never = ruleset.combine_strategy;
  throw new Error(`UNREACHABLE_COMBINE_STRATEGY: ${String(_never)}`);
}
