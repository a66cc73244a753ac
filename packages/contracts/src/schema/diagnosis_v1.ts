// packages/contracts/src/schema/diagnosis_v1.ts
//
// Diagnosis v1: one classifier's output. The display `text` is derived from
// the structured fields (percentages / ratios), which stay exposed so callers
// never have to parse the string.

import { z } from "zod";

import { GasKeyV1Z } from "./gas_reading_v1";

export const DIAGNOSTIC_METHOD_IDS_V1 = [
  "duval_t1",
  "duval_t4",
  "duval_t5",
  "rogers_ratio",
  "doernenburg",
  "duval_pentagon"
] as const;

export const DiagnosticMethodIdV1Z = z.enum(DIAGNOSTIC_METHOD_IDS_V1);
export type DiagnosticMethodIdV1 = z.infer<typeof DiagnosticMethodIdV1Z>;

export const TriangleMethodIdV1Z = z.enum(["duval_t1", "duval_t4", "duval_t5"]);
export type TriangleMethodIdV1 = z.infer<typeof TriangleMethodIdV1Z>;

/**
 * Closed vocabulary of fault category codes across all methods.
 * NOT_APPLICABLE / INCONCLUSIVE are explicit non-fault outcomes, never errors.
 */
export const FaultCodeV1Z = z.enum([
  "PD",
  "D1",
  "D2",
  "T1",
  "T2",
  "T3",
  "S",
  "C",
  "HC",
  "DT",
  "D2_T3",
  "PD_D1",
  "NORMAL",
  "MIXED",
  "UNDEFINED",
  "NOT_APPLICABLE",
  "INCONCLUSIVE"
]);
export type FaultCodeV1 = z.infer<typeof FaultCodeV1Z>;

export const RuleRefV1Z = z
  .object({
    ruleset_id: z.string().min(1),
    rule_id: z.string().min(1)
  })
  .strict();
export type RuleRefV1 = z.infer<typeof RuleRefV1Z>;

export const PercentageTripleV1Z = z.tuple([
  z.number().min(0).max(100),
  z.number().min(0).max(100),
  z.number().min(0).max(100)
]);
export type PercentageTripleV1 = z.infer<typeof PercentageTripleV1Z>;

const DiagnosisCoreZ = {
  code: FaultCodeV1Z,
  label: z.string().min(1),
  text: z.string().min(1),
  rule_ref: RuleRefV1Z.nullable() // null when the fallback (or a gate) decided
};

export const TriangleDiagnosisV1Z = z
  .object({
    method: TriangleMethodIdV1Z,
    ...DiagnosisCoreZ,
    gases: z.tuple([GasKeyV1Z, GasKeyV1Z, GasKeyV1Z]),
    percentages: PercentageTripleV1Z,
    total_ppm: z.number().finite().nonnegative()
  })
  .strict();
export type TriangleDiagnosisV1 = z.infer<typeof TriangleDiagnosisV1Z>;

export const RogersRatiosV1Z = z
  .object({
    R1: z.number().finite().nonnegative(), // CH4 / H2
    R2: z.number().finite().nonnegative(), // C2H4 / CH4
    R5: z.number().finite().nonnegative() // C2H2 / C2H4
  })
  .strict();
export type RogersRatiosV1 = z.infer<typeof RogersRatiosV1Z>;

export const RogersDiagnosisV1Z = z
  .object({
    method: z.literal("rogers_ratio"),
    ...DiagnosisCoreZ,
    ratio_code: z.string().regex(/^[012]{3}$/),
    ratios: RogersRatiosV1Z
  })
  .strict();
export type RogersDiagnosisV1 = z.infer<typeof RogersDiagnosisV1Z>;

export const DoernenburgRatiosV1Z = z
  .object({
    ch4_h2: z.number().finite().nonnegative(),
    c2h2_c2h4: z.number().finite().nonnegative(),
    c2h2_ch4: z.number().finite().nonnegative(),
    c2h2_h2: z.number().finite().nonnegative()
  })
  .strict();
export type DoernenburgRatiosV1 = z.infer<typeof DoernenburgRatiosV1Z>;

export const DoernenburgDiagnosisV1Z = z
  .object({
    method: z.literal("doernenburg"),
    ...DiagnosisCoreZ,
    applicable: z.boolean(),
    unmet_minimums: z.array(GasKeyV1Z),
    ratios: DoernenburgRatiosV1Z.nullable() // null when the applicability gate failed
  })
  .strict();
export type DoernenburgDiagnosisV1 = z.infer<typeof DoernenburgDiagnosisV1Z>;

export const PentagonDiagnosisV1Z = z
  .object({
    method: z.literal("duval_pentagon"),
    ...DiagnosisCoreZ
  })
  .strict();
export type PentagonDiagnosisV1 = z.infer<typeof PentagonDiagnosisV1Z>;

export const DiagnosisV1Z = z.union([
  TriangleDiagnosisV1Z,
  RogersDiagnosisV1Z,
  DoernenburgDiagnosisV1Z,
  PentagonDiagnosisV1Z
]);
export type DiagnosisV1 = z.infer<typeof DiagnosisV1Z>;
