// packages/contracts/src/schema/evaluation_report_v1.ts
//
// EvaluationReport v1: every method evaluated once against one GasReading,
// shaped for a summary table plus the per-method structured diagnoses.

import { z } from "zod";

import { GasReadingV1Z } from "./gas_reading_v1";
import { DiagnosisV1Z, DiagnosticMethodIdV1Z } from "./diagnosis_v1";

export const SummaryRowV1Z = z
  .object({
    model: z.string().min(1), // human-facing model name (table column "Model")
    method: DiagnosticMethodIdV1Z,
    diagnosis: z.string().min(1) // same string as diagnoses[i].text
  })
  .strict();
export type SummaryRowV1 = z.infer<typeof SummaryRowV1Z>;

export const RatioTableRowV1Z = z
  .object({
    ratio: z.string().min(1),
    value: z.number().finite().nonnegative(),
    threshold: z.string().min(1)
  })
  .strict();
export type RatioTableRowV1 = z.infer<typeof RatioTableRowV1Z>;

export const EvaluationReportV1Z = z
  .object({
    type: z.literal("dga_evaluation_report_v1"),
    schema_version: z.string().regex(/^\d+\.\d+\.\d+$/),
    reading: GasReadingV1Z,
    tcg_ppm: z.number().finite().nonnegative(),
    rows: z.array(SummaryRowV1Z),
    diagnoses: z.array(DiagnosisV1Z),
    doernenburg_ratio_table: z.array(RatioTableRowV1Z)
  })
  .strict();
export type EvaluationReportV1 = z.infer<typeof EvaluationReportV1Z>;
