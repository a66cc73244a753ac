// packages/contracts/src/schema/gas_reading_v1.ts
//
// GasReading v1: the five dissolved-gas concentrations (ppm) every diagnostic
// method consumes. Values must be finite and non-negative; no upper bound.

import { z } from "zod";

export const GAS_KEYS_V1 = ["H2", "CH4", "C2H4", "C2H2", "CO"] as const;

export type GasKeyV1 = (typeof GAS_KEYS_V1)[number];

export const GasKeyV1Z = z.enum(GAS_KEYS_V1);

const PpmZ = z.number().finite().nonnegative(); // ppm: zero is valid for any single gas

export const GasReadingV1Z = z
  .object({
    H2: PpmZ,
    CH4: PpmZ,
    C2H4: PpmZ,
    C2H2: PpmZ,
    CO: PpmZ
  })
  .strict(); // unknown gases (e.g. O2) are rejected rather than silently dropped

export type GasReadingV1 = z.infer<typeof GasReadingV1Z>;

/**
 * One admission error, flattened from a zod issue.
 */
export type ContractErrorV1 = {
  code: string;
  path: string;
  message: string;
};

export type SafeParseResultV1<T> = { ok: true; value: T } | { ok: false; errors: ContractErrorV1[] };

export function isGasKeyV1(x: unknown): x is GasKeyV1 {
  return typeof x === "string" && GAS_KEYS_V1.some((k) => k === x);
}

export function parseGasReadingV1(input: unknown): GasReadingV1 {
  return GasReadingV1Z.parse(input); // throws ZodError on invalid input
}

/**
 * Non-throwing variant used at the HTTP and CLI edges.
 *
 * @param input - Untrusted JSON value.
 * @param code - Error code stamped on every flattened issue.
 */
export function safeParseGasReadingV1(
  input: unknown,
  code: string = "INVALID_GAS_READING"
): SafeParseResultV1<GasReadingV1> {
  const res = GasReadingV1Z.safeParse(input);
  if (res.success) return { ok: true, value: res.data };
  return { ok: false, errors: zodIssuesToErrors(res.error, code) };
}

export function zodIssuesToErrors(err: z.ZodError, code: string): ContractErrorV1[] {
  return err.issues.map((issue) => ({
    code,
    path: issue.path.map(String).join("."),
    message: issue.message
  }));
}
