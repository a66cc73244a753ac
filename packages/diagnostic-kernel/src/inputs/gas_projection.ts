// Diagnostic Kernel - GasReading projection
//
// Helpers that pull the gases a method needs out of a GasReading. Methods read
// the reading only through these, so the set of gases each one uses is explicit.

import type { GasKeyV1, GasReadingV1 } from "@dga/contracts";
import { GAS_KEYS_V1 } from "@dga/contracts";

import { normalizeTriple, saturatingSum, type NormalizedTripleV1 } from "../geometry/ternary";

export type GasAxesV1 = readonly [GasKeyV1, GasKeyV1, GasKeyV1];

/**
 * Normalizes the three gases named by `axes`, in axis order.
 */
export function projectTriangleGases(reading: GasReadingV1, axes: GasAxesV1): NormalizedTripleV1 {
  return normalizeTriple(reading[axes[0]], reading[axes[1]], reading[axes[2]]);
}

/**
 * Total Combustible Gas: sum of all five tracked concentrations (ppm),
 * saturating at Number.MAX_VALUE.
 */
export function totalCombustibleGas(reading: GasReadingV1): number {
  return saturatingSum(GAS_KEYS_V1.map((k) => reading[k]));
}
