// Display strings for diagnoses. Numbers are also exposed structurally, so the
// formatting here is presentation only.

import type { GasKeyV1, PercentageTripleV1 } from "@dga/contracts";

export const NOT_APPLICABLE_LABEL = "Not Applicable (Total gas is zero)";

export function formatPercentages(gases: readonly [GasKeyV1, GasKeyV1, GasKeyV1], p: Readonly<PercentageTripleV1>): string {
  return `${gases[0]}: ${p[0].toFixed(1)}%, ${gases[1]}: ${p[1].toFixed(1)}%, ${gases[2]}: ${p[2].toFixed(1)}%`;
}

export function formatTriangleText(label: string, gases: readonly [GasKeyV1, GasKeyV1, GasKeyV1], p: Readonly<PercentageTripleV1>): string {
  return `${label} (${formatPercentages(gases, p)})`;
}

/**
 * "name:value" pairs joined with ", ", values to two decimals.
 */
export function formatRatioList(pairs: ReadonlyArray<readonly [string, number]>, separator = ":"): string {
  return pairs.map(([name, value]) => `${name}${separator}${value.toFixed(2)}`).join(", ");
}

// Whole-percent label printed next to the user's point on a ternary plot.
export function formatPointLabel(gases: readonly [GasKeyV1, GasKeyV1, GasKeyV1], p: Readonly<PercentageTripleV1>): string {
  return `(${gases[0]}:${p[0].toFixed(0)}, ${gases[1]}:${p[1].toFixed(0)}, ${gases[2]}:${p[2].toFixed(0)})`;
}
