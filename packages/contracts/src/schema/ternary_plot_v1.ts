// packages/contracts/src/schema/ternary_plot_v1.ts
//
// TernaryPlot v1: plot-ready geometry for one Duval triangle. All points are in
// the 100-unit equilateral plotting plane (A=(0,0), B=(100,0), C=(50,50*sqrt(3))).
// The plotting library itself is the caller's concern.

import { z } from "zod";

import { GasKeyV1Z } from "./gas_reading_v1";
import { PercentageTripleV1Z } from "./diagnosis_v1";

export const TRIANGLE_IDS_V1 = ["duval_t1", "duval_t4"] as const;

export const TriangleIdV1Z = z.enum(TRIANGLE_IDS_V1);
export type TriangleIdV1 = z.infer<typeof TriangleIdV1Z>;

export function isTriangleIdV1(x: unknown): x is TriangleIdV1 {
  return typeof x === "string" && TRIANGLE_IDS_V1.some((id) => id === x);
}

export const CartesianPointV1Z = z
  .object({
    x: z.number(),
    y: z.number()
  })
  .strict();
export type CartesianPointV1 = z.infer<typeof CartesianPointV1Z>;

export const PlotCornerV1Z = z
  .object({
    gas: GasKeyV1Z,
    label: z.string().min(1), // e.g. "CH4 (100%)"
    point: CartesianPointV1Z
  })
  .strict();
export type PlotCornerV1 = z.infer<typeof PlotCornerV1Z>;

export const PlotRegionV1Z = z
  .object({
    name: z.string().min(1),
    fill_color: z.string().min(1),
    label_color: z.string().min(1),
    vertices: z.array(PercentageTripleV1Z).min(3),
    outline: z.array(CartesianPointV1Z).min(4), // closed: first point repeated at the end
    label_anchor: CartesianPointV1Z
  })
  .strict();
export type PlotRegionV1 = z.infer<typeof PlotRegionV1Z>;

export const PlotUserPointV1Z = z
  .object({
    percentages: PercentageTripleV1Z,
    point: CartesianPointV1Z,
    label: z.string().min(1)
  })
  .strict();
export type PlotUserPointV1 = z.infer<typeof PlotUserPointV1Z>;

export const TernaryPlotV1Z = z
  .object({
    type: z.literal("ternary_plot_v1"),
    triangle: TriangleIdV1Z,
    title: z.string().min(1),
    axes: z.tuple([GasKeyV1Z, GasKeyV1Z, GasKeyV1Z]),
    corners: z.tuple([PlotCornerV1Z, PlotCornerV1Z, PlotCornerV1Z]),
    regions: z.array(PlotRegionV1Z),
    user_point: PlotUserPointV1Z.nullable(), // null when the three gases sum to zero
    message: z.string().nullable()
  })
  .strict();
export type TernaryPlotV1 = z.infer<typeof TernaryPlotV1Z>;
