// Diagnostic Kernel - Ternary plot builder (v1)
//
// Turns a triangle's catalog entry plus one GasReading into plot-ready
// coordinates: closed region outlines, centroid label anchors, corner labels
// and the projected user point. Rendering is left to the caller.

import type { GasReadingV1, PercentageTripleV1, PlotRegionV1, TernaryPlotV1, TriangleIdV1 } from "@dga/contracts";

import { centroid, projectTriple, toPercentageTriple, TRIANGLE_FRAME_V1 } from "../geometry/ternary";
import { projectTriangleGases } from "../inputs/gas_projection";
import { formatPointLabel } from "../format/diagnosis_text";
import { getTriangleCatalogV1, type FaultRegionV1 } from "../regions/fault_region_catalog";

export const ZERO_TOTAL_PLOT_MESSAGE = "Total Gas Concentration is Zero";

export function projectRegionV1(region: FaultRegionV1): PlotRegionV1 {
  const points = region.vertices.map((v) => projectTriple(v));
  return {
    name: region.name,
    fill_color: region.fill_color,
    label_color: region.label_color,
    vertices: region.vertices.map((v): PercentageTripleV1 => [v[0], v[1], v[2]]),
    outline: [...points, points[0]],
    label_anchor: centroid(points)
  };
}

export function buildTernaryPlotV1(triangle: TriangleIdV1, reading: GasReadingV1): TernaryPlotV1 {
  const entry = getTriangleCatalogV1(triangle);
  const [g1, g2, g3] = entry.axes;
  const [a, b, c] = TRIANGLE_FRAME_V1;

  const n = projectTriangleGases(reading, entry.axes);
  const percentages = toPercentageTriple(n);

  return {
    type: "ternary_plot_v1",
    triangle,
    title: n.zero_total ? `${entry.name} - No Gas Input` : entry.title,
    axes: [g1, g2, g3],
    corners: [
      { gas: g1, label: `${g1} (100%)`, point: { ...a } },
      { gas: g2, label: `${g2} (100%)`, point: { ...b } },
      { gas: g3, label: `${g3} (100%)`, point: { ...c } }
    ],
    regions: entry.regions.map(projectRegionV1),
    user_point: n.zero_total
      ? null
      : {
          percentages,
          point: projectTriple(percentages),
          label: formatPointLabel([g1, g2, g3], percentages)
        },
    message: n.zero_total ? ZERO_TOTAL_PLOT_MESSAGE : null
  };
}
