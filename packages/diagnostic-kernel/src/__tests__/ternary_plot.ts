// Ternary plot builder: contract shape, projected regions, user point, zero total.

import assert from "node:assert";

import { TernaryPlotV1Z } from "@dga/contracts";

import { buildTernaryPlotV1, projectRegionV1, ZERO_TOTAL_PLOT_MESSAGE } from "../plot/ternary_plot";
import { FAULT_REGION_CATALOG_V1 } from "../regions/fault_region_catalog";
import { assertClose, readFixtureReading } from "./helpers";

const SQRT3 = Math.sqrt(3);

// --- Portal default reading on Triangle 1 ---
{
  const plot = buildTernaryPlotV1("duval_t1", readFixtureReading("reading_portal_default_001.json"));
  TernaryPlotV1Z.parse(plot);

  assert.equal(plot.title, "Duval Triangle 1 (T1, T2, D1, D2, PD)");
  assert.deepStrictEqual(plot.axes, ["CH4", "C2H4", "C2H2"]);
  assert.deepStrictEqual(
    plot.corners.map((c) => c.label),
    ["CH4 (100%)", "C2H4 (100%)", "C2H2 (100%)"]
  );
  assert.deepStrictEqual(plot.corners[0].point, { x: 0, y: 0 });
  assert.deepStrictEqual(plot.corners[1].point, { x: 100, y: 0 });
  assert.equal(plot.corners[2].point.x, 50);
  assertClose(plot.corners[2].point.y, 50 * SQRT3);
  assert.equal(plot.regions.length, 6);
  assert.equal(plot.message, null);

  assert.ok(plot.user_point);
  assert.equal(plot.user_point.label, "(CH4:70, C2H4:28, C2H2:1)");
  const [, p2, p3] = plot.user_point.percentages;
  assertClose(plot.user_point.point.x, p2 + p3 / 2);
  assertClose(plot.user_point.point.y, (p3 * SQRT3) / 2);
}

// --- Region projection: closed outline, centroid anchor ---
{
  const d2 = FAULT_REGION_CATALOG_V1.duval_t1.regions.find((r) => r.name === "D2");
  assert.ok(d2);
  const projected = projectRegionV1(d2);
  assert.equal(projected.outline.length, d2.vertices.length + 1);
  assert.deepStrictEqual(projected.outline[0], projected.outline[projected.outline.length - 1]);
  assert.deepStrictEqual(projected.outline[0], { x: 100, y: 0 });
  assertClose(projected.label_anchor.x, 70);
  assertClose(projected.label_anchor.y, (50 * SQRT3) / 3);
  assert.equal(projected.fill_color, "salmon");
  assert.equal(projected.label_color, "darkred");
}

// --- Triangle 4 uses its own axes ---
{
  const plot = buildTernaryPlotV1("duval_t4", readFixtureReading("reading_arcing_001.json"));
  TernaryPlotV1Z.parse(plot);
  assert.equal(plot.title, "Duval Triangle 4 (T3, D2, S)");
  assert.deepStrictEqual(plot.axes, ["H2", "C2H2", "C2H4"]);
  assert.ok(plot.user_point);
  // H2 50%, C2H2 20%, C2H4 30%
  assert.equal(plot.user_point.label, "(H2:50, C2H2:20, C2H4:30)");
  assertClose(plot.user_point.point.x, 35);
  assertClose(plot.user_point.point.y, 15 * SQRT3);
}

// --- Zero total: regions still drawn, no point, message set ---
for (const triangle of ["duval_t1", "duval_t4"] as const) {
  const plot = buildTernaryPlotV1(triangle, readFixtureReading("reading_zero_001.json"));
  TernaryPlotV1Z.parse(plot);
  assert.equal(plot.user_point, null);
  assert.equal(plot.message, ZERO_TOTAL_PLOT_MESSAGE);
  assert.equal(plot.regions.length, FAULT_REGION_CATALOG_V1[triangle].regions.length);
}
assert.equal(
  buildTernaryPlotV1("duval_t1", readFixtureReading("reading_zero_001.json")).title,
  "Duval Triangle 1 - No Gas Input"
);

console.log("[OK] ternary plot");
