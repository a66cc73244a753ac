// Diagnostic Kernel - Fault Region Catalog (v1)
//
// Drawing geometry for the Duval triangles, in percentage-triple coordinates
// (axis order of the triangle). These polygons are for display only: the
// classification rules carry their own thresholds and are NOT derived from
// this catalog. The two are allowed to disagree.

import type { GasKeyV1, PercentageTripleV1, TriangleIdV1 } from "@dga/contracts";
import { TRIANGLE_IDS_V1 } from "@dga/contracts";

export interface FaultRegionV1 {
  readonly name: string;
  readonly fill_color: string;
  readonly label_color: string;
  // Ordered polygon vertices (>= 3); each sums to 100.
  readonly vertices: ReadonlyArray<Readonly<PercentageTripleV1>>;
}

export interface LegendEntryV1 {
  readonly code: string;
  readonly description: string;
}

export interface TriangleCatalogEntryV1 {
  readonly triangle: TriangleIdV1;
  readonly name: string;
  readonly title: string;
  readonly axes: readonly [GasKeyV1, GasKeyV1, GasKeyV1];
  readonly regions: ReadonlyArray<FaultRegionV1>;
  readonly legend: ReadonlyArray<LegendEntryV1>;
}

const DUVAL_T1_CATALOG_V1: TriangleCatalogEntryV1 = {
  triangle: "duval_t1",
  name: "Duval Triangle 1",
  title: "Duval Triangle 1 (T1, T2, D1, D2, PD)",
  axes: ["CH4", "C2H4", "C2H2"],
  regions: [
    { name: "PD", fill_color: "lightblue", label_color: "blue", vertices: [[98, 2, 0], [90, 0, 10], [95, 0, 5], [100, 0, 0]] },
    { name: "T1", fill_color: "lightgreen", label_color: "green", vertices: [[90, 0, 10], [70, 0, 30], [80, 20, 0], [98, 2, 0]] },
    { name: "T2", fill_color: "yellow", label_color: "darkgoldenrod", vertices: [[70, 0, 30], [50, 0, 50], [40, 60, 0], [80, 20, 0]] },
    { name: "T3", fill_color: "orange", label_color: "red", vertices: [[40, 60, 0], [0, 100, 0], [0, 50, 50], [50, 0, 50]] },
    { name: "D2", fill_color: "salmon", label_color: "darkred", vertices: [[0, 100, 0], [0, 0, 100], [40, 60, 0]] },
    { name: "D1", fill_color: "purple", label_color: "white", vertices: [[0, 50, 50], [0, 0, 100], [50, 0, 50]] }
  ],
  legend: [
    { code: "PD", description: "Partial Discharge" },
    { code: "T1", description: "Thermal Fault T < 300°C" },
    { code: "T2/T3", description: "Thermal Fault (medium to high temp)" },
    { code: "D1/D2", description: "Discharge/Arcing" }
  ]
};

const DUVAL_T4_CATALOG_V1: TriangleCatalogEntryV1 = {
  triangle: "duval_t4",
  name: "Duval Triangle 4",
  title: "Duval Triangle 4 (T3, D2, S)",
  axes: ["H2", "C2H2", "C2H4"],
  regions: [
    { name: "S", fill_color: "lightgray", label_color: "black", vertices: [[95, 5, 0], [70, 30, 0], [70, 0, 30], [95, 0, 5]] },
    { name: "T3", fill_color: "gold", label_color: "orange", vertices: [[30, 0, 70], [0, 0, 100], [0, 30, 70], [30, 70, 0]] },
    { name: "D2", fill_color: "darkred", label_color: "white", vertices: [[0, 100, 0], [0, 70, 30], [30, 0, 70], [0, 0, 100]] }
  ],
  legend: [
    { code: "T3", description: "Severe Thermal Fault T > 700°C" },
    { code: "D2", description: "High Energy Arcing" },
    { code: "S", description: "Stray Gassing / Hot metal contacts" }
  ]
};

// Every level is frozen: entries, regions, vertex tuples, legend rows.
function freezeCatalogEntryV1(entry: TriangleCatalogEntryV1): TriangleCatalogEntryV1 {
  for (const region of entry.regions) {
    for (const v of region.vertices) Object.freeze(v);
    Object.freeze(region.vertices);
    Object.freeze(region);
  }
  for (const row of entry.legend) Object.freeze(row);
  Object.freeze(entry.regions);
  Object.freeze(entry.legend);
  Object.freeze(entry.axes);
  return Object.freeze(entry);
}

export const FAULT_REGION_CATALOG_V1: Readonly<Record<TriangleIdV1, TriangleCatalogEntryV1>> = Object.freeze({
  duval_t1: freezeCatalogEntryV1(DUVAL_T1_CATALOG_V1),
  duval_t4: freezeCatalogEntryV1(DUVAL_T4_CATALOG_V1)
});

export function getTriangleCatalogV1(triangle: TriangleIdV1): TriangleCatalogEntryV1 {
  return FAULT_REGION_CATALOG_V1[triangle];
}

export function listTriangleCatalogsV1(): TriangleCatalogEntryV1[] {
  return TRIANGLE_IDS_V1.map((id) => FAULT_REGION_CATALOG_V1[id]);
}
