// Duval Pentagon (conceptual): ordered absolute-ppm checks.

import assert from "node:assert";

import { PentagonDiagnosisV1Z } from "@dga/contracts";

import { diagnoseDuvalPentagon } from "../methods/duval_pentagon";
import { readFixtureReading, reading } from "./helpers";

{
  const d = diagnoseDuvalPentagon(readFixtureReading("reading_arcing_001.json"));
  assert.equal(d.code, "D2_T3");
  assert.equal(d.text, "D2 / T3 (High Energy Arcing + Hotspot)");
  assert.deepStrictEqual(d.rule_ref, { ruleset_id: "duval_pentagon_v1", rule_id: "d2_t3_arcing_hotspot" });
  assert.ok(PentagonDiagnosisV1Z.safeParse(d).success);
}

assert.equal(diagnoseDuvalPentagon(reading({ H2: 600, C2H4: 10 })).code, "PD_D1");
assert.equal(diagnoseDuvalPentagon(reading({ H2: 100, CO: 1500, C2H4: 5 })).code, "C");
assert.equal(diagnoseDuvalPentagon(readFixtureReading("reading_thermal_001.json")).code, "T2");

// Precedence: both PD/D1 and C hold; PD/D1 is checked first.
assert.equal(diagnoseDuvalPentagon(reading({ H2: 600, C2H4: 5, CO: 2000 })).code, "PD_D1");

{
  const d = diagnoseDuvalPentagon(readFixtureReading("reading_portal_default_001.json"));
  assert.equal(d.code, "UNDEFINED");
  assert.equal(d.text, "Mixed/Unclassified Fault Zone");
  assert.equal(d.rule_ref, null);
}

// All-zero reading is a valid input and falls through.
assert.equal(diagnoseDuvalPentagon(readFixtureReading("reading_zero_001.json")).code, "UNDEFINED");

console.log("[OK] duval pentagon");
