// Rogers Ratio: bucket boundaries, digit order, table lookup, zero denominators.

import assert from "node:assert";

import { RogersDiagnosisV1Z } from "@dga/contracts";

import {
  bucketRatioV1,
  computeRogersRatiosV1,
  diagnoseRogersRatio,
  ROGERS_CODE_TABLE_V1,
  ROGERS_CUTOFFS_V1,
  rogersCodeV1
} from "../methods/rogers_ratio";
import { RATIO_SENTINEL, safeRatio } from "../methods/ratio";
import { readFixtureReading, reading } from "./helpers";

// --- Bucket boundaries are inclusive on the middle bucket ---
assert.equal(bucketRatioV1(0.0999, ROGERS_CUTOFFS_V1.R1), "0");
assert.equal(bucketRatioV1(0.1, ROGERS_CUTOFFS_V1.R1), "1");
assert.equal(bucketRatioV1(1.0, ROGERS_CUTOFFS_V1.R1), "1");
assert.equal(bucketRatioV1(1.0001, ROGERS_CUTOFFS_V1.R1), "2");

assert.equal(bucketRatioV1(0.99, ROGERS_CUTOFFS_V1.R2), "0");
assert.equal(bucketRatioV1(1.0, ROGERS_CUTOFFS_V1.R2), "1");
assert.equal(bucketRatioV1(3.0, ROGERS_CUTOFFS_V1.R2), "1");
assert.equal(bucketRatioV1(3.01, ROGERS_CUTOFFS_V1.R2), "2");

assert.equal(bucketRatioV1(0.49, ROGERS_CUTOFFS_V1.R5), "0");
assert.equal(bucketRatioV1(0.5, ROGERS_CUTOFFS_V1.R5), "1");
assert.equal(bucketRatioV1(3.0, ROGERS_CUTOFFS_V1.R5), "1");
assert.equal(bucketRatioV1(3.01, ROGERS_CUTOFFS_V1.R5), "2");

// --- Zero denominator resolves to the sentinel, which lands in the high bucket ---
assert.equal(safeRatio(5, 0), RATIO_SENTINEL);
assert.equal(safeRatio(0, 0), RATIO_SENTINEL);
assert.equal(safeRatio(3, 4), 0.75);
// Overflowing quotient is treated like a zero denominator.
assert.equal(safeRatio(1e300, 1e-300), RATIO_SENTINEL);
for (const c of Object.values(ROGERS_CUTOFFS_V1)) {
  assert.equal(bucketRatioV1(RATIO_SENTINEL, c), "2");
}

// --- Ratios use CH4/H2, C2H4/CH4, C2H2/C2H4 ---
assert.deepStrictEqual(computeRogersRatiosV1(reading({ H2: 10, CH4: 20, C2H4: 10, C2H2: 10 })), { R1: 2, R2: 0.5, R5: 1 });

// --- Digits are concatenated R1, R2, R5 in that order ---
{
  // R1=2 -> "2", R2=0.5 -> "0", R5=1 -> "1"; "201" is not in the table.
  assert.equal(rogersCodeV1({ R1: 2, R2: 0.5, R5: 1 }), "201");
  const d = diagnoseRogersRatio(reading({ H2: 10, CH4: 20, C2H4: 10, C2H2: 10 }));
  assert.equal(d.ratio_code, "201");
  assert.equal(d.code, "UNDEFINED");
  assert.equal(d.label, "Undefined/Developing Fault");
  assert.equal(d.rule_ref, null);
}

// --- All-zero reading: every ratio hits the sentinel, code 222, no throw ---
{
  const d = diagnoseRogersRatio(readFixtureReading("reading_zero_001.json"));
  assert.deepStrictEqual(d.ratios, { R1: 99, R2: 99, R5: 99 });
  assert.equal(d.ratio_code, "222");
  assert.equal(d.code, "UNDEFINED");
  assert.equal(d.text, "Code: 222, Diagnosis: Undefined/Developing Fault (R1:99.00, R2:99.00, R5:99.00)");
}

// --- Portal default reading: code 100 ---
{
  const d = diagnoseRogersRatio(readFixtureReading("reading_portal_default_001.json"));
  assert.equal(d.ratio_code, "100");
  assert.equal(d.code, "T1");
  assert.deepStrictEqual(d.rule_ref, { ruleset_id: "rogers_ratio_v1", rule_id: "code_100" });
  assert.equal(d.text, "Code: 100, Diagnosis: T1 (Thermal Fault T < 300°C) (R1:0.17, R2:0.40, R5:0.05)");
  assert.ok(RogersDiagnosisV1Z.safeParse(d).success);
}

// --- Arcing fixture: every ratio in the middle bucket ---
{
  const d = diagnoseRogersRatio(readFixtureReading("reading_arcing_001.json"));
  assert.equal(d.ratio_code, "111");
  assert.equal(d.code, "DT");
  assert.equal(d.text, "Code: 111, Diagnosis: Mixed thermal and electrical (R1:0.30, R2:2.00, R5:0.67)");
}

// --- Thermal fixture: R2 sits exactly on its upper cutoff (3.0) and stays "1" ---
{
  const d = diagnoseRogersRatio(readFixtureReading("reading_thermal_001.json"));
  assert.equal(d.ratios.R2, 3);
  assert.equal(d.ratio_code, "210");
  assert.equal(d.code, "T3");
  assert.equal(d.text, "Code: 210, Diagnosis: T3 (Thermal Fault T > 700°C) (R1:2.50, R2:3.00, R5:0.01)");
}

// --- D2 from the table ---
{
  const d = diagnoseRogersRatio(reading({ H2: 1000, CH4: 50, C2H4: 10, C2H2: 10 }));
  assert.equal(d.ratio_code, "001");
  assert.equal(d.code, "D2");
  assert.equal(d.label, "D2 (High Energy Discharge/Arcing)");
}

// --- Table keys are well-formed codes ---
for (const key of Object.keys(ROGERS_CODE_TABLE_V1)) {
  assert.match(key, /^[012]{3}$/);
}

console.log("[OK] rogers ratio");
