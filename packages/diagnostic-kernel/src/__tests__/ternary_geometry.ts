// Ternary geometry: normalization, projection, centroid, TCG.

import assert from "node:assert";

import { centroid, normalizeTriple, saturatingSum, toCartesian, TRIANGLE_FRAME_V1 } from "../geometry/ternary";
import { totalCombustibleGas } from "../inputs/gas_projection";
import { assertClose, readFixtureReading, reading } from "./helpers";

// --- normalizeTriple: zero total ---
assert.deepStrictEqual(normalizeTriple(0, 0, 0), { p1: 0, p2: 0, p3: 0, total: 0, zero_total: true });

// --- normalizeTriple: single gas is exactly 100% ---
{
  const n = normalizeTriple(0, 42, 0);
  assert.equal(n.zero_total, false);
  assert.equal(n.p2, 100);
  assert.equal(n.p1, 0);
  assert.equal(n.p3, 0);
  assert.equal(n.total, 42);
}

// --- normalizeTriple: known values ---
{
  const n = normalizeTriple(25, 10, 0.5);
  assertClose(n.p1, (25 / 35.5) * 100);
  assertClose(n.p2, (10 / 35.5) * 100);
  assertClose(n.p3, (0.5 / 35.5) * 100);
  assert.equal(n.total, 35.5);
}

// --- normalizeTriple: percentages stay in [0,100] and sum to 100 (deterministic sweep) ---
{
  let seed = 12345;
  const next = (): number => {
    seed = (seed * 1103515245 + 12345) % 2147483648;
    return seed / 2147483648;
  };
  for (let i = 0; i < 500; i++) {
    const scale = [1, 1e-3, 1e3, 1e6][i % 4];
    const g1 = next() * scale;
    const g2 = i % 7 === 0 ? 0 : next() * scale;
    const g3 = next() * scale;
    if (g1 + g2 + g3 === 0) continue;
    const n = normalizeTriple(g1, g2, g3);
    for (const p of [n.p1, n.p2, n.p3]) {
      assert.ok(p >= 0 && p <= 100, `percentage out of range: ${p}`);
    }
    assertClose(n.p1 + n.p2 + n.p3, 100, 1e-9);
  }
}

// --- normalizeTriple: gases near the float limit still sum to 100 ---
{
  const n = normalizeTriple(1e308, 1e308, 1e308);
  assert.equal(n.zero_total, false);
  assertClose(n.p1, 100 / 3);
  assertClose(n.p2, 100 / 3);
  assertClose(n.p3, 100 / 3);
  assertClose(n.p1 + n.p2 + n.p3, 100);
  assert.equal(n.total, Number.MAX_VALUE);
}
{
  const n = normalizeTriple(1e308, 0, 5e-324);
  assert.equal(n.p1, 100);
  assert.equal(n.p2, 0);
  assert.ok(n.p3 >= 0 && n.p3 < 1e-300);
}

// --- saturatingSum ---
assert.equal(saturatingSum([1, 2, 3.5]), 6.5);
assert.equal(saturatingSum([]), 0);
assert.equal(saturatingSum([Number.MAX_VALUE, Number.MAX_VALUE]), Number.MAX_VALUE);

// --- toCartesian: corners ---
assert.deepStrictEqual(toCartesian(100, 0, 0), { x: 0, y: 0 });
assert.deepStrictEqual(toCartesian(0, 100, 0), { x: 100, y: 0 });
{
  const apex = toCartesian(0, 0, 100);
  assert.equal(apex.x, 50);
  assertClose(apex.y, 50 * Math.sqrt(3));
}

// --- toCartesian: only p2/p3 matter, and output is reproducible ---
assert.deepStrictEqual(toCartesian(20, 30, 50), toCartesian(20, 30, 50));
assert.deepStrictEqual(toCartesian(999, 30, 50), toCartesian(20, 30, 50));
{
  const p = toCartesian(50, 25, 25);
  assert.equal(p.x, 37.5);
  assertClose(p.y, (25 * Math.sqrt(3)) / 2);
}

// --- frame corners are the three projected pure-gas points ---
assert.deepStrictEqual(TRIANGLE_FRAME_V1[0], { x: 0, y: 0 });
assert.deepStrictEqual(TRIANGLE_FRAME_V1[1], { x: 100, y: 0 });
assert.equal(TRIANGLE_FRAME_V1[2].x, 50);

// --- centroid: unweighted mean of projected vertices ---
{
  const c = centroid([toCartesian(0, 100, 0), toCartesian(0, 0, 100), toCartesian(40, 60, 0)]);
  assertClose(c.x, 70);
  assertClose(c.y, (50 * Math.sqrt(3)) / 3);
}
assert.deepStrictEqual(centroid([]), { x: 0, y: 0 });

// --- TCG ---
assert.equal(totalCombustibleGas(readFixtureReading("reading_portal_default_001.json")), 985.5);
assert.equal(totalCombustibleGas(readFixtureReading("reading_zero_001.json")), 0);
assert.equal(totalCombustibleGas(reading({ H2: 1e308, CH4: 1e308, C2H4: 1e308 })), Number.MAX_VALUE);

console.log("[OK] ternary geometry");
