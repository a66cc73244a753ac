// Shared helpers for the diagnostic-kernel test scripts.

import assert from "node:assert";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { parseGasReadingV1, type GasReadingV1 } from "@dga/contracts";

const TEST_DIR = path.dirname(fileURLToPath(import.meta.url));

export function readFixtureJson(name: string): unknown {
  const abs = path.resolve(TEST_DIR, "..", "..", "fixtures", name); // anchored on this file, not cwd
  return JSON.parse(fs.readFileSync(abs, "utf8"));
}

export function readFixtureReading(name: string): GasReadingV1 {
  return parseGasReadingV1(readFixtureJson(name));
}

export function reading(partial: Partial<GasReadingV1>): GasReadingV1 {
  return { H2: 0, CH4: 0, C2H4: 0, C2H2: 0, CO: 0, ...partial };
}

export function assertClose(actual: number, expected: number, tol = 1e-9, msg?: string): void {
  assert.ok(Math.abs(actual - expected) <= tol, msg ?? `expected ${expected} ± ${tol}, got ${actual}`);
}
