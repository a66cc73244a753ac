#!/usr/bin/env node
/**
 * DGA reading analyzer
 *
 * Reads one GasReading JSON file, runs every diagnostic method and prints the
 * summary table (or the full report with --json).
 *
 * Usage:
 *   npm run analyze -- --file ./packages/diagnostic-kernel/fixtures/reading_portal_default_001.json
 *   npm run analyze -- --file ./reading.json --json
 */

import fs from "node:fs";
import path from "node:path";

import { safeParseGasReadingV1 } from "@dga/contracts";
import { evaluateReadingV1 } from "@dga/diagnostic-kernel";

import { renderReportTable } from "./lib/report_table";

/* -------------------- CLI utils -------------------- */

function arg(name: string, fallback: string | null = null): string | null {
  const i = process.argv.indexOf(name);
  if (i === -1) return fallback;
  const v = process.argv[i + 1];
  return v == null ? fallback : String(v);
}

function flag(name: string): boolean {
  return process.argv.includes(name);
}

function die(msg: string): never {
  console.error(msg);
  process.exit(1);
}

/* -------------------- main -------------------- */

function main(): void {
  const file = arg("--file");
  if (!file) die("usage: analyze_reading --file <reading.json> [--json]");

  const abs = path.resolve(file);
  if (!fs.existsSync(abs)) die(`file not found: ${abs}`);

  let input: unknown;
  try {
    input = JSON.parse(fs.readFileSync(abs, "utf8"));
  } catch (e: unknown) {
    die(`invalid JSON in ${abs}: ${e instanceof Error ? e.message : String(e)}`);
  }

  const parsed = safeParseGasReadingV1(input);
  if (!parsed.ok) {
    die(parsed.errors.map((e) => `${e.code} ${e.path || "(root)"}: ${e.message}`).join("\n"));
  }

  const report = evaluateReadingV1(parsed.value);
  console.log(flag("--json") ? JSON.stringify(report, null, 2) : renderReportTable(report));
}

main();
