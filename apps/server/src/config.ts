// apps/server/src/config.ts
//
// Service configuration: .env files feed process.env, then the three
// settings the service reads are validated once at startup.

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { z } from "zod";

import { zodIssuesToErrors } from "@dga/contracts";

export const LOG_LEVELS_V1 = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevelV1 = (typeof LOG_LEVELS_V1)[number];

export const ServerEnvV1Z = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3210),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(LOG_LEVELS_V1).default("info")
});

export interface ServerConfigV1 {
  port: number;
  host: string;
  log_level: LogLevelV1;
}

/**
 * Reads KEY=value lines into `env`. Keys already present are kept, so the
 * process environment always wins over a file.
 *
 * @returns keys that were set from this file.
 */
export function loadDotEnvFile(fp: string, env: NodeJS.ProcessEnv = process.env): string[] {
  if (!fs.existsSync(fp)) return [];
  const raw = fs.readFileSync(fp, "utf8");
  const applied: string[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    if (env[key] == null) {
      env[key] = val;
      applied.push(key);
    }
  }
  return applied;
}

// Repo root .env first, then apps/server/.env for overrides.
export function loadEnv(env: NodeJS.ProcessEnv = process.env): void {
  const appDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
  const repoRoot = path.resolve(appDir, "..", "..");
  loadDotEnvFile(path.join(repoRoot, ".env"), env);
  loadDotEnvFile(path.join(appDir, ".env"), env);
}

function nonEmpty(v: string | undefined): string | undefined {
  return v == null || v.trim() === "" ? undefined : v.trim();
}

/**
 * @throws Error prefixed INVALID_SERVER_CONFIG listing every bad setting.
 */
export function loadServerConfigV1(env: NodeJS.ProcessEnv = process.env): ServerConfigV1 {
  const res = ServerEnvV1Z.safeParse({
    PORT: nonEmpty(env.PORT),
    HOST: nonEmpty(env.HOST),
    LOG_LEVEL: nonEmpty(env.LOG_LEVEL)
  });
  if (!res.success) {
    const detail = zodIssuesToErrors(res.error, "INVALID_SERVER_CONFIG")
      .map((e) => `${e.path}: ${e.message}`)
      .join("; ");
    throw new Error(`INVALID_SERVER_CONFIG: ${detail}`);
  }
  return { port: res.data.PORT, host: res.data.HOST, log_level: res.data.LOG_LEVEL };
}
