// apps/server/src/server.ts
//
// Process entry: load .env, validate config, listen.

import { buildServer } from "./app";
import { loadEnv, loadServerConfigV1 } from "./config";

loadEnv();

const cfg = loadServerConfigV1(process.env);
const app = buildServer(cfg);

async function main(): Promise<void> {
  await app.listen({ port: cfg.port, host: cfg.host });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
