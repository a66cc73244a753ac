// apps/server/src/app.ts
//
// Builds the fastify instance without listening, so tests can drive it with
// app.inject().

import Fastify, { type FastifyInstance } from "fastify";

import type { ServerConfigV1 } from "./config";
import { registerDgaRoutes } from "./routes/dga";

export function buildServer(cfg: Pick<ServerConfigV1, "log_level">): FastifyInstance {
  const app = Fastify({ logger: { level: cfg.log_level } });

  app.addHook("onRequest", async (req, reply) => {
    // CORS (minimal, dev-friendly)
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });

  // Body parser failures (malformed or empty JSON, unsupported content type)
  // get the same {ok:false, errors} envelope as a reading that fails validation.
  // 5xx errors go on to fastify's default handler.
  app.setErrorHandler((err, req, reply) => {
    const status = err.statusCode ?? 500;
    if (status < 400 || status >= 500) return reply.send(err);

    req.log.info({ err }, "request body rejected");
    return reply.code(status).send({
      ok: false,
      errors: [
        {
          code: status === 400 ? "INVALID_GAS_READING" : err.code || "BAD_REQUEST",
          path: "",
          message: err.message
        }
      ]
    });
  });

  app.get("/api/health", async () => ({ ok: true }));

  registerDgaRoutes(app);

  return app;
}
