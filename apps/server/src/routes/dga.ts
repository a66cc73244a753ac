// apps/server/src/routes/dga.ts
//
// DGA endpoints. Thin adapters: validate the body against @dga/contracts, call
// the pure kernel, send JSON. No state is kept between requests.

import type { FastifyInstance, FastifyReply } from "fastify";

import { isTriangleIdV1, safeParseGasReadingV1, TRIANGLE_IDS_V1, type ContractErrorV1 } from "@dga/contracts";
import {
  buildTernaryPlotV1,
  DIAGNOSTIC_METHODS_V1,
  evaluateReadingV1,
  getTriangleCatalogV1
} from "@dga/diagnostic-kernel";

type TriangleParams = { triangle: string };

function sendErrors(reply: FastifyReply, status: 400 | 404, errors: ContractErrorV1[]): FastifyReply {
  return reply.code(status).send({ ok: false, errors });
}

function unknownTriangle(reply: FastifyReply, triangle: string): FastifyReply {
  return sendErrors(reply, 404, [
    {
      code: "UNKNOWN_TRIANGLE",
      path: "triangle",
      message: `unknown triangle: ${triangle} (expected one of ${TRIANGLE_IDS_V1.join(", ")})`
    }
  ]);
}

export function registerDgaRoutes(app: FastifyInstance): void {
  // GET /api/dga/methods
  // Summary-table order; the same order evaluate uses for its rows.
  app.get("/api/dga/methods", async (_req, reply) => {
    return reply.send({
      ok: true,
      methods: DIAGNOSTIC_METHODS_V1.map((m) => ({ method: m.method, model: m.model }))
    });
  });

  // POST /api/dga/evaluate
  app.post("/api/dga/evaluate", async (req, reply) => {
    const parsed = safeParseGasReadingV1(req.body ?? null);
    if (!parsed.ok) return sendErrors(reply, 400, parsed.errors);
    return reply.send(evaluateReadingV1(parsed.value));
  });

  // POST /api/dga/plots/:triangle
  // Unknown triangle is a 404 even when the body is also invalid.
  app.post<{ Params: TriangleParams }>("/api/dga/plots/:triangle", async (req, reply) => {
    const { triangle } = req.params;
    if (!isTriangleIdV1(triangle)) return unknownTriangle(reply, triangle);

    const parsed = safeParseGasReadingV1(req.body ?? null);
    if (!parsed.ok) return sendErrors(reply, 400, parsed.errors);
    return reply.send(buildTernaryPlotV1(triangle, parsed.value));
  });

  // GET /api/dga/regions/:triangle
  app.get<{ Params: TriangleParams }>("/api/dga/regions/:triangle", async (req, reply) => {
    const { triangle } = req.params;
    if (!isTriangleIdV1(triangle)) return unknownTriangle(reply, triangle);
    return reply.send(getTriangleCatalogV1(triangle));
  });
}
