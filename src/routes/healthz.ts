import type { FastifyInstance } from "fastify";

export async function healthRoutes(app: FastifyInstance, opts: { policyVersion?: () => string } = {}) {
  app.get("/healthz", async () => ({
    ok: true,
    service: "lanekeeper",
    ts: new Date().toISOString(),
    policyVersion: opts.policyVersion?.() ?? null,
  }));
}
