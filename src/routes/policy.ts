import type { FastifyInstance } from "fastify";

import type { IntelEngine } from "../engine/intel_engine";
import { PolicyConfigError } from "../errors";

export async function policyRoutes(app: FastifyInstance, opts: { engine: IntelEngine }) {
  const { engine } = opts;

  app.get("/policy", async () => ({ ok: true, version: engine.policyVersion }));

  app.post("/policy/reload", async (req, reply) => {
    try {
      const { version, previousVersion } = engine.reloadPolicy();
      return reply.send({ ok: true, version, previousVersion });
    } catch (error) {
      if (error instanceof PolicyConfigError) {
        req.log.error({ code: error.code, details: error.details }, "policy.reload_rejected");
        return reply.code(500).send({ ...error.toJSON(), activeVersion: engine.policyVersion });
      }
      throw error;
    }
  });
}
