import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";

import { GapAnalysisMode } from "../contracts/gap_finding";
import type { IntelEngine } from "../engine/intel_engine";
import { replyForEngineError } from "./engine_errors";

const MissionParams = z.object({ missionId: z.string().min(1) });

// `text` is deliberately untyped: malformed input reaches the classifier,
// which degrades to Allow instead of rejecting.
const ClassifyBody = z.object({ text: z.unknown() });

const GapAnalysisBody = z
  .object({
    forceRegen: z.boolean().default(false),
    mode: GapAnalysisMode.default("rules"),
    templateId: z.string().min(1).nullable().default(null),
  })
  .strict();

const ReportBody = z
  .object({
    templateId: z.string().min(1),
    focus: z.string().optional(),
    sectionNotes: z.record(z.string()).optional(),
    forceRegen: z.boolean().default(false),
  })
  .strict();

function invalidRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({
    error: "invalid_request",
    details: error.flatten(),
  });
}

export async function missionRoutes(app: FastifyInstance, opts: { engine: IntelEngine }) {
  const { engine } = opts;

  app.post("/missions/:missionId/classify", async (req, reply) => {
    const params = MissionParams.safeParse(req.params);
    if (!params.success) return invalidRequest(reply, params.error);
    const parsed = ClassifyBody.safeParse(req.body ?? {});
    if (!parsed.success) return invalidRequest(reply, parsed.error);

    try {
      const verdict = await engine.classifyRequest(parsed.data.text, params.data.missionId);
      return reply.send({ ok: true, verdict });
    } catch (error) {
      const handled = replyForEngineError(reply, error);
      if (handled) return handled;
      throw error;
    }
  });

  app.get("/missions/:missionId/templates", async (req, reply) => {
    const params = MissionParams.safeParse(req.params);
    if (!params.success) return invalidRequest(reply, params.error);

    try {
      const templates = await engine.listTemplates(params.data.missionId);
      return reply.send({ ok: true, templates });
    } catch (error) {
      const handled = replyForEngineError(reply, error);
      if (handled) return handled;
      throw error;
    }
  });

  app.post("/missions/:missionId/gap-analysis", async (req, reply) => {
    const params = MissionParams.safeParse(req.params);
    if (!params.success) return invalidRequest(reply, params.error);
    const parsed = GapAnalysisBody.safeParse(req.body ?? {});
    if (!parsed.success) return invalidRequest(reply, parsed.error);

    try {
      const run = await engine.runGapAnalysis(params.data.missionId, parsed.data);
      return reply.send({ ok: true, cached: run.cached, result: run.result });
    } catch (error) {
      const handled = replyForEngineError(reply, error);
      if (handled) return handled;
      throw error;
    }
  });

  app.post("/missions/:missionId/reports", async (req, reply) => {
    const params = MissionParams.safeParse(req.params);
    if (!params.success) return invalidRequest(reply, params.error);
    const parsed = ReportBody.safeParse(req.body);
    if (!parsed.success) return invalidRequest(reply, parsed.error);

    // A client that goes away cancels synthesis.
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) controller.abort();
    };
    reply.raw.on("close", onClose);

    try {
      const { templateId, ...options } = parsed.data;
      const outcome = await engine.generateReport(params.data.missionId, templateId, {
        ...options,
        signal: controller.signal,
      });
      return reply.send({ ok: true, outcome });
    } catch (error) {
      const handled = replyForEngineError(reply, error);
      if (handled) return handled;
      throw error;
    } finally {
      reply.raw.off("close", onClose);
    }
  });
}
