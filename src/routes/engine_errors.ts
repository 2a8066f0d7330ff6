import type { FastifyReply } from "fastify";

import { MissionNotFoundError, PolicyConfigError, ReportCancelledError, TemplateNotFoundError } from "../errors";

/**
 * Maps engine errors to HTTP responses. Returns null for anything the
 * caller should rethrow to Fastify's default 500 handler.
 */
export function replyForEngineError(reply: FastifyReply, error: unknown): FastifyReply | null {
  if (error instanceof MissionNotFoundError || error instanceof TemplateNotFoundError) {
    return reply.code(404).send(error.toJSON());
  }
  if (error instanceof PolicyConfigError) {
    return reply.code(422).send(error.toJSON());
  }
  if (error instanceof ReportCancelledError) {
    return reply.code(499).send({ error: "report_cancelled" });
  }
  return null;
}
