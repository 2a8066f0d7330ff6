import type { EngineLogger } from "../logger";

export type AuditEventType =
  | "guardrail.verdict"
  | "gap.analysis"
  | "report.generated"
  | "report.blocked"
  | "report.cancelled"
  | "policy.reloaded";

export type AuditEvent = {
  type: AuditEventType;
  missionId: string | null;
  ts: string;
  data: Record<string, unknown>;
};

/**
 * Audit sink contract: fire-and-forget. A sink may be sync or async; callers
 * never await it on the request path.
 */
export interface AuditSink {
  record(event: AuditEvent): void | Promise<void>;
}

export class MemoryAuditSink implements AuditSink {
  readonly events: AuditEvent[] = [];

  record(event: AuditEvent): void {
    this.events.push(event);
  }

  ofType(type: AuditEventType): AuditEvent[] {
    return this.events.filter((event) => event.type === type);
  }
}

export class PinoAuditSink implements AuditSink {
  constructor(private readonly log: EngineLogger) {}

  record(event: AuditEvent): void {
    this.log.info({ audit: true, ...event }, `audit.${event.type}`);
  }
}

/**
 * Records without blocking the caller. Sink failures are logged, never thrown.
 */
export function emitAudit(
  sink: AuditSink,
  log: EngineLogger,
  type: AuditEventType,
  missionId: string | null,
  data: Record<string, unknown>
): void {
  const event: AuditEvent = { type, missionId, ts: new Date().toISOString(), data };
  try {
    const pending = sink.record(event);
    if (pending instanceof Promise) {
      pending.catch((error: unknown) => {
        log.error({ type, missionId, error: String(error) }, "audit.record_failed");
      });
    }
  } catch (error) {
    log.error({ type, missionId, error: String(error) }, "audit.record_failed");
  }
}
