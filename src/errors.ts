export type PolicyConfigErrorCode =
  | "schema_invalid"
  | "duplicate_id"
  | "unknown_reference"
  | "contradictory_category"
  | "unknown_authority"
  | "source_unreadable";

export class PolicyConfigError extends Error {
  public readonly code: PolicyConfigErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(code: PolicyConfigErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "PolicyConfigError";
    this.code = code;
    this.details = details;
  }

  toJSON() {
    return {
      error: "policy_config_error",
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export type UpstreamSource = "kg" | "dataset_profiles" | "gateway" | "missions";

export class UpstreamUnavailableError extends Error {
  public readonly source: UpstreamSource;
  public readonly reason: "timeout" | "error" | "aborted";
  public readonly statusCode: number | undefined;
  public readonly attempts: number;

  constructor(
    source: UpstreamSource,
    reason: "timeout" | "error" | "aborted",
    message: string,
    details: { statusCode?: number; attempts?: number } = {}
  ) {
    super(message);
    this.name = "UpstreamUnavailableError";
    this.source = source;
    this.reason = reason;
    this.statusCode = details.statusCode;
    this.attempts = details.attempts ?? 1;
  }
}

/** Rate limiting and server-side failures may clear on another attempt. */
export function isRetryableStatus(statusCode: number): boolean {
  return statusCode === 429 || statusCode >= 500;
}

/**
 * An upstream answered, but with a failure. callUpstream retries it when
 * `retryable` is set.
 */
export class UpstreamResponseError extends Error {
  public readonly statusCode: number | undefined;
  public readonly retryable: boolean;

  constructor(message: string, args: { statusCode?: number; retryable?: boolean } = {}) {
    super(message);
    this.name = "UpstreamResponseError";
    this.statusCode = args.statusCode;
    this.retryable = args.retryable ?? (args.statusCode !== undefined && isRetryableStatus(args.statusCode));
  }
}

export class GatewayError extends UpstreamResponseError {
  constructor(message: string, args: { statusCode?: number; retryable?: boolean } = {}) {
    super(message, { statusCode: args.statusCode ?? 502, retryable: args.retryable ?? true });
    this.name = "GatewayError";
  }
}

export class MissionNotFoundError extends Error {
  public readonly missionId: string;

  constructor(missionId: string) {
    super(`Mission not found: ${missionId}`);
    this.name = "MissionNotFoundError";
    this.missionId = missionId;
  }

  toJSON() {
    return { error: "mission_not_found", missionId: this.missionId };
  }
}

export class TemplateNotFoundError extends Error {
  public readonly templateId: string;

  constructor(templateId: string) {
    super(`Template not found: ${templateId}`);
    this.name = "TemplateNotFoundError";
    this.templateId = templateId;
  }

  toJSON() {
    return { error: "template_not_found", templateId: this.templateId };
  }
}

/**
 * Raised when report synthesis is cancelled. No partial product is returned.
 */
export class ReportCancelledError extends Error {
  public readonly missionId: string;
  public readonly templateId: string;

  constructor(missionId: string, templateId: string) {
    super(`Report synthesis cancelled for mission ${missionId} (${templateId})`);
    this.name = "ReportCancelledError";
    this.missionId = missionId;
    this.templateId = templateId;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
