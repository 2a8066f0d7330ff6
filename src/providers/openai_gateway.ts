import { z } from "zod";

import { GatewayError, isRetryableStatus } from "../errors";
import type { EngineLogger } from "../logger";
import type { Gateway, GatewayCallOptions } from "./gateway";

const ErrorBody = z
  .object({
    error: z
      .object({
        type: z.string().optional(),
        code: z.string().nullable().optional(),
        message: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const ResponsesBody = z
  .object({
    output: z
      .array(
        z
          .object({
            content: z.array(z.object({ text: z.string().optional() }).passthrough()).optional(),
          })
          .passthrough()
      )
      .optional(),
    output_text: z.string().optional(),
  })
  .passthrough();

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export function extractOutputText(body: unknown): string | null {
  const parsed = ResponsesBody.safeParse(body);
  if (!parsed.success) return null;
  for (const item of parsed.data.output ?? []) {
    for (const part of item.content ?? []) {
      if (typeof part.text === "string" && part.text.trim()) return part.text;
    }
  }
  return parsed.data.output_text ?? null;
}

/**
 * OpenAI Responses API over fetch. Plain-text output; no response storage.
 */
export class OpenAIGateway implements Gateway {
  readonly name = "openai";
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly log?: EngineLogger;
  private readonly fetchImpl: typeof fetch;

  constructor(args: {
    apiKey: string;
    model: string;
    baseUrl?: string;
    log?: EngineLogger;
    fetchImpl?: typeof fetch;
  }) {
    this.apiKey = args.apiKey;
    this.model = args.model;
    this.baseUrl = (args.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
    this.log = args.log;
    this.fetchImpl = args.fetchImpl ?? fetch;
  }

  async complete(prompt: string, options: GatewayCallOptions): Promise<string> {
    const res = await this.fetchImpl(`${this.baseUrl}/responses`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        store: false,
        stream: false,
        input: prompt,
      }),
      signal: options.signal,
    });

    if (!res.ok) {
      const text = await res.text();
      const parsed = ErrorBody.safeParse(parseJson(text));
      const error = parsed.success ? parsed.data.error : undefined;
      const errorType = error?.type;
      const errorCode = error?.code ?? undefined;
      const bodySnippet = (error?.message ?? text).slice(0, 500);
      const statusCode = res.status;
      this.log?.error(
        { statusCode, requestId: res.headers.get("x-request-id") ?? undefined, bodySnippet, errorType, errorCode },
        "openai.request_failed"
      );
      throw new GatewayError(`OpenAI error ${statusCode}: ${bodySnippet}`, {
        statusCode,
        retryable: errorType !== "invalid_request_error" && isRetryableStatus(statusCode),
      });
    }

    const content = extractOutputText(await res.json());
    if (!content) {
      throw new GatewayError("OpenAI response missing content", { statusCode: 502, retryable: true });
    }
    return content;
  }
}
