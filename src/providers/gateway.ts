import type { AppEnv } from "../config/env";
import type { EngineLogger } from "../logger";
import { FakeGateway } from "./fake_gateway";
import { OpenAIGateway } from "./openai_gateway";

export type GatewayCallOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
};

/**
 * Generative text backend. Implementations must honour `signal`; the caller
 * enforces `timeoutMs` and treats any rejection as a degraded section.
 */
export interface Gateway {
  readonly name: string;
  complete(prompt: string, options: GatewayCallOptions): Promise<string>;
}

export function selectGateway(env: AppEnv, log: EngineLogger): Gateway {
  if (env.GATEWAY_PROVIDER === "openai" && env.OPENAI_API_KEY) {
    return new OpenAIGateway({
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      baseUrl: env.OPENAI_BASE_URL,
      log,
    });
  }
  return new FakeGateway();
}
