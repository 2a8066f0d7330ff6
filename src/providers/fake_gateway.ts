import type { Gateway, GatewayCallOptions } from "./gateway";

function sectionTitle(prompt: string): string {
  const match = /^Section: (.+)$/m.exec(prompt);
  return match ? match[1].trim() : "Untitled";
}

/**
 * Deterministic offline gateway. Echoes the section it was asked for so
 * reports stay reproducible without a model behind them.
 */
export class FakeGateway implements Gateway {
  readonly name = "fake";

  async complete(prompt: string, options: GatewayCallOptions): Promise<string> {
    options.signal?.throwIfAborted();
    return `[fake] ${sectionTitle(prompt)}: drafted from ${prompt.length} chars of mission context.`;
  }
}
