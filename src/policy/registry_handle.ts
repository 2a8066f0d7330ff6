import type { EngineLogger } from "../logger";
import { silentLogger } from "../logger";
import { loadPolicyRegistry, type PolicyRegistry } from "./policy_registry";

export type PolicySource = () => PolicyRegistry;

export function filePolicySource(path: string): PolicySource {
  return () => loadPolicyRegistry(path);
}

/**
 * Holds the active PolicyRegistry. Readers take `current()` once per request;
 * reload builds a complete replacement before swapping the reference, so a
 * reader never sees a half-applied policy.
 */
export class PolicyRegistryHandle {
  private active: PolicyRegistry;
  private readonly source: PolicySource;
  private readonly log: EngineLogger;

  constructor(source: PolicySource, log: EngineLogger = silentLogger) {
    this.source = source;
    this.log = log;
    this.active = source();
    this.log.info({ version: this.active.version }, "policy.loaded");
  }

  current(): PolicyRegistry {
    return this.active;
  }

  /**
   * On failure the previous registry stays active and the error propagates.
   */
  reload(): PolicyRegistry {
    const previous = this.active.version;
    let next: PolicyRegistry;
    try {
      next = this.source();
    } catch (error) {
      this.log.error({ previousVersion: previous, error: String(error) }, "policy.reload_failed");
      throw error;
    }
    this.active = next;
    this.log.info({ previousVersion: previous, version: next.version }, "policy.reloaded");
    return next;
  }
}
