import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { MemoryAuditSink } from "../src/audit/audit_sink";
import { PolicyConfigSchema, type PolicyConfig } from "../src/contracts/policy_config";
import {
  KgSnapshotSchema,
  MissionSchema,
  type DatasetProfileInput,
  type KgSnapshot,
  type KgSnapshotInput,
  type Mission,
  type MissionInput,
} from "../src/contracts/mission";
import type { GapFinding } from "../src/contracts/gap_finding";
import { IntelEngine, type EngineLimits } from "../src/engine/intel_engine";
import { silentLogger } from "../src/logger";
import { PolicyRegistry, loadPolicyRegistry } from "../src/policy/policy_registry";
import { PolicyRegistryHandle, type PolicySource } from "../src/policy/registry_handle";
import {
  FixtureDatasetProfileProvider,
  type DatasetProfileProvider,
} from "../src/providers/dataset_profile_provider";
import { FakeGateway } from "../src/providers/fake_gateway";
import type { Gateway, GatewayCallOptions } from "../src/providers/gateway";
import { FixtureKgSnapshotProvider, type KgSnapshotProvider } from "../src/providers/kg_provider";
import { FixtureMissionDirectory } from "../src/store/mission_directory";
import { MemoryResultStore } from "../src/store/result_store";

export const POLICY_PATH = fileURLToPath(new URL("../config/policy.json", import.meta.url));
export const MISSIONS_PATH = fileURLToPath(new URL("../config/missions.json", import.meta.url));

export const FIXED_NOW = new Date("2026-04-01T12:00:00.000Z");

export function loadTestRegistry(): PolicyRegistry {
  return loadPolicyRegistry(POLICY_PATH);
}

/** Fresh, mutable copy of the bundled policy for negative-path tests. */
export function readPolicyConfig(): PolicyConfig {
  const raw: unknown = JSON.parse(readFileSync(POLICY_PATH, "utf-8"));
  return PolicyConfigSchema.parse(raw);
}

export function makeMission(overrides: Partial<MissionInput> = {}): Mission {
  return MissionSchema.parse({
    id: "m-1",
    name: "Harbor Watch",
    authorityId: "TITLE_10_MIL",
    intLanesPresent: ["SIGINT", "GEOINT"],
    ...overrides,
  });
}

export function makeSnapshot(overrides: Partial<KgSnapshotInput> = {}): KgSnapshot {
  return KgSnapshotSchema.parse({ namespace: "mission-m-1", ...overrides });
}

export function makeFinding(overrides: Partial<GapFinding> & Pick<GapFinding, "kind" | "ref">): GapFinding {
  return {
    id: `${overrides.kind}:${overrides.ref}`,
    severity: "med",
    description: "test finding",
    recommendedAction: "review",
    entityRefs: [],
    eventRefs: [],
    ...overrides,
  };
}

/**
 * Gateway stand-in driven by a per-call handler. Records every prompt.
 */
export class ScriptedGateway implements Gateway {
  readonly name = "scripted";
  readonly prompts: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly handler: (prompt: string, options: GatewayCallOptions) => Promise<string>) {}

  async complete(prompt: string, options: GatewayCallOptions): Promise<string> {
    this.prompts.push(prompt);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await this.handler(prompt, options);
    } finally {
      this.inFlight -= 1;
    }
  }
}

/** Resolves never; rejects once the signal aborts. */
export function waitForAbort(signal?: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal?.aborted) {
      reject(new Error("aborted"));
      return;
    }
    signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type TestEngineOptions = {
  missions?: MissionInput[];
  snapshots?: Record<string, KgSnapshotInput>;
  profiles?: Record<string, DatasetProfileInput[]>;
  kg?: KgSnapshotProvider;
  profileProvider?: DatasetProfileProvider;
  gateway?: Gateway;
  registry?: PolicyRegistry;
  // Overrides `registry`; called again on every reload.
  policySource?: PolicySource;
  limits?: Partial<EngineLimits>;
};

export function buildTestEngine(options: TestEngineOptions = {}) {
  const fixed = options.registry ?? loadTestRegistry();
  const policy = new PolicyRegistryHandle(options.policySource ?? (() => fixed), silentLogger);
  const registry = policy.current();
  const store = new MemoryResultStore(0, () => FIXED_NOW);
  const audit = new MemoryAuditSink();
  const gateway = options.gateway ?? new FakeGateway();
  const engine = new IntelEngine({
    policy,
    missions: new FixtureMissionDirectory(options.missions ?? []),
    kg: options.kg ?? new FixtureKgSnapshotProvider(options.snapshots ?? {}),
    profiles: options.profileProvider ?? new FixtureDatasetProfileProvider(options.profiles ?? {}),
    gateway,
    store,
    audit,
    log: silentLogger,
    limits: { gatewayTimeoutMs: 1_000, upstreamTimeoutMs: 1_000, maxConcurrency: 4, ...options.limits },
    now: () => FIXED_NOW,
  });
  return { engine, store, audit, policy, registry };
}
