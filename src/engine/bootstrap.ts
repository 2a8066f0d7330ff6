import type { AppEnv } from "../config/env";
import { PinoAuditSink } from "../audit/audit_sink";
import type { EngineLogger } from "../logger";
import { PolicyRegistryHandle, filePolicySource } from "../policy/registry_handle";
import {
  FixtureDatasetProfileProvider,
  HttpDatasetProfileProvider,
  type DatasetProfileProvider,
} from "../providers/dataset_profile_provider";
import { selectGateway } from "../providers/gateway";
import { FixtureKgSnapshotProvider, HttpKgSnapshotProvider, type KgSnapshotProvider } from "../providers/kg_provider";
import { FixtureMissionDirectory, loadMissionFixtures } from "../store/mission_directory";
import { MemoryResultStore, type ResultStore } from "../store/result_store";
import { SqliteResultStore } from "../store/sqlite_result_store";
import { IntelEngine } from "./intel_engine";

export type EngineRuntime = {
  engine: IntelEngine;
  close: () => void;
};

/**
 * Wires the engine from environment settings. Policy and mission fixtures
 * are read synchronously; a bad policy file stops startup.
 */
export function buildEngine(env: AppEnv, log: EngineLogger): EngineRuntime {
  const policy = new PolicyRegistryHandle(filePolicySource(env.POLICY_CONFIG_PATH), log);
  const fixtures = loadMissionFixtures(env.MISSIONS_PATH);

  const kg: KgSnapshotProvider =
    env.KG_PROVIDER === "http" && env.KG_BASE_URL
      ? new HttpKgSnapshotProvider(env.KG_BASE_URL)
      : new FixtureKgSnapshotProvider(fixtures.kgSnapshots);
  const profiles: DatasetProfileProvider =
    env.PROFILE_PROVIDER === "http" && env.PROFILE_BASE_URL
      ? new HttpDatasetProfileProvider(env.PROFILE_BASE_URL)
      : new FixtureDatasetProfileProvider(fixtures.datasetProfiles);

  let sqlite: SqliteResultStore | null = null;
  let store: ResultStore;
  if (env.RESULT_STORE === "sqlite") {
    sqlite = new SqliteResultStore(env.RESULT_DB_PATH, env.RESULT_TTL_SECONDS);
    store = sqlite;
  } else {
    store = new MemoryResultStore(env.RESULT_TTL_SECONDS);
  }

  const gateway = selectGateway(env, log);
  log.info(
    {
      gateway: gateway.name,
      kgProvider: env.KG_PROVIDER,
      profileProvider: env.PROFILE_PROVIDER,
      resultStore: env.RESULT_STORE,
      missions: fixtures.missions.length,
    },
    "engine.configured"
  );

  const engine = new IntelEngine({
    policy,
    missions: new FixtureMissionDirectory(fixtures.missions),
    kg,
    profiles,
    gateway,
    store,
    audit: new PinoAuditSink(log),
    log,
    limits: {
      gatewayTimeoutMs: env.GATEWAY_TIMEOUT_MS,
      upstreamTimeoutMs: env.UPSTREAM_TIMEOUT_MS,
      maxConcurrency: env.REPORT_MAX_CONCURRENCY,
    },
  });

  return {
    engine,
    close: () => sqlite?.close(),
  };
}
