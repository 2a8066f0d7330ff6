import type { Authority, Template } from "../contracts/policy_config";
import type { DatasetProfile, KgSnapshot, Mission } from "../contracts/mission";
import {
  GapAnalysisResultSchema,
  type ConflictAnnotation,
  type GapAnalysisMode,
  type GapAnalysisResult,
  type GapFinding,
  type GapSource,
} from "../contracts/gap_finding";
import { emitAudit, type AuditSink } from "../audit/audit_sink";
import { TemplateNotFoundError, UpstreamUnavailableError, errorMessage } from "../errors";
import type { EngineLogger } from "../logger";
import type { PolicyRegistry } from "../policy/policy_registry";
import { callUpstream } from "../providers/upstream_call";
import type { DatasetProfileProvider } from "../providers/dataset_profile_provider";
import type { Gateway } from "../providers/gateway";
import { resolveKgNamespace, type KgSnapshotProvider } from "../providers/kg_provider";
import type { ResultStore } from "../store/result_store";
import {
  KgEntityIndex,
  compareFindings,
  detectConflicts,
  detectEntitySupportGaps,
  detectMissingIntLanes,
  detectQualityGaps,
  detectTimeWindowGaps,
  expectedIntLanes,
  rankPriorities,
} from "./gap_rules";

export type CollectedSources = {
  kg: KgSnapshot | null;
  profiles: DatasetProfile[] | null;
  unavailable: GapSource[];
};

export type GapAnalysisRequest = {
  registry: PolicyRegistry;
  mission: Mission;
  templateId?: string | null;
  mode?: GapAnalysisMode;
  forceRegen?: boolean;
  signal?: AbortSignal;
  // Pre-fetched sources; skips the upstream fetch when given.
  sources?: CollectedSources;
};

export type GapAnalysisRun = {
  result: GapAnalysisResult;
  cached: boolean;
};

export type GapAnalysisDeps = {
  kg: KgSnapshotProvider;
  profiles: DatasetProfileProvider;
  store: ResultStore;
  audit: AuditSink;
  log: EngineLogger;
  gateway?: Gateway | null;
  upstreamTimeoutMs: number;
  gatewayTimeoutMs: number;
  now?: () => Date;
};

export function gapAnalysisKey(mode: GapAnalysisMode, templateId: string | null): string {
  return `gap:${mode}:${templateId ?? "generic"}`;
}

/**
 * Pure detector pass over already-collected sources. Detectors whose source
 * is missing are skipped.
 */
export function computeFindings(args: {
  registry: PolicyRegistry;
  mission: Mission;
  authority: Authority;
  template: Template | null;
  mode: GapAnalysisMode;
  kg: KgSnapshot | null;
  profiles: DatasetProfile[] | null;
}): GapFinding[] {
  const { registry, mission, authority, kg } = args;
  const settings = registry.analysis;
  const findings: GapFinding[] = [
    ...detectMissingIntLanes({
      expected: expectedIntLanes(authority, args.template, settings),
      present: mission.intLanesPresent,
      authority,
      laneLabel: (code) => registry.laneLabel(code),
    }),
  ];

  if (kg) {
    const index = new KgEntityIndex(kg);
    findings.push(
      ...detectTimeWindowGaps({
        window: mission.observationWindow,
        events: kg.events,
        bucketHours: mission.observationWindow?.bucketHours ?? settings.timeBucketHours,
      }),
      ...detectEntitySupportGaps({ mission, index }),
      ...detectConflicts({ index, tolerance: settings.numericTolerance })
    );
  }

  if (args.mode !== "kg" && args.profiles) {
    findings.push(...detectQualityGaps({ profiles: args.profiles, threshold: settings.qualityThreshold }));
  }

  return findings.sort(compareFindings);
}

export class GapAnalysisEngine {
  private readonly now: () => Date;

  constructor(private readonly deps: GapAnalysisDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Fetches the KG snapshot and dataset profiles concurrently. A failed or
   * slow source is reported as unavailable; this never throws for upstream
   * failures.
   */
  async collectSources(args: {
    mission: Mission;
    mode: GapAnalysisMode;
    signal?: AbortSignal;
  }): Promise<CollectedSources> {
    const { mission, signal } = args;
    const namespace = resolveKgNamespace(mission);
    const timeoutMs = this.deps.upstreamTimeoutMs;

    const [kg, profiles] = await Promise.allSettled([
      callUpstream({
        source: "kg",
        timeoutMs,
        signal,
        run: (child) => this.deps.kg.getSnapshot({ missionId: mission.id, namespace, signal: child }),
      }),
      args.mode === "kg"
        ? Promise.resolve(null)
        : callUpstream({
            source: "dataset_profiles",
            timeoutMs,
            signal,
            run: (child) => this.deps.profiles.getProfiles({ missionId: mission.id, signal: child }),
          }),
    ]);

    const unavailable: GapSource[] = [];
    const note = (source: GapSource, reason: unknown) => {
      unavailable.push(source);
      this.deps.log.warn(
        {
          missionId: mission.id,
          source,
          reason: reason instanceof UpstreamUnavailableError ? reason.reason : "error",
          statusCode: reason instanceof UpstreamUnavailableError ? reason.statusCode : undefined,
          error: errorMessage(reason),
        },
        "gap.source_unavailable"
      );
    };

    if (kg.status === "rejected") note("kg", kg.reason);
    if (profiles.status === "rejected") note("dataset_profiles", profiles.reason);

    return {
      kg: kg.status === "fulfilled" ? kg.value : null,
      profiles: profiles.status === "fulfilled" ? profiles.value : null,
      unavailable,
    };
  }

  async run(request: GapAnalysisRequest): Promise<GapAnalysisRun> {
    const { registry, mission } = request;
    const mode = request.mode ?? "rules";
    const templateId = request.templateId ?? null;
    const key = gapAnalysisKey(mode, templateId);

    const authority = registry.resolveAuthority(mission.authorityId);
    let template: Template | null = null;
    if (templateId) {
      template = registry.getTemplate(templateId);
      if (!template) throw new TemplateNotFoundError(templateId);
    }

    if (!request.forceRegen) {
      const cached = await this.readCached(mission.id, key, registry.version);
      if (cached) {
        this.deps.log.debug({ missionId: mission.id, key }, "gap.cache_hit");
        return { result: cached, cached: true };
      }
    }

    const sources = request.sources ?? (await this.collectSources({ mission, mode, signal: request.signal }));
    request.signal?.throwIfAborted();

    const findings = computeFindings({
      registry,
      mission,
      authority,
      template,
      mode,
      kg: sources.kg,
      profiles: mode === "kg" ? null : sources.profiles,
    });

    const unavailableSources = sources.unavailable.filter((source) => mode !== "kg" || source === "kg");
    let annotations: ConflictAnnotation[] = [];
    if (mode === "rules_advisory") {
      const advisory = await this.annotateConflicts(mission, findings, request.signal);
      if (advisory) annotations = advisory;
      else unavailableSources.push("gateway");
    }

    const result: GapAnalysisResult = {
      missionId: mission.id,
      mode,
      templateId,
      findings,
      priorities: rankPriorities({ findings, kg: sources.kg, limit: registry.analysis.priorityLimit }),
      partial: unavailableSources.length > 0,
      unavailableSources,
      laneWarnings: registry.laneAuthorizationWarnings(authority, mission.intLanesPresent),
      annotations,
      registryVersion: registry.version,
      generatedAt: this.now().toISOString(),
    };

    if (!result.partial) {
      await this.deps.store.put({ missionId: mission.id, key, registryVersion: registry.version, payload: result });
    }

    this.deps.log.info(
      {
        missionId: mission.id,
        mode,
        templateId,
        findingCount: findings.length,
        partial: result.partial,
        unavailableSources,
      },
      "gap.analysis_completed"
    );
    emitAudit(this.deps.audit, this.deps.log, "gap.analysis", mission.id, {
      key,
      mode,
      findingCount: findings.length,
      highSeverityCount: findings.filter((item) => item.severity === "high").length,
      partial: result.partial,
      unavailableSources,
      registryVersion: registry.version,
    });

    return { result, cached: false };
  }

  private async readCached(missionId: string, key: string, registryVersion: string): Promise<GapAnalysisResult | null> {
    const stored = await this.deps.store.get(missionId, key);
    if (!stored || stored.registryVersion !== registryVersion) return null;
    const parsed = GapAnalysisResultSchema.safeParse(stored.payload);
    if (!parsed.success) {
      this.deps.log.warn({ missionId, key }, "gap.cache_payload_invalid");
      return null;
    }
    return parsed.data;
  }

  /**
   * Advisory explanations for conflicts. Output is informational and never
   * alters the deterministic findings. Resolves to null when the gateway
   * failed, so the run is reported as partial and kept out of the store.
   */
  private async annotateConflicts(
    mission: Mission,
    findings: GapFinding[],
    signal?: AbortSignal
  ): Promise<ConflictAnnotation[] | null> {
    const gateway = this.deps.gateway;
    const conflicts = findings.filter((item) => item.kind === "conflict");
    if (!gateway || conflicts.length === 0) return [];

    const annotations: ConflictAnnotation[] = [];
    try {
      for (const conflict of conflicts) {
        const prompt = [
          "You are assisting an intelligence analyst. Offer one short, plausible explanation for the",
          "source disagreement below. Do not recommend operational actions.",
          "",
          `Conflict: ${conflict.description}`,
        ].join("\n");
        const text = await callUpstream({
          source: "gateway",
          timeoutMs: this.deps.gatewayTimeoutMs,
          signal,
          run: (child) => gateway.complete(prompt, { timeoutMs: this.deps.gatewayTimeoutMs, signal: child }),
        });
        if (text.trim()) annotations.push({ findingId: conflict.id, explanation: text.trim() });
      }
    } catch (error) {
      if (signal?.aborted) throw error;
      this.deps.log.warn(
        {
          missionId: mission.id,
          reason: error instanceof UpstreamUnavailableError ? error.reason : "error",
          statusCode: error instanceof UpstreamUnavailableError ? error.statusCode : undefined,
          error: errorMessage(error),
        },
        "gap.annotation_failed"
      );
      return null;
    }
    return annotations;
  }
}
