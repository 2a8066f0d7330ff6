import type { Template } from "../contracts/policy_config";
import type { Mission } from "../contracts/mission";
import type { GapAnalysisMode } from "../contracts/gap_finding";
import type { ReportOutcome } from "../contracts/report";
import type { Verdict } from "../contracts/verdict";
import { emitAudit, type AuditSink } from "../audit/audit_sink";
import { ReportOrchestrator } from "../control-plane/report_orchestrator";
import { MissionNotFoundError } from "../errors";
import { GapAnalysisEngine, type GapAnalysisRun } from "../gaps/gap_analysis";
import { GuardrailClassifier } from "../gates/guardrail_classifier";
import type { EngineLogger } from "../logger";
import type { PolicyRegistryHandle } from "../policy/registry_handle";
import type { DatasetProfileProvider } from "../providers/dataset_profile_provider";
import type { Gateway } from "../providers/gateway";
import type { KgSnapshotProvider } from "../providers/kg_provider";
import type { MissionDirectory } from "../store/mission_directory";
import type { ResultStore } from "../store/result_store";
import { selectTemplates } from "../templates/template_selector";

export type EngineLimits = {
  gatewayTimeoutMs: number;
  upstreamTimeoutMs: number;
  maxConcurrency: number;
};

export const DEFAULT_LIMITS: EngineLimits = {
  gatewayTimeoutMs: 20_000,
  upstreamTimeoutMs: 5_000,
  maxConcurrency: 4,
};

export type IntelEngineDeps = {
  policy: PolicyRegistryHandle;
  missions: MissionDirectory;
  kg: KgSnapshotProvider;
  profiles: DatasetProfileProvider;
  gateway: Gateway;
  store: ResultStore;
  audit: AuditSink;
  log: EngineLogger;
  limits?: Partial<EngineLimits>;
  now?: () => Date;
};

export type GapAnalysisOptions = {
  forceRegen?: boolean;
  mode?: GapAnalysisMode;
  templateId?: string | null;
  signal?: AbortSignal;
};

export type ReportOptions = {
  focus?: string;
  sectionNotes?: Record<string, string>;
  forceRegen?: boolean;
  signal?: AbortSignal;
};

/**
 * Entry point for the four mission operations. Each call pins the policy
 * registry that is active when it starts; a concurrent reload does not
 * affect an in-flight request.
 */
export class IntelEngine {
  readonly classifier: GuardrailClassifier;
  readonly gaps: GapAnalysisEngine;
  readonly reports: ReportOrchestrator;
  readonly limits: EngineLimits;

  constructor(private readonly deps: IntelEngineDeps) {
    this.limits = { ...DEFAULT_LIMITS, ...deps.limits };
    this.classifier = new GuardrailClassifier(deps.audit, deps.log);
    this.gaps = new GapAnalysisEngine({
      kg: deps.kg,
      profiles: deps.profiles,
      store: deps.store,
      audit: deps.audit,
      log: deps.log,
      gateway: deps.gateway,
      upstreamTimeoutMs: this.limits.upstreamTimeoutMs,
      gatewayTimeoutMs: this.limits.gatewayTimeoutMs,
      now: deps.now,
    });
    this.reports = new ReportOrchestrator({
      gaps: this.gaps,
      classifier: this.classifier,
      gateway: deps.gateway,
      store: deps.store,
      audit: deps.audit,
      log: deps.log,
      gatewayTimeoutMs: this.limits.gatewayTimeoutMs,
      maxConcurrency: this.limits.maxConcurrency,
      now: deps.now,
    });
  }

  get policyVersion(): string {
    return this.deps.policy.current().version;
  }

  private async mission(missionId: string): Promise<Mission> {
    const mission = await this.deps.missions.getMission(missionId);
    if (!mission) throw new MissionNotFoundError(missionId);
    return mission;
  }

  async classifyRequest(text: unknown, missionId: string): Promise<Verdict> {
    const mission = await this.mission(missionId);
    const { verdict } = this.classifier.classify({
      registry: this.deps.policy.current(),
      requestText: text,
      authorityId: mission.authorityId,
      missionId: mission.id,
    });
    return verdict;
  }

  /** Throws PolicyConfigError when the mission's authority is unknown. */
  async listTemplates(missionId: string): Promise<Template[]> {
    const mission = await this.mission(missionId);
    const registry = this.deps.policy.current();
    const authority = registry.resolveAuthority(mission.authorityId);
    return selectTemplates(registry, authority.id, mission.intLanesPresent);
  }

  async runGapAnalysis(missionId: string, options: GapAnalysisOptions = {}): Promise<GapAnalysisRun> {
    const mission = await this.mission(missionId);
    return this.gaps.run({
      registry: this.deps.policy.current(),
      mission,
      templateId: options.templateId ?? null,
      mode: options.mode,
      forceRegen: options.forceRegen,
      signal: options.signal,
    });
  }

  async generateReport(missionId: string, templateId: string, options: ReportOptions = {}): Promise<ReportOutcome> {
    const mission = await this.mission(missionId);
    return this.reports.generate({
      registry: this.deps.policy.current(),
      mission,
      templateId,
      focus: options.focus,
      sectionNotes: options.sectionNotes,
      forceRegen: options.forceRegen,
      signal: options.signal,
    });
  }

  reloadPolicy(): { version: string; previousVersion: string } {
    const previousVersion = this.deps.policy.current().version;
    const next = this.deps.policy.reload();
    emitAudit(this.deps.audit, this.deps.log, "policy.reloaded", null, {
      previousVersion,
      version: next.version,
    });
    return { version: next.version, previousVersion };
  }
}
