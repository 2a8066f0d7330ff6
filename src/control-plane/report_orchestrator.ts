import type { Authority, SectionSpec, Template } from "../contracts/policy_config";
import type { Mission } from "../contracts/mission";
import {
  IntelReportSchema,
  type GuardrailCheck,
  type IntelReport,
  type RenderedSection,
  type ReportOutcome,
  type ReportStage,
} from "../contracts/report";
import { TEMPLATE_INELIGIBLE_CATEGORY, type BlockVerdict } from "../contracts/verdict";
import { emitAudit, type AuditSink } from "../audit/audit_sink";
import {
  PolicyConfigError,
  ReportCancelledError,
  TemplateNotFoundError,
  UpstreamUnavailableError,
  errorMessage,
} from "../errors";
import { gapAnalysisKey, type GapAnalysisEngine } from "../gaps/gap_analysis";
import { policyConfigVerdict, type GuardrailClassifier } from "../gates/guardrail_classifier";
import type { EngineLogger } from "../logger";
import type { PolicyRegistry } from "../policy/policy_registry";
import type { Gateway } from "../providers/gateway";
import { callUpstream } from "../providers/upstream_call";
import type { ResultStore } from "../store/result_store";
import { describeIneligibility, explainTemplateEligibility } from "../templates/template_selector";
import { mapBounded } from "./bounded_fanout";
import {
  buildSectionPromptPack,
  promptPackLogShape,
  sliceContext,
  sliceHasEvidence,
  toSinglePromptText,
  type PolicyPreamble,
  type ReportContext,
} from "./prompt_pack";
import { sanitizeReportText } from "./sanitize_report";

export const NO_EVIDENCE_TEXT = "None available based on current evidence.";

export type ReportRequest = {
  registry: PolicyRegistry;
  mission: Mission;
  templateId: string;
  focus?: string;
  sectionNotes?: Record<string, string>;
  forceRegen?: boolean;
  signal?: AbortSignal;
};

export type ReportOrchestratorDeps = {
  gaps: GapAnalysisEngine;
  classifier: GuardrailClassifier;
  gateway: Gateway;
  store: ResultStore;
  audit: AuditSink;
  log: EngineLogger;
  gatewayTimeoutMs: number;
  maxConcurrency: number;
  now?: () => Date;
};

export function reportKey(templateId: string): string {
  return `report:${templateId}`;
}

export function renderReportMarkdown(args: {
  template: Template;
  missionName: string;
  disclaimer: string;
  sections: RenderedSection[];
}): string {
  const lines: string[] = [];
  lines.push(`# ${args.template.name}`);
  lines.push("");
  lines.push(`Mission: ${args.missionName}`);
  lines.push("");
  lines.push(`> ${args.disclaimer}`);
  for (const section of args.sections) {
    lines.push("");
    lines.push(`## ${section.title}`);
    lines.push("");
    lines.push(section.text);
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Report synthesis: SelectTemplate -> BuildContext -> RenderSection -> Assemble.
 *
 * Guardrails for all injected text run before any gateway call. Section
 * failures degrade to the template's fallback text; only cancellation
 * aborts the run.
 */
export class ReportOrchestrator {
  private readonly now: () => Date;

  constructor(private readonly deps: ReportOrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async generate(request: ReportRequest): Promise<ReportOutcome> {
    const { mission, templateId, signal } = request;
    try {
      if (signal?.aborted) throw new ReportCancelledError(mission.id, templateId);
      return await this.run(request);
    } catch (error) {
      if (signal?.aborted) {
        this.deps.log.info({ missionId: mission.id, templateId }, "report.cancelled");
        emitAudit(this.deps.audit, this.deps.log, "report.cancelled", mission.id, { templateId });
        throw error instanceof ReportCancelledError ? error : new ReportCancelledError(mission.id, templateId);
      }
      throw error;
    }
  }

  private blocked(
    request: ReportRequest,
    stage: ReportStage,
    verdict: BlockVerdict,
    sectionId?: string
  ): ReportOutcome {
    this.deps.log.info(
      {
        missionId: request.mission.id,
        templateId: request.templateId,
        stage,
        sectionId,
        actionCategory: verdict.actionCategory,
        ruleId: verdict.ruleId,
      },
      "report.blocked"
    );
    emitAudit(this.deps.audit, this.deps.log, "report.blocked", request.mission.id, {
      templateId: request.templateId,
      stage,
      sectionId: sectionId ?? null,
      actionCategory: verdict.actionCategory,
      ruleId: verdict.ruleId,
      registryVersion: request.registry.version,
    });
    return sectionId === undefined
      ? { status: "blocked", stage, verdict }
      : { status: "blocked", stage, verdict, sectionId };
  }

  private async run(request: ReportRequest): Promise<ReportOutcome> {
    const { registry, mission, templateId, signal } = request;

    // SelectTemplate
    let authority: Authority;
    try {
      authority = registry.resolveAuthority(mission.authorityId);
    } catch (error) {
      if (error instanceof PolicyConfigError) {
        return this.blocked(request, "select_template", policyConfigVerdict(mission.authorityId, error));
      }
      throw error;
    }

    const template = registry.getTemplate(templateId);
    if (!template) throw new TemplateNotFoundError(templateId);

    const eligibility = explainTemplateEligibility(template, authority.id, mission.intLanesPresent);
    if (!eligibility.eligible) {
      return this.blocked(request, "select_template", {
        kind: "block",
        actionCategory: TEMPLATE_INELIGIBLE_CATEGORY,
        remediation: describeIneligibility(registry, template, authority.label, eligibility),
        ruleId: null,
        matchedSpan: null,
        missionAuthorityId: authority.id,
        correctAuthorityId: null,
      });
    }

    const checks: GuardrailCheck[] = [];
    const focus = request.focus?.trim() ? request.focus : undefined;
    if (focus !== undefined) {
      const { verdict } = this.deps.classifier.classify({
        registry,
        requestText: focus,
        authorityId: authority.id,
        missionId: mission.id,
        scope: "request",
      });
      checks.push({ scope: "request", verdict: verdict.kind, degraded: verdict.kind === "allow" && verdict.degraded });
      if (verdict.kind === "block") return this.blocked(request, "select_template", verdict);
    }

    // Injected section text is screened in template order before any generation.
    const notes = request.sectionNotes ?? {};
    const declared = new Set(template.sections.map((section) => section.id));
    const stray = Object.keys(notes).filter((id) => !declared.has(id));
    if (stray.length > 0) {
      this.deps.log.warn({ missionId: mission.id, templateId, sectionIds: stray }, "report.unknown_section_notes");
    }
    for (const section of template.sections) {
      const note = notes[section.id];
      if (note === undefined) continue;
      const { verdict } = this.deps.classifier.classify({
        registry,
        requestText: note,
        authorityId: authority.id,
        missionId: mission.id,
        scope: section.id,
      });
      checks.push({ scope: section.id, verdict: verdict.kind, degraded: verdict.kind === "allow" && verdict.degraded });
      if (verdict.kind === "block") return this.blocked(request, "render_section", verdict, section.id);
    }

    const injected = focus !== undefined || Object.keys(notes).length > 0;
    const key = reportKey(template.id);
    if (!request.forceRegen && !injected) {
      const cached = await this.readCached(mission.id, key, registry.version);
      if (cached) {
        this.deps.log.debug({ missionId: mission.id, key }, "report.cache_hit");
        return { status: "completed", report: cached, cached: true };
      }
    }

    signal?.throwIfAborted();

    // BuildContext
    const sources = await this.deps.gaps.collectSources({ mission, mode: "rules", signal });
    signal?.throwIfAborted();
    const { result: gaps } = await this.deps.gaps.run({
      registry,
      mission,
      templateId: template.id,
      mode: "rules",
      forceRegen: request.forceRegen,
      signal,
      sources,
    });
    signal?.throwIfAborted();

    const context: ReportContext = {
      mission,
      documents: mission.documents.filter((doc) => doc.includeInAnalysis),
      kg: sources.kg,
      profiles: sources.profiles,
      gaps,
    };
    const blockedCategories = registry.effectiveBlockedCategories(authority);
    const preamble: PolicyPreamble = {
      authorityLabel: authority.label,
      disclaimer: authority.disclaimer,
      blockedCategoryLabels: blockedCategories.map((id) => registry.categoryLabel(id)),
    };

    // RenderSection
    const sections = await mapBounded(
      template.sections,
      this.deps.maxConcurrency,
      (section) => this.renderSection({ request, template, section, context, preamble, focus, note: notes[section.id] }),
      signal
    );
    signal?.throwIfAborted();

    // Assemble
    const degradedSections = sections.filter((section) => section.degraded).map((section) => section.id);
    const report: IntelReport = {
      missionId: mission.id,
      templateId: template.id,
      templateName: template.name,
      sections,
      markdown: renderReportMarkdown({
        template,
        missionName: mission.name,
        disclaimer: authority.disclaimer,
        sections,
      }),
      guardrailPosture: {
        authorityId: authority.id,
        authorityLabel: authority.label,
        disclaimer: authority.disclaimer,
        blockedCategories,
        checks,
        classifierDegraded: checks.some((check) => check.degraded),
        registryVersion: registry.version,
      },
      gapSnapshotRef: {
        analysisKey: gapAnalysisKey(gaps.mode, gaps.templateId),
        generatedAt: gaps.generatedAt,
        findingCount: gaps.findings.length,
        highSeverityCount: gaps.findings.filter((item) => item.severity === "high").length,
        partial: gaps.partial,
        unavailableSources: gaps.unavailableSources,
      },
      kgSnapshotRef: sources.kg
        ? {
            namespace: sources.kg.namespace,
            capturedAt: sources.kg.capturedAt,
            entityCount: sources.kg.entities.length,
            eventCount: sources.kg.events.length,
          }
        : null,
      generatedAt: this.now().toISOString(),
      degradedSections,
      partial: gaps.partial || sources.unavailable.length > 0,
    };

    if (!injected && degradedSections.length === 0 && !report.partial) {
      await this.deps.store.put({ missionId: mission.id, key, registryVersion: registry.version, payload: report });
    }

    this.deps.log.info(
      {
        missionId: mission.id,
        templateId: template.id,
        sectionCount: sections.length,
        degradedSections,
        partial: report.partial,
      },
      "report.generated"
    );
    emitAudit(this.deps.audit, this.deps.log, "report.generated", mission.id, {
      templateId: template.id,
      degradedSections,
      partial: report.partial,
      classifierDegraded: report.guardrailPosture.classifierDegraded,
      registryVersion: registry.version,
    });

    return { status: "completed", report, cached: false };
  }

  private async renderSection(args: {
    request: ReportRequest;
    template: Template;
    section: SectionSpec;
    context: ReportContext;
    preamble: PolicyPreamble;
    focus?: string;
    note?: string;
  }): Promise<RenderedSection> {
    const { section, request } = args;
    const base = { id: section.id, title: section.title };
    const slice = sliceContext(args.context, section.dataRequirements);

    if (!sliceHasEvidence(slice, section.dataRequirements)) {
      return { ...base, text: NO_EVIDENCE_TEXT, source: "no_evidence", degraded: false };
    }

    const pack = buildSectionPromptPack({
      preamble: args.preamble,
      mission: request.mission,
      template: args.template,
      section,
      slice,
      focus: args.focus,
      note: args.note,
    });
    this.deps.log.debug({ missionId: request.mission.id, ...promptPackLogShape(pack) }, "report.section_prompt");

    const fallback = (
      degradedReason: "timeout" | "error" | "empty_output",
      upstreamStatus?: number
    ): RenderedSection => ({
      ...base,
      text: section.fallback,
      source: "fallback",
      degraded: true,
      degradedReason,
      ...(upstreamStatus !== undefined ? { upstreamStatus } : {}),
    });

    const timeoutMs = this.deps.gatewayTimeoutMs;
    let raw: string;
    try {
      raw = await callUpstream({
        source: "gateway",
        timeoutMs,
        signal: request.signal,
        run: (child) => this.deps.gateway.complete(toSinglePromptText(pack), { timeoutMs, signal: child }),
      });
    } catch (error) {
      if (request.signal?.aborted) throw error;
      const upstream = error instanceof UpstreamUnavailableError ? error : null;
      const reason = upstream?.reason === "timeout" ? "timeout" : "error";
      this.deps.log.warn(
        {
          missionId: request.mission.id,
          sectionId: section.id,
          reason,
          statusCode: upstream?.statusCode,
          attempts: upstream?.attempts,
          error: errorMessage(error),
        },
        "report.section_degraded"
      );
      return fallback(reason, upstream?.statusCode);
    }

    const text = sanitizeReportText(raw);
    if (!text) {
      this.deps.log.warn(
        { missionId: request.mission.id, sectionId: section.id, reason: "empty_output" },
        "report.section_degraded"
      );
      return fallback("empty_output");
    }
    return { ...base, text, source: "gateway", degraded: false };
  }

  private async readCached(missionId: string, key: string, registryVersion: string): Promise<IntelReport | null> {
    const stored = await this.deps.store.get(missionId, key);
    if (!stored || stored.registryVersion !== registryVersion) return null;
    const parsed = IntelReportSchema.safeParse(stored.payload);
    if (!parsed.success) {
      this.deps.log.warn({ missionId, key }, "report.cache_payload_invalid");
      return null;
    }
    return parsed.data;
  }
}
