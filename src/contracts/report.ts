import { z } from "zod";

import type { BlockVerdict } from "./verdict";
import { GapSource } from "./gap_finding";

export const SectionSource = z.enum(["gateway", "fallback", "no_evidence"]);
export type SectionSource = z.infer<typeof SectionSource>;

export const RenderedSectionSchema = z.object({
  id: z.string(),
  title: z.string(),
  text: z.string().min(1),
  source: SectionSource,
  degraded: z.boolean(),
  degradedReason: z.enum(["timeout", "error", "empty_output"]).optional(),
  // HTTP status of the last failed gateway attempt, when it answered at all.
  upstreamStatus: z.number().int().optional(),
});
export type RenderedSection = z.infer<typeof RenderedSectionSchema>;

export const GuardrailCheckSchema = z.object({
  // "request" for the analyst focus, otherwise a section id.
  scope: z.string(),
  verdict: z.enum(["allow", "block"]),
  degraded: z.boolean(),
});
export type GuardrailCheck = z.infer<typeof GuardrailCheckSchema>;

export const GuardrailPostureSchema = z.object({
  authorityId: z.string(),
  authorityLabel: z.string(),
  disclaimer: z.string(),
  blockedCategories: z.array(z.string()),
  checks: z.array(GuardrailCheckSchema),
  classifierDegraded: z.boolean(),
  registryVersion: z.string(),
});
export type GuardrailPosture = z.infer<typeof GuardrailPostureSchema>;

export const GapSnapshotRefSchema = z.object({
  analysisKey: z.string(),
  generatedAt: z.string(),
  findingCount: z.number().int(),
  highSeverityCount: z.number().int(),
  partial: z.boolean(),
  unavailableSources: z.array(GapSource),
});
export type GapSnapshotRef = z.infer<typeof GapSnapshotRefSchema>;

export const KgSnapshotRefSchema = z.object({
  namespace: z.string(),
  capturedAt: z.string().nullable(),
  entityCount: z.number().int(),
  eventCount: z.number().int(),
});
export type KgSnapshotRef = z.infer<typeof KgSnapshotRefSchema>;

export const IntelReportSchema = z.object({
  missionId: z.string(),
  templateId: z.string(),
  templateName: z.string(),
  sections: z.array(RenderedSectionSchema),
  markdown: z.string(),
  guardrailPosture: GuardrailPostureSchema,
  gapSnapshotRef: GapSnapshotRefSchema,
  kgSnapshotRef: KgSnapshotRefSchema.nullable(),
  generatedAt: z.string(),
  degradedSections: z.array(z.string()),
  partial: z.boolean(),
});
export type IntelReport = z.infer<typeof IntelReportSchema>;

export type ReportStage = "select_template" | "render_section";

export type ReportOutcome =
  | { status: "completed"; report: IntelReport; cached: boolean }
  | { status: "blocked"; stage: ReportStage; verdict: BlockVerdict; sectionId?: string };
