import { z } from "zod";

export const GapKind = z.enum([
  "missing_int",
  "missing_time_window",
  "missing_entity_support",
  "conflict",
  "quality",
]);
export type GapKind = z.infer<typeof GapKind>;

export const Severity = z.enum(["low", "med", "high"]);
export type Severity = z.infer<typeof Severity>;

export const GAP_KIND_ORDER: readonly GapKind[] = GapKind.options;

export const SEVERITY_WEIGHT: Record<Severity, number> = {
  high: 3,
  med: 2,
  low: 1,
};

export const GapFindingSchema = z.object({
  id: z.string(),
  kind: GapKind,
  severity: Severity,
  description: z.string(),
  // Stable supporting reference: lane code, bucket range, entity id, dataset id...
  ref: z.string(),
  recommendedAction: z.string(),
  entityRefs: z.array(z.string()),
  eventRefs: z.array(z.string()),
  window: z
    .object({
      start: z.string(),
      end: z.string(),
      bucketCount: z.number().int(),
    })
    .optional(),
});
export type GapFinding = z.infer<typeof GapFindingSchema>;

export const PriorityItemSchema = z.object({
  id: z.string(),
  label: z.string(),
  score: z.number(),
  gapCount: z.number().int(),
  highestSeverity: Severity,
  rationale: z.string(),
});
export type PriorityItem = z.infer<typeof PriorityItemSchema>;

export const GapPrioritiesSchema = z.object({
  entities: z.array(PriorityItemSchema),
  events: z.array(PriorityItemSchema),
});
export type GapPriorities = z.infer<typeof GapPrioritiesSchema>;

// "gateway" only appears when advisory annotation could not run.
export const GapSource = z.enum(["kg", "dataset_profiles", "gateway"]);
export type GapSource = z.infer<typeof GapSource>;

export const GapAnalysisMode = z.enum(["kg", "rules", "rules_advisory"]);
export type GapAnalysisMode = z.infer<typeof GapAnalysisMode>;

export const ConflictAnnotationSchema = z.object({
  findingId: z.string(),
  explanation: z.string(),
});
export type ConflictAnnotation = z.infer<typeof ConflictAnnotationSchema>;

export const GapAnalysisResultSchema = z.object({
  missionId: z.string(),
  mode: GapAnalysisMode,
  templateId: z.string().nullable(),
  findings: z.array(GapFindingSchema),
  priorities: GapPrioritiesSchema,
  partial: z.boolean(),
  unavailableSources: z.array(GapSource),
  laneWarnings: z.array(z.string()),
  // Advisory only; never feeds back into findings.
  annotations: z.array(ConflictAnnotationSchema),
  registryVersion: z.string(),
  generatedAt: z.string(),
});
export type GapAnalysisResult = z.infer<typeof GapAnalysisResultSchema>;
