import { z } from "zod";

export const DataRequirement = z.enum([
  "documents",
  "entities",
  "events",
  "gaps",
  "datasets",
  "kg_summary",
]);

export type DataRequirement = z.infer<typeof DataRequirement>;

export const IntLaneSchema = z.object({
  code: z.string().min(1),
  label: z.string().min(1),
  notes: z.string().default(""),
}).strict();

export const ActionCategorySchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
}).strict();

export const AuthoritySchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  aliases: z.array(z.string().min(1)).default([]),
  category: z.enum(["MIL", "INT", "LEO", "CIV", "COALITION"]),
  jurisdiction: z.string().min(1),
  allowedIntLanes: z.array(z.string().min(1)),
  foundationalIntLanes: z.array(z.string().min(1)).default([]),
  allowedActionCategories: z.array(z.string().min(1)),
  blockedActionCategories: z.array(z.string().min(1)).default([]),
  disclaimer: z.string().min(1),
}).strict();

export const GuardrailRuleSchema = z.object({
  id: z.string().min(1),
  actionCategory: z.string().min(1),
  phrases: z.array(z.string().min(1)).default([]),
  // Each entry is a set of terms that must all co-occur.
  compound: z.array(z.array(z.string().min(1)).min(2)).default([]),
  correctLaneAuthority: z.string().min(1),
  remediation: z.string().min(1),
}).strict();

export const SectionSpecSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  prompt: z.string().min(1),
  dataRequirements: z.array(DataRequirement).default([]),
  fallback: z.string().min(1),
}).strict();

export const TemplateSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  priority: z.number().int(),
  requiredIntLanes: z.array(z.string().min(1)),
  expectedIntLanes: z.array(z.string().min(1)).default([]),
  allowedAuthorities: z.array(z.string().min(1)).min(1),
  sections: z.array(SectionSpecSchema).min(1),
}).strict();

export const AnalysisSettingsSchema = z.object({
  timeBucketHours: z.number().min(1).default(24),
  numericTolerance: z.number().min(0).default(0.05),
  qualityThreshold: z.number().min(0).max(1).default(0.8),
  priorityLimit: z.number().int().min(1).default(5),
  genericExpectedIntLanes: z.array(z.string().min(1)).default([]),
}).strict();

export const PolicyConfigSchema = z.object({
  intLanes: z.array(IntLaneSchema).min(1),
  actionCategories: z.array(ActionCategorySchema).min(1),
  authorities: z.array(AuthoritySchema).min(1),
  rules: z.array(GuardrailRuleSchema),
  templates: z.array(TemplateSchema),
  analysis: AnalysisSettingsSchema.default({}),
}).strict();

export type IntLane = z.infer<typeof IntLaneSchema>;
export type ActionCategory = z.infer<typeof ActionCategorySchema>;
export type Authority = z.infer<typeof AuthoritySchema>;
export type GuardrailRule = z.infer<typeof GuardrailRuleSchema>;
export type SectionSpec = z.infer<typeof SectionSpecSchema>;
export type Template = z.infer<typeof TemplateSchema>;
export type AnalysisSettings = z.infer<typeof AnalysisSettingsSchema>;
export type PolicyConfig = z.infer<typeof PolicyConfigSchema>;
