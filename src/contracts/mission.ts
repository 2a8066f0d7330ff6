import { z } from "zod";

export const MissionDocumentSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  excerpt: z.string().default(""),
  referencedEntities: z.array(z.string().min(1)).default([]),
  includeInAnalysis: z.boolean().default(true),
}).strict();

export const ObservationWindowSchema = z.object({
  start: z.string().datetime(),
  end: z.string().datetime(),
  bucketHours: z.number().min(1).optional(),
}).strict();

export const MissionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
  authorityId: z.string().min(1),
  intLanesPresent: z.array(z.string().min(1)).default([]),
  kgNamespace: z.string().min(1).nullable().default(null),
  observationWindow: ObservationWindowSchema.nullable().default(null),
  priorityEntities: z.array(z.string().min(1)).default([]),
  // Entities named in plans rather than documents.
  plannedEntities: z.array(z.string().min(1)).default([]),
  documents: z.array(MissionDocumentSchema).default([]),
}).strict();

export type MissionDocument = z.infer<typeof MissionDocumentSchema>;
export type ObservationWindow = z.infer<typeof ObservationWindowSchema>;
export type Mission = z.infer<typeof MissionSchema>;
export type MissionInput = z.input<typeof MissionSchema>;

export const KgEntitySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  type: z.string().default("unknown"),
  aliases: z.array(z.string()).default([]),
  sources: z.array(z.string()).default([]),
});

export const KgRelationSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  type: z.string().min(1),
  source: z.string().min(1).nullable().default(null),
});

export const KgEventSchema = z.object({
  id: z.string().min(1),
  label: z.string().default(""),
  occurredAt: z.string().datetime(),
  entityIds: z.array(z.string()).default([]),
  source: z.string().nullable().default(null),
});

export const KgAssertionSchema = z.object({
  entityId: z.string().min(1),
  attribute: z.string().min(1),
  value: z.union([z.string(), z.number()]),
  source: z.string().min(1),
  validFrom: z.string().datetime(),
  validTo: z.string().datetime().nullable().default(null),
  eventId: z.string().nullable().default(null),
});

export const KgSnapshotSchema = z.object({
  namespace: z.string().min(1),
  capturedAt: z.string().datetime().nullable().default(null),
  entities: z.array(KgEntitySchema).default([]),
  relations: z.array(KgRelationSchema).default([]),
  events: z.array(KgEventSchema).default([]),
  assertions: z.array(KgAssertionSchema).default([]),
});

export type KgEntity = z.infer<typeof KgEntitySchema>;
export type KgRelation = z.infer<typeof KgRelationSchema>;
export type KgEvent = z.infer<typeof KgEventSchema>;
export type KgAssertion = z.infer<typeof KgAssertionSchema>;
export type KgSnapshot = z.infer<typeof KgSnapshotSchema>;
export type KgSnapshotInput = z.input<typeof KgSnapshotSchema>;

export const DatasetColumnSchema = z.object({
  name: z.string().min(1),
  semanticType: z.string().default("unknown"),
  nullRatio: z.number().min(0).max(1).default(0),
});

export const DatasetProfileSchema = z.object({
  datasetId: z.string().min(1),
  table: z.string().min(1),
  columns: z.array(DatasetColumnSchema).default([]),
  semanticProfile: z.object({
    summary: z.string().default(""),
    completeness: z.number().min(0).max(1),
    consistency: z.number().min(0).max(1),
    rowCount: z.number().int().min(0).default(0),
  }),
});

export const DatasetProfileListSchema = z.array(DatasetProfileSchema);

export type DatasetColumn = z.infer<typeof DatasetColumnSchema>;
export type DatasetProfile = z.infer<typeof DatasetProfileSchema>;
export type DatasetProfileInput = z.input<typeof DatasetProfileSchema>;
