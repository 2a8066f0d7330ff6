import type { DataRequirement, SectionSpec, Template } from "../contracts/policy_config";
import type { DatasetProfile, KgSnapshot, Mission, MissionDocument } from "../contracts/mission";
import type { GapAnalysisResult } from "../contracts/gap_finding";

/**
 * A section prompt is a deterministic stack of parts. The policy preamble is
 * always first so the authority's limits precede any mission content.
 */

export type PromptPartId = "policy" | "section_task" | "context";

export type PromptPart = {
  id: PromptPartId;
  title: string;
  content: string;
};

export type SectionPromptPack = {
  version: "section-prompt-v1";
  templateId: string;
  sectionId: string;
  parts: PromptPart[];
  requirements: DataRequirement[];
};

export type PolicyPreamble = {
  authorityLabel: string;
  disclaimer: string;
  blockedCategoryLabels: string[];
};

export type ReportContext = {
  mission: Mission;
  documents: MissionDocument[];
  kg: KgSnapshot | null;
  profiles: DatasetProfile[] | null;
  gaps: GapAnalysisResult;
};

export type ContextSlice = Record<DataRequirement, string[]>;

const SLICE_TITLES: Record<DataRequirement, string> = {
  documents: "Document excerpts",
  entities: "Entities",
  events: "Events",
  gaps: "Open intelligence gaps",
  datasets: "Datasets",
  kg_summary: "Knowledge graph summary",
};

export function buildPolicyPreamble(preamble: PolicyPreamble): string {
  const lines: string[] = [];
  lines.push(`You are drafting one section of an intelligence product for a ${preamble.authorityLabel} mission.`);
  lines.push(`Disclaimer: ${preamble.disclaimer}`);
  lines.push("");
  lines.push("Prohibited action categories (never plan, recommend or imply these):");
  if (preamble.blockedCategoryLabels.length === 0) {
    lines.push("- (none declared)");
  } else {
    for (const label of preamble.blockedCategoryLabels) lines.push(`- ${label}`);
  }
  lines.push("");
  lines.push("Use only the mission context supplied below. If it does not support a statement, say so plainly.");
  lines.push("Do not mention record identifiers, data structures or how the context was supplied.");
  return lines.join("\n");
}

function formatDocuments(documents: MissionDocument[]): string[] {
  return documents.map((doc) => (doc.excerpt ? `${doc.title}: ${doc.excerpt}` : doc.title));
}

function formatEntities(kg: KgSnapshot | null): string[] {
  if (!kg) return [];
  return kg.entities.map((entity) => {
    const aliases = entity.aliases.length > 0 ? ` (also: ${entity.aliases.join(", ")})` : "";
    const sourcing = entity.sources.length > 0 ? `${entity.sources.length} source(s)` : "unsourced";
    return `${entity.name} [${entity.type}]${aliases}; ${sourcing}`;
  });
}

function formatEvents(kg: KgSnapshot | null): string[] {
  if (!kg) return [];
  return [...kg.events]
    .sort((a, b) => Date.parse(a.occurredAt) - Date.parse(b.occurredAt))
    .map((event) => `${event.occurredAt}: ${event.label || "unlabelled event"}`);
}

function formatDatasets(profiles: DatasetProfile[] | null): string[] {
  if (!profiles) return [];
  return profiles.map((profile) => {
    const p = profile.semanticProfile;
    const summary = p.summary ? `${p.summary} ` : "";
    return `${profile.table}: ${summary}(completeness ${p.completeness}, consistency ${p.consistency}, ${p.rowCount} rows)`;
  });
}

function formatKgSummary(kg: KgSnapshot | null): string[] {
  if (!kg || (kg.entities.length === 0 && kg.events.length === 0)) return [];
  return [
    `${kg.entities.length} entities, ${kg.relations.length} relations, ${kg.events.length} events and ${kg.assertions.length} attribute assertions` +
      (kg.capturedAt ? ` as of ${kg.capturedAt}.` : "."),
  ];
}

export function sliceContext(context: ReportContext, requirements: readonly DataRequirement[]): ContextSlice {
  const slice: ContextSlice = {
    documents: [],
    entities: [],
    events: [],
    gaps: [],
    datasets: [],
    kg_summary: [],
  };
  for (const requirement of requirements) {
    switch (requirement) {
      case "documents":
        slice.documents = formatDocuments(context.documents);
        break;
      case "entities":
        slice.entities = formatEntities(context.kg);
        break;
      case "events":
        slice.events = formatEvents(context.kg);
        break;
      case "gaps":
        slice.gaps = context.gaps.findings.map((item) => `[${item.severity}] ${item.description}`);
        break;
      case "datasets":
        slice.datasets = formatDatasets(context.profiles);
        break;
      case "kg_summary":
        slice.kg_summary = formatKgSummary(context.kg);
        break;
    }
  }
  return slice;
}

export function sliceHasEvidence(slice: ContextSlice, requirements: readonly DataRequirement[]): boolean {
  if (requirements.length === 0) return true;
  return requirements.some((requirement) => slice[requirement].length > 0);
}

function formatSlice(slice: ContextSlice, requirements: readonly DataRequirement[]): string {
  const blocks: string[] = [];
  for (const requirement of requirements) {
    const lines = slice[requirement];
    blocks.push(`${SLICE_TITLES[requirement]}:`);
    blocks.push(lines.length > 0 ? lines.map((line) => `- ${line}`).join("\n") : "- (none available)");
    blocks.push("");
  }
  return blocks.join("\n").trim() || "(no mission context requested)";
}

export function buildSectionPromptPack(args: {
  preamble: PolicyPreamble;
  mission: Mission;
  template: Template;
  section: SectionSpec;
  slice: ContextSlice;
  focus?: string;
  note?: string;
}): SectionPromptPack {
  const { mission, template, section } = args;
  const task: string[] = [];
  task.push(`Product: ${template.name}`);
  task.push(`Mission: ${mission.name}`);
  if (mission.description) task.push(`Mission description: ${mission.description}`);
  task.push(`Section: ${section.title}`);
  task.push(section.prompt);
  if (args.focus?.trim()) task.push(`Analyst focus: ${args.focus.trim()}`);
  if (args.note?.trim()) task.push(`Analyst note for this section: ${args.note.trim()}`);

  return {
    version: "section-prompt-v1",
    templateId: template.id,
    sectionId: section.id,
    requirements: [...section.dataRequirements],
    parts: [
      { id: "policy", title: "Policy", content: buildPolicyPreamble(args.preamble) },
      { id: "section_task", title: "Task", content: task.join("\n") },
      { id: "context", title: "Mission context", content: formatSlice(args.slice, section.dataRequirements) },
    ],
  };
}

/**
 * Single stable string with part headers, as sent to the gateway.
 */
export function toSinglePromptText(pack: SectionPromptPack): string {
  const parts: string[] = [];
  for (const part of pack.parts) {
    parts.push(`## ${part.title}`);
    parts.push(part.content);
    parts.push("");
  }
  return parts.join("\n").trim();
}

/**
 * Small helper for structured logs. Avoid logging full content by default.
 */
export function promptPackLogShape(pack: SectionPromptPack): {
  version: SectionPromptPack["version"];
  sectionId: string;
  partBytes: Array<{ id: PromptPartId; bytes: number }>;
} {
  return {
    version: pack.version,
    sectionId: pack.sectionId,
    partBytes: pack.parts.map((part) => ({ id: part.id, bytes: Buffer.byteLength(part.content, "utf8") })),
  };
}
