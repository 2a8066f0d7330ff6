import { describe, it, expect } from "vitest";

import type { Template } from "../src/contracts/policy_config";
import type { DatasetProfile } from "../src/contracts/mission";
import type { GapAnalysisResult } from "../src/contracts/gap_finding";
import {
  buildPolicyPreamble,
  buildSectionPromptPack,
  promptPackLogShape,
  sliceContext,
  sliceHasEvidence,
  toSinglePromptText,
  type PolicyPreamble,
  type ReportContext,
} from "../src/control-plane/prompt_pack";
import { loadTestRegistry, makeFinding, makeMission, makeSnapshot } from "./helpers";

const registry = loadTestRegistry();

function template(id: string): Template {
  const found = registry.getTemplate(id);
  if (!found) throw new Error(`missing template ${id}`);
  return found;
}

function section(templateId: string, sectionId: string) {
  const found = template(templateId).sections.find((item) => item.id === sectionId);
  if (!found) throw new Error(`missing section ${sectionId}`);
  return found;
}

const mission = makeMission({
  description: "Coastal watch.",
  documents: [
    { id: "d1", title: "Imagery", excerpt: "Night berthing." },
    { id: "d2", title: "Signals" },
  ],
});

const kg = makeSnapshot({
  capturedAt: "2026-03-11T06:00:00Z",
  entities: [
    { id: "e1", name: "Vessel Kestrel", type: "vessel", aliases: ["MV Kestrel"], sources: ["img"] },
    { id: "e2", name: "Port Aldren" },
  ],
  events: [
    { id: "ev-2", label: "Departure", occurredAt: "2026-03-09T18:00:00Z" },
    { id: "ev-1", occurredAt: "2026-03-01T22:00:00Z" },
  ],
});

const profiles: DatasetProfile[] = [
  {
    datasetId: "ds-ais",
    table: "ais_positions",
    columns: [],
    semanticProfile: { summary: "Positions.", completeness: 0.55, consistency: 0.9, rowCount: 10 },
  },
];

const gaps: GapAnalysisResult = {
  missionId: "m-1",
  mode: "rules",
  templateId: null,
  findings: [makeFinding({ kind: "missing_int", ref: "OSINT", description: "OSINT missing." })],
  priorities: { entities: [], events: [] },
  partial: false,
  unavailableSources: [],
  laneWarnings: [],
  annotations: [],
  registryVersion: "v-test",
  generatedAt: "2026-04-01T12:00:00.000Z",
};

const context: ReportContext = { mission, documents: mission.documents, kg, profiles, gaps };

const preamble: PolicyPreamble = {
  authorityLabel: "Title 10 – Military Operations",
  disclaimer: "Stay in lane.",
  blockedCategoryLabels: ["covert action"],
};

const POLICY_TEXT = [
  "You are drafting one section of an intelligence product for a Title 10 – Military Operations mission.",
  "Disclaimer: Stay in lane.",
  "",
  "Prohibited action categories (never plan, recommend or imply these):",
  "- covert action",
  "",
  "Use only the mission context supplied below. If it does not support a statement, say so plainly.",
  "Do not mention record identifiers, data structures or how the context was supplied.",
].join("\n");

describe("policy preamble", () => {
  it("lists the authority's prohibitions", () => {
    expect(buildPolicyPreamble(preamble)).toBe(POLICY_TEXT);
  });

  it("says so when nothing is prohibited", () => {
    expect(buildPolicyPreamble({ ...preamble, blockedCategoryLabels: [] })).toContain(
      "(never plan, recommend or imply these):\n- (none declared)\n"
    );
  });
});

describe("sliceContext", () => {
  it("fills only the requested parts", () => {
    const slice = sliceContext(context, ["entities", "events"]);
    expect(slice).toEqual({
      documents: [],
      entities: ["Vessel Kestrel [vessel] (also: MV Kestrel); 1 source(s)", "Port Aldren [unknown]; unsourced"],
      events: ["2026-03-01T22:00:00Z: unlabelled event", "2026-03-09T18:00:00Z: Departure"],
      gaps: [],
      datasets: [],
      kg_summary: [],
    });
  });

  it("formats documents, datasets, gaps and the graph summary", () => {
    const slice = sliceContext(context, ["documents", "datasets", "gaps", "kg_summary"]);
    expect(slice.documents).toEqual(["Imagery: Night berthing.", "Signals"]);
    expect(slice.datasets).toEqual(["ais_positions: Positions. (completeness 0.55, consistency 0.9, 10 rows)"]);
    expect(slice.gaps).toEqual(["[med] OSINT missing."]);
    expect(slice.kg_summary).toEqual([
      "2 entities, 0 relations, 2 events and 0 attribute assertions as of 2026-03-11T06:00:00Z.",
    ]);
  });

  it("treats an empty graph as no evidence", () => {
    const empty = { ...context, kg: makeSnapshot(), documents: [] };
    const requirements = ["kg_summary", "entities", "documents"] as const;
    const slice = sliceContext(empty, requirements);
    expect(sliceHasEvidence(slice, requirements)).toBe(false);
    expect(sliceHasEvidence(slice, [])).toBe(true);
  });
});

describe("section prompt pack", () => {
  it("stacks policy, task and context in that order", () => {
    const spec = section("full_intrep_v1", "gaps");
    const pack = buildSectionPromptPack({
      preamble,
      mission,
      template: template("full_intrep_v1"),
      section: spec,
      slice: sliceContext(context, spec.dataRequirements),
      focus: " Vessel movements ",
    });

    expect(pack.parts.map((part) => part.id)).toEqual(["policy", "section_task", "context"]);
    expect(toSinglePromptText(pack)).toBe(
      [
        "## Policy",
        POLICY_TEXT,
        "",
        "## Task",
        "Product: Full Intelligence Report (INTREP)",
        "Mission: Harbor Watch",
        "Mission description: Coastal watch.",
        "Section: Intelligence Gaps",
        "Summarize the intelligence gaps and how they limit the assessment.",
        "Analyst focus: Vessel movements",
        "",
        "## Mission context",
        "Open intelligence gaps:",
        "- [med] OSINT missing.",
      ].join("\n")
    );
  });

  it("marks requested context that is missing", () => {
    const spec = section("full_intrep_v1", "assessment");
    const pack = buildSectionPromptPack({
      preamble,
      mission,
      template: template("full_intrep_v1"),
      section: spec,
      slice: sliceContext({ ...context, kg: null, documents: [] }, spec.dataRequirements),
      note: "Weigh the registry data lightly.",
    });

    expect(pack.parts[1].content.endsWith("Analyst note for this section: Weigh the registry data lightly.")).toBe(true);
    expect(pack.parts[2].content).toBe(
      [
        "Knowledge graph summary:",
        "- (none available)",
        "",
        "Entities:",
        "- (none available)",
        "",
        "Document excerpts:",
        "- (none available)",
      ].join("\n")
    );
  });

  it("logs sizes rather than content", () => {
    const spec = section("full_intrep_v1", "gaps");
    const pack = buildSectionPromptPack({
      preamble,
      mission,
      template: template("full_intrep_v1"),
      section: spec,
      slice: sliceContext(context, spec.dataRequirements),
    });

    const shape = promptPackLogShape(pack);
    expect(shape.version).toBe("section-prompt-v1");
    expect(shape.sectionId).toBe("gaps");
    expect(shape.partBytes[0]).toEqual({ id: "policy", bytes: Buffer.byteLength(POLICY_TEXT, "utf8") });
  });
});
