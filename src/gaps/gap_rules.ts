import type { AnalysisSettings, Authority, Template } from "../contracts/policy_config";
import type { DatasetProfile, KgAssertion, KgEntity, KgEvent, KgSnapshot, Mission, ObservationWindow } from "../contracts/mission";
import {
  GAP_KIND_ORDER,
  SEVERITY_WEIGHT,
  type GapFinding,
  type GapKind,
  type GapPriorities,
  type PriorityItem,
  type Severity,
} from "../contracts/gap_finding";

const HOUR_MS = 60 * 60 * 1000;
// Wider windows get proportionally wider buckets.
export const MAX_TIME_BUCKETS = 10_000;

function fold(value: string): string {
  return value.trim().toLowerCase();
}

function bump(severity: Severity): Severity {
  return severity === "low" ? "med" : "high";
}

function finding(args: Omit<GapFinding, "id">): GapFinding {
  return { id: `${args.kind}:${args.ref}`, ...args };
}

function unique(values: Iterable<string>): string[] {
  return Array.from(new Set(values));
}

/**
 * Lanes a mission is expected to carry. A template brings its own required
 * and expected lanes; otherwise the authority's foundational lanes plus the
 * generic baseline, limited to what the authority may collect.
 */
export function expectedIntLanes(
  authority: Authority,
  template: Template | null,
  settings: AnalysisSettings
): string[] {
  if (template) {
    return unique([...template.requiredIntLanes, ...template.expectedIntLanes]);
  }
  return unique([...authority.foundationalIntLanes, ...settings.genericExpectedIntLanes]).filter((code) =>
    authority.allowedIntLanes.includes(code)
  );
}

export function detectMissingIntLanes(args: {
  expected: readonly string[];
  present: readonly string[];
  authority: Authority;
  laneLabel: (code: string) => string;
}): GapFinding[] {
  const present = new Set(args.present.map((code) => code.trim().toUpperCase()));
  return args.expected
    .filter((code) => !present.has(code))
    .map((code) => {
      const label = args.laneLabel(code);
      const foundational = args.authority.foundationalIntLanes.includes(code);
      return finding({
        kind: "missing_int",
        severity: foundational ? "high" : "med",
        ref: code,
        description: foundational
          ? `${label} is foundational for ${args.authority.label} missions but no ${code} reporting is present.`
          : `${label} is expected for this product but no ${code} reporting is present.`,
        recommendedAction: `Task ${code} collection or attach existing ${label} reporting to the mission.`,
        entityRefs: [],
        eventRefs: [],
      });
    });
}

function runSeverity(length: number): Severity {
  if (length === 1) return "low";
  if (length <= 3) return "med";
  return "high";
}

/**
 * Splits the observation window into fixed buckets and reports each maximal
 * run of buckets without a KG event. The final bucket may be shorter.
 */
export function detectTimeWindowGaps(args: {
  window: ObservationWindow | null;
  events: readonly KgEvent[];
  bucketHours: number;
}): GapFinding[] {
  if (!args.window) return [];
  const start = Date.parse(args.window.start);
  const end = Date.parse(args.window.end);
  if (!(end > start) || !(args.bucketHours > 0)) return [];
  const bucketMs = Math.max(args.bucketHours * HOUR_MS, Math.ceil((end - start) / MAX_TIME_BUCKETS));
  const bucketHours = bucketMs / HOUR_MS;

  const bucketCount = Math.ceil((end - start) / bucketMs);
  const counts = new Array<number>(bucketCount).fill(0);
  const timed = args.events
    .map((event) => ({ event, at: Date.parse(event.occurredAt) }))
    .filter(({ at }) => Number.isFinite(at))
    .sort((a, b) => a.at - b.at || (a.event.id < b.event.id ? -1 : 1));

  for (const { at } of timed) {
    if (at < start || at >= end) continue;
    counts[Math.floor((at - start) / bucketMs)] += 1;
  }

  const findings: GapFinding[] = [];
  let runStart = -1;
  for (let i = 0; i <= bucketCount; i++) {
    const empty = i < bucketCount && counts[i] === 0;
    if (empty && runStart === -1) {
      runStart = i;
    } else if (!empty && runStart !== -1) {
      const runEnd = i - 1;
      const length = runEnd - runStart + 1;
      const includesLatest = runEnd === bucketCount - 1;
      const severity = includesLatest ? bump(runSeverity(length)) : runSeverity(length);
      const gapStart = start + runStart * bucketMs;
      const gapEnd = Math.min(start + (runEnd + 1) * bucketMs, end);
      const startIso = new Date(gapStart).toISOString();
      const endIso = new Date(gapEnd).toISOString();

      const before = timed.filter(({ at }) => at < gapStart).at(-1)?.event;
      const after = timed.find(({ at }) => at >= gapEnd)?.event;
      const neighbours = [before, after].filter((event): event is KgEvent => event !== undefined);

      findings.push(
        finding({
          kind: "missing_time_window",
          severity,
          ref: `${startIso}/${endIso}`,
          description: `No events recorded between ${startIso} and ${endIso} (${length} bucket(s) of ${bucketHours}h)${
            includesLatest ? ", running up to the end of the observation window" : ""
          }.`,
          recommendedAction: includesLatest
            ? "Re-task collection to cover the current reporting period."
            : `Backfill reporting for ${startIso} to ${endIso} from archived sources.`,
          entityRefs: unique(neighbours.flatMap((event) => event.entityIds)),
          eventRefs: neighbours.map((event) => event.id),
          window: { start: startIso, end: endIso, bucketCount: length },
        })
      );
      runStart = -1;
    }
  }
  return findings;
}

export class KgEntityIndex {
  private byKey = new Map<string, KgEntity>();

  constructor(readonly snapshot: KgSnapshot) {
    for (const entity of snapshot.entities) {
      for (const key of [entity.id, entity.name, ...entity.aliases]) {
        const folded = fold(key);
        if (folded && !this.byKey.has(folded)) this.byKey.set(folded, entity);
      }
    }
  }

  find(ref: string): KgEntity | null {
    return this.byKey.get(fold(ref)) ?? null;
  }

  isCorroborated(entity: KgEntity): boolean {
    if (entity.sources.length > 0) return true;
    return this.snapshot.relations.some(
      (relation) => (relation.from === entity.id || relation.to === entity.id) && Boolean(relation.source)
    );
  }

  label(id: string): string {
    return this.find(id)?.name ?? id;
  }
}

/** Mission references, one per resolved KG entity or per unresolved name. */
function referencedEntities(mission: Mission, index: KgEntityIndex): Array<{ ref: string; entity: KgEntity | null }> {
  const seen = new Set<string>();
  const refs: Array<{ ref: string; entity: KgEntity | null }> = [];
  const candidates = [
    ...mission.documents.filter((doc) => doc.includeInAnalysis).flatMap((doc) => doc.referencedEntities),
    ...mission.plannedEntities,
  ];
  for (const raw of candidates) {
    const ref = raw.trim();
    if (!ref) continue;
    const entity = index.find(ref);
    const key = entity ? `id:${entity.id}` : `name:${fold(ref)}`;
    if (seen.has(key)) continue;
    seen.add(key);
    refs.push({ ref, entity });
  }
  return refs;
}

export function detectEntitySupportGaps(args: { mission: Mission; index: KgEntityIndex }): GapFinding[] {
  const { mission, index } = args;
  const priorityKeys = new Set(mission.priorityEntities.map(fold));
  const isPriority = (ref: string, entity: KgEntity | null) =>
    priorityKeys.has(fold(ref)) ||
    (entity !== null && [entity.id, entity.name, ...entity.aliases].some((key) => priorityKeys.has(fold(key))));

  const findings: GapFinding[] = [];
  for (const { ref, entity } of referencedEntities(mission, index)) {
    if (entity && index.isCorroborated(entity)) continue;

    const priority = isPriority(ref, entity);
    const severity: Severity = priority ? "high" : entity ? "low" : "med";
    const id = entity?.id ?? ref;
    const label = entity?.name ?? ref;

    findings.push(
      finding({
        kind: "missing_entity_support",
        severity,
        ref: id,
        description: entity
          ? `${label} appears in the knowledge graph without any corroborating source${priority ? " and is a mission priority" : ""}.`
          : `${label} is referenced by the mission but absent from the knowledge graph${priority ? " and is a mission priority" : ""}.`,
        recommendedAction: entity
          ? `Attach an independent source that corroborates ${label}.`
          : `Resolve ${label} into the knowledge graph or confirm it from collected reporting.`,
        entityRefs: [id],
        eventRefs: [],
      })
    );
  }
  return findings;
}

function windowsOverlap(a: KgAssertion, b: KgAssertion): boolean {
  const aFrom = Date.parse(a.validFrom);
  const bFrom = Date.parse(b.validFrom);
  const aTo = a.validTo === null ? Number.POSITIVE_INFINITY : Date.parse(a.validTo);
  const bTo = b.validTo === null ? Number.POSITIVE_INFINITY : Date.parse(b.validTo);
  return aFrom < bTo && bFrom < aTo;
}

function asNumber(value: string | number): number {
  if (typeof value === "number") return value;
  return value.trim() === "" ? Number.NaN : Number(value);
}

/** Numeric when both sides parse as numbers, categorical otherwise. */
export function valuesConflict(a: string | number, b: string | number, tolerance: number): boolean {
  const x = asNumber(a);
  const y = asNumber(b);
  if (Number.isFinite(x) && Number.isFinite(y)) {
    return Math.abs(x - y) > tolerance * Math.max(Math.abs(x), Math.abs(y));
  }
  return fold(String(a)) !== fold(String(b));
}

export function detectConflicts(args: { index: KgEntityIndex; tolerance: number }): GapFinding[] {
  const groups = new Map<string, KgAssertion[]>();
  for (const assertion of args.index.snapshot.assertions) {
    const key = `${assertion.entityId}\u0000${assertion.attribute}`;
    const group = groups.get(key);
    if (group) group.push(assertion);
    else groups.set(key, [assertion]);
  }

  const findings: GapFinding[] = [];
  for (const group of groups.values()) {
    const involved = new Set<KgAssertion>();
    for (let i = 0; i < group.length; i++) {
      for (let j = i + 1; j < group.length; j++) {
        const a = group[i];
        const b = group[j];
        if (a.source === b.source) continue;
        if (!windowsOverlap(a, b)) continue;
        if (!valuesConflict(a.value, b.value, args.tolerance)) continue;
        involved.add(a);
        involved.add(b);
      }
    }
    if (involved.size === 0) continue;

    const { entityId, attribute } = group[0];
    const members = group.filter((assertion) => involved.has(assertion));
    const sources = unique(members.map((assertion) => assertion.source));
    const label = args.index.label(entityId);
    const claims = members.map((assertion) => `${assertion.source}: ${assertion.value}`).join("; ");

    findings.push(
      finding({
        kind: "conflict",
        severity: sources.length >= 3 ? "high" : "med",
        ref: `${entityId}.${attribute}`,
        description: `Sources disagree on ${attribute} for ${label} over overlapping periods (${claims}).`,
        recommendedAction: `Adjudicate ${attribute} for ${label} against a primary source before relying on it.`,
        entityRefs: [entityId],
        eventRefs: unique(members.flatMap((assertion) => (assertion.eventId ? [assertion.eventId] : []))),
      })
    );
  }
  return findings;
}

function qualitySeverity(deficit: number): Severity {
  if (deficit > 0.3) return "high";
  if (deficit > 0.15) return "med";
  return "low";
}

export function detectQualityGaps(args: { profiles: readonly DatasetProfile[]; threshold: number }): GapFinding[] {
  const findings: GapFinding[] = [];
  for (const profile of args.profiles) {
    for (const metric of ["completeness", "consistency"] as const) {
      const score = profile.semanticProfile[metric];
      // Rounded so 0.8 - 0.5 compares as 0.3, not 0.30000000000000004.
      const deficit = Math.round((args.threshold - score) * 1e6) / 1e6;
      if (deficit <= 0) continue;
      findings.push(
        finding({
          kind: "quality",
          severity: qualitySeverity(deficit),
          ref: `${profile.datasetId}.${metric}`,
          description: `Dataset ${profile.table} (${profile.datasetId}) scores ${score} on ${metric}, below the ${args.threshold} threshold.`,
          recommendedAction:
            metric === "completeness"
              ? `Backfill missing values in ${profile.table} or document the coverage limits.`
              : `Reconcile inconsistent records in ${profile.table} before using it as evidence.`,
          entityRefs: [],
          eventRefs: [],
        })
      );
    }
  }
  return findings;
}

export function compareFindings(a: GapFinding, b: GapFinding): number {
  const bySeverity = SEVERITY_WEIGHT[b.severity] - SEVERITY_WEIGHT[a.severity];
  if (bySeverity !== 0) return bySeverity;
  const byKind = GAP_KIND_ORDER.indexOf(a.kind) - GAP_KIND_ORDER.indexOf(b.kind);
  if (byKind !== 0) return byKind;
  return a.ref < b.ref ? -1 : a.ref > b.ref ? 1 : 0;
}

function rankItems(
  findings: readonly GapFinding[],
  refsOf: (finding: GapFinding) => readonly string[],
  labelOf: (id: string) => string,
  limit: number
): PriorityItem[] {
  const tallies = new Map<string, { score: number; gapCount: number; highest: Severity; kinds: Set<GapKind> }>();
  for (const item of findings) {
    for (const id of unique(refsOf(item))) {
      const tally = tallies.get(id) ?? { score: 0, gapCount: 0, highest: "low", kinds: new Set<GapKind>() };
      tally.score += SEVERITY_WEIGHT[item.severity];
      tally.gapCount += 1;
      if (SEVERITY_WEIGHT[item.severity] > SEVERITY_WEIGHT[tally.highest]) tally.highest = item.severity;
      tally.kinds.add(item.kind);
      tallies.set(id, tally);
    }
  }

  return Array.from(tallies.entries())
    .map(([id, tally]): PriorityItem => {
      const label = labelOf(id);
      const kinds = GAP_KIND_ORDER.filter((kind) => tally.kinds.has(kind)).join(", ");
      return {
        id,
        label,
        score: tally.score,
        gapCount: tally.gapCount,
        highestSeverity: tally.highest,
        rationale: `${label} is referenced by ${tally.gapCount} open gap(s) (${kinds}); highest severity ${tally.highest}.`,
      };
    })
    .sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    .slice(0, limit);
}

export function rankPriorities(args: {
  findings: readonly GapFinding[];
  kg: KgSnapshot | null;
  limit: number;
}): GapPriorities {
  const index = args.kg ? new KgEntityIndex(args.kg) : null;
  const eventLabels = new Map((args.kg?.events ?? []).map((event) => [event.id, event.label || event.id]));
  return {
    entities: rankItems(args.findings, (item) => item.entityRefs, (id) => index?.label(id) ?? id, args.limit),
    events: rankItems(args.findings, (item) => item.eventRefs, (id) => eventLabels.get(id) ?? id, args.limit),
  };
}
