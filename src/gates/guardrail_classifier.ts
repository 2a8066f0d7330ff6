import type { Authority, GuardrailRule } from "../contracts/policy_config";
import { POLICY_CONFIG_CATEGORY, type BlockVerdict, type Verdict } from "../contracts/verdict";
import { emitAudit, type AuditSink } from "../audit/audit_sink";
import { PolicyConfigError } from "../errors";
import type { EngineLogger } from "../logger";
import type { PolicyRegistry } from "../policy/policy_registry";
import { normalizeForMatching, normalizeRequestText } from "./normalize_text";

export type RuleMatch = {
  ruleId: string;
  actionCategory: string;
  // Rule declaration index; breaks span ties (first declared wins).
  order: number;
  span: number;
  matchedText: string;
};

export type GuardrailEvaluation = {
  verdict: Verdict;
  matches: RuleMatch[];
  degradedReason: "not_text" | "empty" | "too_long" | null;
};

type Range = { start: number; end: number };

function findTerm(text: string, term: string): Range | null {
  if (!term) return null;
  let from = 0;
  while (from <= text.length - term.length) {
    const idx = text.indexOf(term, from);
    if (idx === -1) return null;
    const end = idx + term.length;
    const boundaryBefore = idx === 0 || text[idx - 1] === " ";
    const boundaryAfter = end === text.length || text[end] === " ";
    if (boundaryBefore && boundaryAfter) {
      return { start: idx, end };
    }
    from = idx + 1;
  }
  return null;
}

function findCompound(text: string, terms: string[]): Range | null {
  let start = Number.POSITIVE_INFINITY;
  let end = -1;
  for (const term of terms) {
    const hit = findTerm(text, normalizeForMatching(term));
    if (!hit) return null;
    start = Math.min(start, hit.start);
    end = Math.max(end, hit.end);
  }
  return { start, end };
}

/**
 * A rule's span is its longest trigger span. Phrases are checked before
 * compound triggers; equal spans keep the earlier trigger.
 */
export function matchRule(text: string, rule: GuardrailRule, order: number): RuleMatch | null {
  const candidates: Array<Range | null> = [
    ...rule.phrases.map((phrase) => findTerm(text, normalizeForMatching(phrase))),
    ...rule.compound.map((terms) => findCompound(text, terms)),
  ];

  let winner: Range | null = null;
  for (const range of candidates) {
    if (range && (!winner || range.end - range.start > winner.end - winner.start)) {
      winner = range;
    }
  }
  if (!winner) return null;
  return {
    ruleId: rule.id,
    actionCategory: rule.actionCategory,
    order,
    span: winner.end - winner.start,
    matchedText: text.slice(winner.start, winner.end),
  };
}

export function findRuleMatches(text: string, rules: readonly GuardrailRule[]): RuleMatch[] {
  const matches: RuleMatch[] = [];
  rules.forEach((rule, order) => {
    const match = matchRule(text, rule, order);
    if (match) matches.push(match);
  });
  return matches;
}

/**
 * Most specific match wins: longest span, then earliest declaration.
 */
export function selectWinningMatch(matches: RuleMatch[]): RuleMatch | null {
  let winner: RuleMatch | null = null;
  for (const match of matches) {
    if (!winner || match.span > winner.span || (match.span === winner.span && match.order < winner.order)) {
      winner = match;
    }
  }
  return winner;
}

export function renderRemediation(template: string, params: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) => params[key] ?? placeholder);
}

export function policyConfigVerdict(authorityId: string, error: PolicyConfigError): BlockVerdict {
  return {
    kind: "block",
    actionCategory: POLICY_CONFIG_CATEGORY,
    remediation: `Mission authority "${authorityId}" is not defined in the active policy configuration (${error.message}). Requests are blocked until the mission authority is corrected.`,
    ruleId: null,
    matchedSpan: null,
    missionAuthorityId: null,
    correctAuthorityId: null,
  };
}

function resolveAuthority(registry: PolicyRegistry, authorityId: string): Authority | PolicyConfigError {
  try {
    return registry.resolveAuthority(authorityId);
  } catch (error) {
    if (error instanceof PolicyConfigError) return error;
    throw error;
  }
}

/**
 * Pure guardrail evaluation. Runs synchronously and must resolve before any
 * generative call is made for the request.
 */
export function evaluateGuardrails(
  registry: PolicyRegistry,
  requestText: unknown,
  authorityId: string
): GuardrailEvaluation {
  const authority = resolveAuthority(registry, authorityId);
  if (authority instanceof PolicyConfigError) {
    return { verdict: policyConfigVerdict(authorityId, authority), matches: [], degradedReason: null };
  }

  const normalized = normalizeRequestText(requestText);
  if (!normalized.ok) {
    return {
      verdict: { kind: "allow", degraded: true, allowedMatches: [] },
      matches: [],
      degradedReason: normalized.reason,
    };
  }

  const matches = findRuleMatches(normalized.text, registry.rules);
  const blocked = matches.filter((match) => !authority.allowedActionCategories.includes(match.actionCategory));
  const allowedMatches = matches
    .filter((match) => authority.allowedActionCategories.includes(match.actionCategory))
    .map((match) => match.ruleId);

  const winner = selectWinningMatch(blocked);
  if (!winner) {
    return { verdict: { kind: "allow", degraded: false, allowedMatches }, matches, degradedReason: null };
  }

  const rule = registry.rules[winner.order];
  const correct = registry.findAuthority(rule.correctLaneAuthority);
  const remediation = renderRemediation(rule.remediation, {
    missionAuthority: authority.label,
    missionAuthorityId: authority.id,
    correctAuthority: correct?.label ?? rule.correctLaneAuthority,
    correctAuthorityId: correct?.id ?? rule.correctLaneAuthority,
    category: registry.categoryLabel(rule.actionCategory),
  });

  return {
    verdict: {
      kind: "block",
      actionCategory: rule.actionCategory,
      remediation,
      ruleId: rule.id,
      matchedSpan: winner.matchedText,
      missionAuthorityId: authority.id,
      correctAuthorityId: correct?.id ?? rule.correctLaneAuthority,
    },
    matches,
    degradedReason: null,
  };
}

/**
 * Guardrail classifier with audit. Every verdict is recorded with the
 * matched rule, the mission id and a timestamp.
 */
export class GuardrailClassifier {
  constructor(
    private readonly audit: AuditSink,
    private readonly log: EngineLogger
  ) {}

  classify(args: {
    registry: PolicyRegistry;
    requestText: unknown;
    authorityId: string;
    missionId: string;
    scope?: string;
  }): GuardrailEvaluation {
    const evaluation = evaluateGuardrails(args.registry, args.requestText, args.authorityId);
    const { verdict } = evaluation;

    if (verdict.kind === "block") {
      this.log.info(
        {
          missionId: args.missionId,
          scope: args.scope ?? "request",
          ruleId: verdict.ruleId,
          actionCategory: verdict.actionCategory,
        },
        "guardrail.blocked"
      );
    } else if (verdict.degraded) {
      this.log.warn(
        { missionId: args.missionId, scope: args.scope ?? "request", reason: evaluation.degradedReason },
        "guardrail.classifier_degraded"
      );
    }

    emitAudit(this.audit, this.log, "guardrail.verdict", args.missionId, {
      scope: args.scope ?? "request",
      verdict: verdict.kind,
      ruleId: verdict.kind === "block" ? verdict.ruleId : null,
      actionCategory: verdict.kind === "block" ? verdict.actionCategory : null,
      matchedRules: evaluation.matches.map((match) => match.ruleId),
      classifierDegraded: verdict.kind === "allow" && verdict.degraded,
      degradedReason: evaluation.degradedReason,
      authorityId: args.authorityId,
      registryVersion: args.registry.version,
    });

    return evaluation;
  }
}
