import { describe, it, expect } from "vitest";

import { MemoryAuditSink } from "../src/audit/audit_sink";
import { evaluateGuardrails, GuardrailClassifier, matchRule, renderRemediation } from "../src/gates/guardrail_classifier";
import { normalizeForMatching, normalizeRequestText } from "../src/gates/normalize_text";
import { silentLogger } from "../src/logger";
import { PolicyRegistry } from "../src/policy/policy_registry";
import { loadTestRegistry, readPolicyConfig } from "./helpers";

const registry = loadTestRegistry();

const SCENARIO_A = "Recommend arrest and prosecution options for these individuals inside the U.S.";
const SCENARIO_B = "Recommend deploying military forces to stabilise gang violence";

describe("normalizeForMatching", () => {
  it("case-folds and collapses punctuation", () => {
    expect(normalizeForMatching(SCENARIO_A)).toBe(
      "recommend arrest and prosecution options for these individuals inside the us"
    );
    expect(normalizeForMatching("Hack-back, NOW!")).toBe("hack back now");
  });

  it("reports why text cannot be classified", () => {
    expect(normalizeRequestText(undefined)).toEqual({ ok: false, reason: "not_text" });
    expect(normalizeRequestText("  ?! ")).toEqual({ ok: false, reason: "empty" });
    expect(normalizeRequestText("a ".repeat(10_001))).toEqual({ ok: false, reason: "too_long" });
  });
});

describe("evaluateGuardrails", () => {
  it("blocks domestic arrest planning under Title 10 and points to law enforcement", () => {
    const { verdict } = evaluateGuardrails(registry, SCENARIO_A, "Title10");
    expect(verdict).toEqual({
      kind: "block",
      actionCategory: "domestic_arrest",
      ruleId: "GR-001",
      matchedSpan: "arrest and prosecution options for these individuals inside the us",
      missionAuthorityId: "TITLE_10_MIL",
      correctAuthorityId: "LEO",
      remediation:
        "Title 10 – Military Operations missions may not plan domestic arrest, detention or prosecution. " +
        "Refer this request to Law Enforcement (LEO) through proper channels, or reframe it as an information-sharing product.",
    });
  });

  it("blocks military deployment under law enforcement authority", () => {
    const { verdict } = evaluateGuardrails(registry, SCENARIO_B, "LEO");
    expect(verdict.kind).toBe("block");
    if (verdict.kind !== "block") return;
    expect(verdict.actionCategory).toBe("military_deployment");
    expect(verdict.ruleId).toBe("GR-002");
    expect(verdict.matchedSpan).toBe("deploying military forces");
    expect(verdict.remediation).toBe(
      "Law Enforcement missions may not recommend deployment of military forces. " +
        "Requests for military support belong with Defense Support of Civil Authorities under civilian lead."
    );
  });

  it("allows requests with no matching rule", () => {
    const { verdict } = evaluateGuardrails(registry, "Summarise vessel movements near the harbor", "TITLE_10_MIL");
    expect(verdict).toEqual({ kind: "allow", degraded: false, allowedMatches: [] });
  });

  it("allows categories the authority permits and records the match", () => {
    const { verdict, matches } = evaluateGuardrails(registry, "Plan an airstrike on the depot", "TITLE_10_MIL");
    expect(verdict).toEqual({ kind: "allow", degraded: false, allowedMatches: ["GR-003"] });
    expect(matches.map((m) => m.ruleId)).toEqual(["GR-003"]);
  });

  it("matches whole words only", () => {
    const { verdict } = evaluateGuardrails(registry, "The arrestor hook failed on landing", "TITLE_10_MIL");
    expect(verdict.kind).toBe("allow");
  });

  it("fails open with a degraded flag on malformed input", () => {
    const notText = evaluateGuardrails(registry, 42, "LEO");
    expect(notText.verdict).toEqual({ kind: "allow", degraded: true, allowedMatches: [] });
    expect(notText.degradedReason).toBe("not_text");

    const tooLong = evaluateGuardrails(registry, "arrest ".repeat(5_000), "TITLE_10_MIL");
    expect(tooLong.verdict.kind).toBe("allow");
    expect(tooLong.degradedReason).toBe("too_long");
  });

  it("blocks with a policy_config verdict when the authority is unknown", () => {
    const { verdict } = evaluateGuardrails(registry, "Summarise harbor traffic", "TITLE_99");
    expect(verdict.kind).toBe("block");
    if (verdict.kind !== "block") return;
    expect(verdict.actionCategory).toBe("policy_config");
    expect(verdict.ruleId).toBeNull();
    expect(verdict.remediation).toContain('Mission authority "TITLE_99" is not defined');
  });

  describe("rule precedence", () => {
    function registryWithRules(phrasesA: string[], phrasesB: string[]): PolicyRegistry {
      const config = readPolicyConfig();
      config.rules = [
        {
          id: "R-A",
          actionCategory: "covert_action",
          phrases: phrasesA,
          compound: [],
          correctLaneAuthority: "TITLE_50_IC",
          remediation: "rule A",
        },
        {
          id: "R-B",
          actionCategory: "domestic_arrest",
          phrases: phrasesB,
          compound: [],
          correctLaneAuthority: "LEO",
          remediation: "rule B",
        },
      ];
      return PolicyRegistry.fromConfig(config);
    }

    it("prefers the longest matched span", () => {
      const custom = registryWithRules(["blue"], ["gray whale"]);
      const { verdict } = evaluateGuardrails(custom, "a blue boat and a gray whale", "TITLE_10_MIL");
      expect(verdict.kind === "block" && verdict.ruleId).toBe("R-B");
    });

    it("breaks span ties by declaration order", () => {
      const custom = registryWithRules(["blue"], ["gray"]);
      const { verdict } = evaluateGuardrails(custom, "gray then blue", "TITLE_10_MIL");
      expect(verdict.kind === "block" && verdict.ruleId).toBe("R-A");
    });
  });

  it("measures compound spans from the first to the last term", () => {
    const rule = registry.rules[0];
    const match = matchRule("detain them inside the us", rule, 0);
    expect(match?.matchedText).toBe("detain them inside the us");
    expect(match?.span).toBe(25);
  });
});

describe("renderRemediation", () => {
  it("fills known placeholders and leaves unknown ones intact", () => {
    expect(renderRemediation("{a} and {b}", { a: "x" })).toBe("x and {b}");
  });
});

describe("GuardrailClassifier", () => {
  it("audits every verdict with the rule and mission", () => {
    const audit = new MemoryAuditSink();
    const classifier = new GuardrailClassifier(audit, silentLogger);

    classifier.classify({ registry, requestText: SCENARIO_A, authorityId: "Title10", missionId: "m-7" });
    classifier.classify({ registry, requestText: "harbor traffic", authorityId: "Title10", missionId: "m-7", scope: "bluf" });

    const events = audit.ofType("guardrail.verdict");
    expect(events).toHaveLength(2);
    expect(events[0].missionId).toBe("m-7");
    expect(events[0].data).toMatchObject({ scope: "request", verdict: "block", ruleId: "GR-001" });
    expect(events[1].data).toMatchObject({ scope: "bluf", verdict: "allow", ruleId: null });
    expect(events[1].data.registryVersion).toBe(registry.version);
  });

  it("keeps classifying when the audit sink fails", () => {
    const classifier = new GuardrailClassifier(
      {
        record: () => {
          throw new Error("sink down");
        },
      },
      silentLogger
    );
    const { verdict } = classifier.classify({ registry, requestText: SCENARIO_B, authorityId: "LEO", missionId: "m-2" });
    expect(verdict.kind).toBe("block");
  });
});
