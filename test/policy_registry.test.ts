import { describe, it, expect } from "vitest";

import { PolicyConfigError } from "../src/errors";
import { PolicyRegistry, authorityKey, loadPolicyRegistry } from "../src/policy/policy_registry";
import { PolicyRegistryHandle } from "../src/policy/registry_handle";
import { loadTestRegistry, readPolicyConfig } from "./helpers";

function configErrorCode(fn: () => unknown): string | null {
  try {
    fn();
  } catch (error) {
    if (error instanceof PolicyConfigError) return error.code;
    throw error;
  }
  return null;
}

describe("PolicyRegistry", () => {
  const registry = loadTestRegistry();

  it("loads the bundled policy with a content-derived version", () => {
    expect(registry.version).toMatch(/^[0-9a-f]{16}$/);
    expect(loadTestRegistry().version).toBe(registry.version);
    expect(registry.templates.map((t) => t.id)).toEqual([
      "full_intrep_v1",
      "sigint_geoint_fusion_v1",
      "leo_case_summary_v1",
      "humint_source_summary_v1",
      "osint_brief_v1",
    ]);
  });

  it("resolves legacy and loosely formatted authority ids", () => {
    expect(authorityKey("title-10")).toBe("TITLE10");
    expect(registry.findAuthority("Title10")?.id).toBe("TITLE_10_MIL");
    expect(registry.findAuthority("t10 mil")?.id).toBe("TITLE_10_MIL");
    expect(registry.findAuthority("fbi_doj")?.id).toBe("LEO");
    expect(registry.findAuthority("TITLE_99")).toBeNull();
  });

  it("fails closed on an unknown authority", () => {
    expect(configErrorCode(() => registry.resolveAuthority("TITLE_99"))).toBe("unknown_authority");
  });

  it("derives effective prohibitions from declarations and rules", () => {
    const title10 = registry.resolveAuthority("TITLE_10_MIL");
    expect(registry.effectiveBlockedCategories(title10)).toEqual([
      "covert_action",
      "domestic_arrest",
      "warrantless_surveillance",
    ]);
  });

  it("warns about lanes the authority may not collect", () => {
    const leo = registry.resolveAuthority("LEO");
    expect(registry.laneAuthorizationWarnings(leo, ["osint", "MASINT"])).toEqual([
      "MASINT – Measurement & Signature is not authorized under the Law Enforcement lane.",
    ]);
  });

  it("is immutable after load", () => {
    expect(Object.isFrozen(registry.templates)).toBe(true);
    expect(Object.isFrozen(registry.templates[0].sections[0])).toBe(true);
    expect(Object.isFrozen(registry.rules[0].phrases)).toBe(true);
  });

  it("rejects schema violations", () => {
    expect(configErrorCode(() => PolicyRegistry.fromConfig({}))).toBe("schema_invalid");
  });

  it("rejects duplicate ids", () => {
    const config = readPolicyConfig();
    config.authorities.push({ ...config.authorities[0] });
    expect(configErrorCode(() => PolicyRegistry.fromConfig(config))).toBe("duplicate_id");
  });

  it("rejects an alias claimed by two authorities", () => {
    const config = readPolicyConfig();
    config.authorities[1].aliases.push("Title 10");
    expect(configErrorCode(() => PolicyRegistry.fromConfig(config))).toBe("duplicate_id");
  });

  it("rejects references to undeclared lanes", () => {
    const config = readPolicyConfig();
    config.templates[0].expectedIntLanes = ["NOPE"];
    expect(configErrorCode(() => PolicyRegistry.fromConfig(config))).toBe("unknown_reference");
  });

  it("rejects rules pointing at an unknown authority", () => {
    const config = readPolicyConfig();
    config.rules[0].correctLaneAuthority = "NOBODY";
    expect(configErrorCode(() => PolicyRegistry.fromConfig(config))).toBe("unknown_reference");
  });

  it("rejects a category that is both allowed and blocked", () => {
    const config = readPolicyConfig();
    config.authorities[0].blockedActionCategories.push("military_deployment");
    expect(configErrorCode(() => PolicyRegistry.fromConfig(config))).toBe("contradictory_category");
  });

  it("reports an unreadable source", () => {
    expect(configErrorCode(() => loadPolicyRegistry("/nonexistent/policy.json"))).toBe("source_unreadable");
  });
});

describe("PolicyRegistryHandle", () => {
  it("swaps in a new registry on reload", () => {
    const first = PolicyRegistry.fromConfig(readPolicyConfig());
    const changed = readPolicyConfig();
    changed.analysis.priorityLimit = 3;
    const second = PolicyRegistry.fromConfig(changed);
    const queue = [first, second];

    const handle = new PolicyRegistryHandle(() => queue.shift() ?? second);
    expect(handle.current()).toBe(first);

    const next = handle.reload();
    expect(next).toBe(second);
    expect(handle.current().analysis.priorityLimit).toBe(3);
    expect(second.version).not.toBe(first.version);
  });

  it("keeps the active registry when reload fails", () => {
    const first = PolicyRegistry.fromConfig(readPolicyConfig());
    let calls = 0;
    const handle = new PolicyRegistryHandle(() => {
      calls += 1;
      if (calls === 1) return first;
      return PolicyRegistry.fromConfig({ intLanes: [] });
    });

    expect(() => handle.reload()).toThrow(PolicyConfigError);
    expect(handle.current()).toBe(first);
  });
});
