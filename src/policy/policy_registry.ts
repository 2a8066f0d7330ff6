import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";

import {
  PolicyConfigSchema,
  type ActionCategory,
  type AnalysisSettings,
  type Authority,
  type GuardrailRule,
  type IntLane,
  type PolicyConfig,
  type Template,
} from "../contracts/policy_config";
import { PolicyConfigError, errorMessage } from "../errors";

/**
 * Authority ids are matched case-insensitively with separators ignored, so
 * "Title10", "TITLE_10" and "title-10" resolve to the same key.
 */
export function authorityKey(id: string): string {
  return id.trim().toUpperCase().replace(/[^A-Z0-9]/g, "");
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function assertUnique(ids: string[], what: string): void {
  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      throw new PolicyConfigError("duplicate_id", `Duplicate ${what}: ${id}`, { what, id });
    }
    seen.add(id);
  }
}

/**
 * Immutable policy table: authorities, INT lanes, guardrail rules and the
 * template catalog. Never mutated after construction; a reload builds a new
 * instance (see PolicyRegistryHandle).
 */
export class PolicyRegistry {
  readonly version: string;
  readonly analysis: AnalysisSettings;
  readonly rules: readonly GuardrailRule[];
  readonly templates: readonly Template[];

  private readonly authorities = new Map<string, Authority>();
  private readonly authorityKeys = new Map<string, string>();
  private readonly lanes = new Map<string, IntLane>();
  private readonly categories = new Map<string, ActionCategory>();
  private readonly templatesById = new Map<string, Template>();

  private constructor(config: PolicyConfig) {
    const frozen = deepFreeze(config);
    this.version = createHash("sha256").update(JSON.stringify(frozen)).digest("hex").slice(0, 16);
    this.analysis = frozen.analysis;
    this.rules = frozen.rules;
    this.templates = frozen.templates;

    for (const lane of frozen.intLanes) this.lanes.set(lane.code, lane);
    for (const category of frozen.actionCategories) this.categories.set(category.id, category);
    for (const template of frozen.templates) this.templatesById.set(template.id, template);
    for (const authority of frozen.authorities) {
      this.authorities.set(authority.id, authority);
      for (const key of [authority.id, ...authority.aliases].map(authorityKey)) {
        const existing = this.authorityKeys.get(key);
        if (existing && existing !== authority.id) {
          throw new PolicyConfigError("duplicate_id", `Authority key ${key} is claimed by ${existing} and ${authority.id}`, {
            key,
          });
        }
        this.authorityKeys.set(key, authority.id);
      }
    }

    this.crossCheck(frozen);
  }

  static fromConfig(input: unknown): PolicyRegistry {
    const parsed = PolicyConfigSchema.safeParse(input);
    if (!parsed.success) {
      throw new PolicyConfigError("schema_invalid", "Policy configuration failed validation", {
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }
    const config = parsed.data;
    assertUnique(config.intLanes.map((l) => l.code), "INT lane");
    assertUnique(config.actionCategories.map((c) => c.id), "action category");
    assertUnique(config.authorities.map((a) => a.id), "authority");
    assertUnique(config.rules.map((r) => r.id), "guardrail rule");
    assertUnique(config.templates.map((t) => t.id), "template");
    for (const template of config.templates) {
      assertUnique(template.sections.map((s) => s.id), `section in ${template.id}`);
    }
    return new PolicyRegistry(config);
  }

  private crossCheck(config: PolicyConfig): void {
    const requireLane = (code: string, where: string) => {
      if (!this.lanes.has(code)) {
        throw new PolicyConfigError("unknown_reference", `Unknown INT lane ${code} in ${where}`, { code, where });
      }
    };
    const requireCategory = (id: string, where: string) => {
      if (!this.categories.has(id)) {
        throw new PolicyConfigError("unknown_reference", `Unknown action category ${id} in ${where}`, { id, where });
      }
    };
    const requireAuthority = (id: string, where: string) => {
      if (!this.authorities.has(id)) {
        throw new PolicyConfigError("unknown_reference", `Unknown authority ${id} in ${where}`, { id, where });
      }
    };

    for (const authority of config.authorities) {
      const where = `authority ${authority.id}`;
      authority.allowedIntLanes.forEach((code) => requireLane(code, where));
      for (const code of authority.foundationalIntLanes) {
        requireLane(code, where);
        if (!authority.allowedIntLanes.includes(code)) {
          throw new PolicyConfigError(
            "contradictory_category",
            `Foundational lane ${code} is not allowed under ${authority.id}`,
            { authority: authority.id, code }
          );
        }
      }
      authority.allowedActionCategories.forEach((id) => requireCategory(id, where));
      authority.blockedActionCategories.forEach((id) => requireCategory(id, where));
      const overlap = authority.allowedActionCategories.filter((id) =>
        authority.blockedActionCategories.includes(id)
      );
      if (overlap.length > 0) {
        throw new PolicyConfigError(
          "contradictory_category",
          `Authority ${authority.id} both allows and blocks: ${overlap.join(", ")}`,
          { authority: authority.id, overlap }
        );
      }
    }

    for (const rule of config.rules) {
      const where = `rule ${rule.id}`;
      requireCategory(rule.actionCategory, where);
      requireAuthority(rule.correctLaneAuthority, where);
      if (rule.phrases.length === 0 && rule.compound.length === 0) {
        throw new PolicyConfigError("schema_invalid", `Rule ${rule.id} declares no triggers`, { rule: rule.id });
      }
    }

    for (const template of config.templates) {
      const where = `template ${template.id}`;
      template.requiredIntLanes.forEach((code) => requireLane(code, where));
      template.expectedIntLanes.forEach((code) => requireLane(code, where));
      template.allowedAuthorities.forEach((id) => requireAuthority(id, where));
    }

    config.analysis.genericExpectedIntLanes.forEach((code) => requireLane(code, "analysis"));
  }

  findAuthority(id: string): Authority | null {
    const canonical = this.authorityKeys.get(authorityKey(id));
    return canonical ? (this.authorities.get(canonical) ?? null) : null;
  }

  /**
   * Fails closed: a mission referencing an unknown authority is a
   * configuration defect.
   */
  resolveAuthority(id: string): Authority {
    const authority = this.findAuthority(id);
    if (!authority) {
      throw new PolicyConfigError("unknown_authority", `Unknown authority: ${id}`, { authorityId: id });
    }
    return authority;
  }

  listAuthorities(): Authority[] {
    return Array.from(this.authorities.values());
  }

  getTemplate(id: string): Template | null {
    return this.templatesById.get(id) ?? null;
  }

  laneLabel(code: string): string {
    return this.lanes.get(code)?.label ?? code;
  }

  categoryLabel(id: string): string {
    return this.categories.get(id)?.label ?? id;
  }

  /** Declared prohibitions plus every rule category the authority does not allow. */
  effectiveBlockedCategories(authority: Authority): string[] {
    const blocked = new Set(authority.blockedActionCategories);
    for (const rule of this.rules) {
      if (!authority.allowedActionCategories.includes(rule.actionCategory)) {
        blocked.add(rule.actionCategory);
      }
    }
    return Array.from(blocked).sort();
  }

  laneAuthorizationWarnings(authority: Authority, lanesPresent: readonly string[]): string[] {
    const normalized = Array.from(new Set(lanesPresent.map((code) => code.trim().toUpperCase()).filter(Boolean)));
    return normalized
      .filter((code) => !authority.allowedIntLanes.includes(code))
      .map((code) => `${this.laneLabel(code)} is not authorized under the ${authority.label} lane.`);
  }
}

export function loadPolicyRegistry(path: string): PolicyRegistry {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new PolicyConfigError("source_unreadable", `Cannot read policy config at ${path}: ${errorMessage(error)}`, {
      path,
    });
  }
  return PolicyRegistry.fromConfig(raw);
}
