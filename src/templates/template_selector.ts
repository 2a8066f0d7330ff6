import type { Template } from "../contracts/policy_config";
import type { PolicyRegistry } from "../policy/policy_registry";

export type TemplateEligibility = {
  eligible: boolean;
  authorityAllowed: boolean;
  missingIntLanes: string[];
};

function normalizeLanes(lanes: readonly string[]): Set<string> {
  return new Set(lanes.map((code) => code.trim().toUpperCase()).filter(Boolean));
}

export function explainTemplateEligibility(
  template: Template,
  authorityId: string,
  intLanesPresent: readonly string[]
): TemplateEligibility {
  const present = normalizeLanes(intLanesPresent);
  const authorityAllowed = template.allowedAuthorities.includes(authorityId);
  const missingIntLanes = template.requiredIntLanes.filter((code) => !present.has(code));
  return {
    eligible: authorityAllowed && missingIntLanes.length === 0,
    authorityAllowed,
    missingIntLanes,
  };
}

export function compareTemplates(a: Template, b: Template): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  const byName = a.name.localeCompare(b.name, "en");
  if (byName !== 0) return byName;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Templates selectable by a mission: authority is allowed and every required
 * INT lane is present. Ordered by priority, then name, then id so identical
 * inputs always produce the same list.
 *
 * `authorityId` must already be canonical (see PolicyRegistry.resolveAuthority).
 */
export function selectTemplates(
  registry: PolicyRegistry,
  authorityId: string,
  intLanesPresent: readonly string[]
): Template[] {
  return registry.templates
    .filter((template) => explainTemplateEligibility(template, authorityId, intLanesPresent).eligible)
    .sort(compareTemplates);
}

export function describeIneligibility(
  registry: PolicyRegistry,
  template: Template,
  authorityLabel: string,
  eligibility: TemplateEligibility
): string {
  const reasons: string[] = [];
  if (!eligibility.authorityAllowed) {
    reasons.push(`${template.name} is not authorized for ${authorityLabel} missions.`);
  }
  if (eligibility.missingIntLanes.length > 0) {
    const labels = eligibility.missingIntLanes.map((code) => registry.laneLabel(code)).join(", ");
    reasons.push(`${template.name} requires INT lanes not present on this mission: ${labels}.`);
  }
  return reasons.join(" ");
}
