/**
 * Guardrail verdicts are data, not exceptions. Callers switch on `kind`.
 */

export type AllowVerdict = {
  kind: "allow";
  // Input could not be classified (malformed/oversized); allowed fail-open.
  degraded: boolean;
  // Rules that matched but whose category the authority permits.
  allowedMatches: string[];
};

export type BlockVerdict = {
  kind: "block";
  actionCategory: string;
  remediation: string;
  ruleId: string | null;
  matchedSpan: string | null;
  missionAuthorityId: string | null;
  correctAuthorityId: string | null;
};

export type Verdict = AllowVerdict | BlockVerdict;

export const POLICY_CONFIG_CATEGORY = "policy_config" as const;
export const TEMPLATE_INELIGIBLE_CATEGORY = "template_ineligible" as const;
