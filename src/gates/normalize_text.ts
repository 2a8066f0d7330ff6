export const MAX_REQUEST_CHARS = 20_000;

export type NormalizedText =
  | { ok: true; text: string }
  | { ok: false; reason: "not_text" | "empty" | "too_long" };

/**
 * Case-fold and strip punctuation. Periods and apostrophes are removed
 * outright so abbreviations collapse ("U.S." -> "us"); any other
 * non-alphanumeric run becomes a single space.
 */
export function normalizeForMatching(value: string): string {
  return value
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[.'’]/g, "")
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

export function normalizeRequestText(value: unknown): NormalizedText {
  if (typeof value !== "string") {
    return { ok: false, reason: "not_text" };
  }
  if (value.length > MAX_REQUEST_CHARS) {
    return { ok: false, reason: "too_long" };
  }
  const text = normalizeForMatching(value);
  if (!text) {
    return { ok: false, reason: "empty" };
  }
  return { ok: true, text };
}
