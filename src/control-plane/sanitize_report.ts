/**
 * Strips internal context markers that models echo back from the prompt
 * (run metadata, raw JSON paths, record ids) so the product reads as
 * finished prose.
 */
const INTERNAL_MARKERS: Array<[RegExp, string]> = [
  [/\bprovided (?:json|mission text|mission|context)(?: context)?\b/gi, "available reporting"],
  [/\bagent run advisory\b/gi, "prior analysis"],
  [/\bevidence\.incidents\[\d+\]/gi, "reported incidents"],
  [/\bevent id\s*#?\s*\d+/gi, "a reported event"],
];

export function sanitizeReportText(text: string): string {
  let out = text;
  for (const [pattern, replacement] of INTERNAL_MARKERS) {
    out = out.replace(pattern, replacement);
  }
  return out
    .replace(/[ \t]{2,}/g, " ")
    .replace(/[ \t]+([.,;:])/g, "$1")
    .trim();
}
