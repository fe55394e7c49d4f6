/**
 * Target accent labels the product offers.
 * The placeholder synthesizer ignores the label, so unknown labels are let through.
 */

export const ACCENT_OPTIONS = [
  "american",
  "british",
  "australian",
  "indian",
  "spanish",
  "french",
  "german",
  "chinese",
  "japanese",
  "russian",
] as const;

export type AccentTarget = (typeof ACCENT_OPTIONS)[number];

/** Trim and lower-case a caller-supplied label ("  British " -> "british"). */
export function normalizeAccent(label: string): string {
  return label.trim().toLowerCase();
}

export function isKnownAccent(label: string): label is AccentTarget {
  return ACCENT_OPTIONS.some((a) => a === label);
}
