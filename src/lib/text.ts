/**
 * Island Warden — src/lib/text.ts
 * WHAT: Text normalization for matching traveler names and island names.
 * WHY: Feed lines, nicknames and channel names use accents, fancy Unicode and
 *      punctuation freely; matching works on a folded alphanumeric form.
 * FLOWS: cleanText("Ålapaap!") → "alapaap"
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Combining marks left behind by NFKD decomposition
const COMBINING_MARK_RE = /\p{M}/gu;
const NON_ALNUM_RE = /[^\p{L}\p{N}]/gu;

/**
 * NFKD-normalize, drop combining marks, keep letters and digits, lowercase.
 * NFKD also folds "mathematical" letters (𝕔𝕙𝕠𝕓𝕠𝕥) back to ASCII.
 */
export function cleanText(text: string | null | undefined): string {
  if (!text) return "";
  return text.normalize("NFKD").replace(COMBINING_MARK_RE, "").replace(NON_ALNUM_RE, "").toLowerCase();
}

/** Title-case each whitespace-separated word ("kit kat" → "Kit Kat"). */
export function titleCase(text: string): string {
  return text
    .split(/\s+/)
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(" ");
}
