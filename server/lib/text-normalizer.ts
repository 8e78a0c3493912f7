/**
 * Text Normalizer
 *
 * Every comparison between a job description and a profile goes through
 * normalizeText on both sides. Only the accents in ACCENT_FOLDING are folded.
 */

const ACCENT_FOLDING: Readonly<Record<string, string>> = Object.freeze({
  "á": "a",
  "ã": "a",
  "â": "a",
  "à": "a",
  "é": "e",
  "ê": "e",
  "í": "i",
  "ó": "o",
  "õ": "o",
  "ô": "o",
  "ú": "u",
  "ç": "c",
});

const ACCENT_PATTERN = new RegExp(`[${Object.keys(ACCENT_FOLDING).join("")}]`, "g");

/**
 * Lowercase, fold accents and collapse whitespace.
 * Missing input yields an empty string.
 */
export function normalizeText(text: string | null | undefined): string {
  if (!text) return "";

  return text
    .toLowerCase()
    .replace(ACCENT_PATTERN, (char) => ACCENT_FOLDING[char] ?? char)
    .replace(/\s+/g, " ")
    .trim();
}
