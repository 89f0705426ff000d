/**
 * Language hint for cached lyrics. A heuristic, never used for identity.
 */

export type LanguageHint = "japanese" | "english" | "unknown";

// Hiragana, katakana, CJK ideographs (incl. extension A), halfwidth katakana
const JAPANESE_PATTERN = /[぀-ゟ゠-ヿ㐀-䶿一-鿿ｦ-ﾟ]/;
const LATIN_PATTERN = /[A-Za-z]/;

export function detectLanguage(text: string): LanguageHint {
  if (JAPANESE_PATTERN.test(text)) {
    return "japanese";
  }
  if (LATIN_PATTERN.test(text)) {
    return "english";
  }
  return "unknown";
}
