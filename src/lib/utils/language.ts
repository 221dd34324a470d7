/**
 * Script-based language heuristic
 * Flags text written mostly outside the Latin alphabet. Good enough to keep
 * an English-only idea pool clean; not a real language identifier.
 */

// Hiragana, Katakana, CJK ideographs, Hangul, Arabic, Cyrillic
const NON_LATIN_SCRIPT = /[぀-ゟ゠-ヿ一-鿿가-힯؀-ۿЀ-ӿ]/;
const LATIN_OR_PUNCTUATION = /[a-zA-Z0-9\s.,!?;:'"()\-]/g;

export function isNonEnglish(text: string): boolean {
  if (!text) return false;

  if (NON_LATIN_SCRIPT.test(text)) return true;

  // Mostly non-ASCII text is unlikely to be English; short strings are skipped
  const latin = text.match(LATIN_OR_PUNCTUATION)?.length ?? 0;
  return text.length > 10 && latin / text.length < 0.5;
}

/**
 * Check title first, then the body when it is long enough to judge
 */
export function looksNonEnglish(item: { title: string; content: string }): boolean {
  if (isNonEnglish(item.title)) return true;
  return item.content.length > 50 && isNonEnglish(item.content);
}
