/**
 * Keyword Matcher
 *
 * Case-insensitive substring search for the configured bulletin keywords
 */

/**
 * Return the keywords contained in text, in the order given.
 * Duplicate keywords are reported once.
 */
export function matchKeywords(text: string, keywords: readonly string[]): string[] {
  const haystack = text.toLowerCase();
  const matches: string[] = [];

  for (const keyword of keywords) {
    if (matches.includes(keyword)) {
      continue;
    }
    if (haystack.includes(keyword.toLowerCase())) {
      matches.push(keyword);
    }
  }

  return matches;
}
