/**
 * Article body selection from scraped paragraph groups
 */

/** Shortest body accepted as article text */
export const MIN_ARTICLE_CHARS = 200;

/**
 * Collapse whitespace, drop empty and repeated paragraphs, join with blank lines
 */
export function joinParagraphs(paragraphs: string[]): string {
  const seen = new Set<string>();
  const kept: string[] = [];

  for (const paragraph of paragraphs) {
    const cleaned = paragraph.replace(/\s+/g, ' ').trim();
    if (cleaned === '' || seen.has(cleaned)) {
      continue;
    }
    seen.add(cleaned);
    kept.push(cleaned);
  }

  return kept.join('\n\n');
}

/**
 * Choose the article body from paragraph groups ordered by preference
 *
 * The first group reaching `minChars` wins. Returns null when none does.
 */
export function pickArticleText(groups: string[][], minChars: number = MIN_ARTICLE_CHARS): string | null {
  for (const group of groups) {
    const text = joinParagraphs(group);
    if (text.length >= minChars) {
      return text;
    }
  }
  return null;
}
