/**
 * Shared utility functions for parsing text
 */

/**
 * Word to number mapping for parsing rules text
 * Supports the English number words printed on cards
 */
export const WORD_TO_NUMBER: Readonly<Record<string, number>> = {
  'one': 1, 'two': 2, 'three': 3, 'four': 4, 'five': 5,
  'six': 6, 'seven': 7, 'eight': 8, 'nine': 9, 'ten': 10,
  'a': 1, 'an': 1,
};

/**
 * Read a count written as digits or as a number word ("3", "three", "a").
 * Falls back to defaultValue for anything else.
 */
export function parseNumberFromText(text: string, defaultValue: number = 1): number {
  const word = text.toLowerCase().trim();
  if (Object.hasOwn(WORD_TO_NUMBER, word)) return WORD_TO_NUMBER[word];
  return /^\d+$/.test(word) ? Number(word) : defaultValue;
}

/**
 * Entities that survive a card export (MSE writes some of them twice encoded)
 */
const HTML_ENTITIES: ReadonlyArray<readonly [string, string]> = [
  ['&apos;', "'"],
  ['&#39;', "'"],
  ['&quot;', '"'],
  ['&lt;', '<'],
  ['&gt;', '>'],
  // Must stay last: "&amp;quot;" decodes to "&quot;"
  ['&amp;', '&'],
];

/**
 * Decode the HTML entities that appear in exported rules text
 */
export function decodeHtmlEntities(text: string): string {
  let decoded = text;
  for (const [entity, replacement] of HTML_ENTITIES) {
    decoded = decoded.split(entity).join(replacement);
  }
  return decoded;
}

/**
 * Flatten line breaks and runs of whitespace into single spaces
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
