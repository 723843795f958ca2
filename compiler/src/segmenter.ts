/**
 * segmenter.ts
 *
 * Splits rules text into ability blocks.
 *
 * A block ends at a sentence terminator ([.!?]) followed by whitespace and an
 * uppercase letter or an opening brace (the start of a cost like "{T}:").
 * Line breaks are swapped for a non-whitespace marker before splitting, so a
 * keyword list or a bulleted mode list stays inside the block it belongs to.
 */

import type { AbilityBlock } from './types';

const LINE_BREAK_MARKER = '\u0000';

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+(?=[A-Z{])/g;

function restoreLineBreaks(text: string): string {
  return text.split(LINE_BREAK_MARKER).join('\n');
}

/**
 * Lazily yield the ability blocks of a card's rules text.
 *
 * The separator whitespace is kept at the end of the preceding block, so
 * joining every block's raw text gives back the input.
 */
export function* segmentAbilityText(text: string): Generator<AbilityBlock, void, undefined> {
  if (!text.trim()) return;

  // One character in, one character out: offsets match the input
  const marked = text.split('\n').join(LINE_BREAK_MARKER);

  let start = 0;
  for (const boundary of marked.matchAll(SENTENCE_BOUNDARY)) {
    const end = (boundary.index ?? 0) + boundary[0].length;
    yield { raw: restoreLineBreaks(marked.slice(start, end)), offset: start };
    start = end;
  }
  yield { raw: restoreLineBreaks(marked.slice(start)), offset: start };
}

/**
 * Text of a block with the surrounding whitespace removed
 */
export function blockText(block: AbilityBlock): string {
  return block.raw.trim();
}
