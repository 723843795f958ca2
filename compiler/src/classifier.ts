/**
 * classifier.ts
 *
 * Assigns each ability block exactly one category. CLASSIFICATION_RULES is
 * an ordered decision list and the first match wins: the later rules are
 * broader and would swallow modal and triggered text if tried first.
 */

import { blockText } from './segmenter';
import { AbilityCategory, type AbilityBlock, type ClassifiedCategory } from './types';

export interface ClassificationRule {
  readonly category: ClassifiedCategory;
  readonly matches: (text: string) => boolean;
}

/**
 * Words that mark a continuous effect
 */
export const STATIC_MARKERS: readonly string[] = ['gets ', 'have ', 'has ', "can't", "doesn't", 'is ', 'are '];

export const MODAL_HEADER = /\bchoose (?:one|two|three|four|up to|any number)\b/i;

export const ACTIVATED_COST_PREFIX = /^\{.+?\}:/;

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    category: AbilityCategory.MODAL,
    matches: (text) => MODAL_HEADER.test(text) && (text.includes('—') || text.includes('-')),
  },
  { category: AbilityCategory.TRIGGERED, matches: (text) => text.startsWith('Whenever ') },
  { category: AbilityCategory.TRIGGERED, matches: (text) => text.startsWith('When ') },
  { category: AbilityCategory.PERIODIC, matches: (text) => text.startsWith('At the beginning of ') },
  {
    category: AbilityCategory.UPKEEP_COST,
    matches: (text) => text.includes('Upkeep—') || text.includes('Upkeep:'),
  },
  { category: AbilityCategory.ACTIVATED, matches: (text) => ACTIVATED_COST_PREFIX.test(text) },
  {
    category: AbilityCategory.STATIC,
    matches: (text) => STATIC_MARKERS.some((marker) => text.includes(marker)),
  },
];

/**
 * Classify a trimmed piece of rules text
 */
export function classifyText(text: string): ClassifiedCategory {
  const rule = CLASSIFICATION_RULES.find((candidate) => candidate.matches(text));
  return rule?.category ?? AbilityCategory.SPELL_EFFECT;
}

/**
 * Classify an ability block.
 *
 * Never returns UNRECOGNIZED; a block only degrades to that category when
 * its handler cannot extract anything.
 */
export function classifyBlock(block: AbilityBlock): ClassifiedCategory {
  return classifyText(blockText(block));
}
