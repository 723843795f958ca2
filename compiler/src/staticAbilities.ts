/**
 * Static (continuous) ability heuristics
 *
 * Covers the three shapes that can be scripted without understanding the
 * sentence: power/toughness modifiers, keyword grants and restrictions.
 * Anything else that reads as continuous becomes a description-only
 * Continuous line.
 */

import { collapseWhitespace } from '../../shared/src/textUtils';
import { extractAffected, extractDuration } from './clauseCues';
import type { AbilityLine, ScriptParams } from './types';

const PT_MODIFIER = /gets?\s+([+\-−]\d+)\/([+\-−]\d+)/;

/**
 * Keywords a static ability can grant
 */
export const GRANTABLE_KEYWORDS: readonly string[] = [
  'vigilance', 'flying', 'trample', 'haste', 'first strike', 'double strike',
  'indestructible', 'hexproof', 'shroud', 'reach', 'lifelink', 'menace',
  'deathtouch', 'defender', 'flash', 'ward',
];

function titleCase(keyword: string): string {
  return keyword.replace(/\b\w/g, (letter) => letter.toUpperCase());
}

function normalizeMinus(value: string): string {
  return value.replace('−', '-');
}

function staticLine(params: ScriptParams, text: string): AbilityLine {
  return {
    kind: 'static',
    params: [['Mode', 'Continuous'], ...params],
    description: collapseWhitespace(text),
  };
}

function parsePtModifier(text: string): AbilityLine | null {
  const match = text.match(PT_MODIFIER);
  if (!match) return null;

  return staticLine(
    [
      ['Affected', extractAffected(text)],
      ['AddPower', normalizeMinus(match[1])],
      ['AddToughness', normalizeMinus(match[2])],
      ['Duration', extractDuration(text)],
    ],
    text
  );
}

function parseKeywordGrant(text: string): AbilityLine | null {
  const lower = text.toLowerCase();
  const found = GRANTABLE_KEYWORDS.filter((keyword) => new RegExp(`\\b${keyword}\\b`).test(lower));
  if (found.length === 0) return null;

  return staticLine(
    [
      ['Affected', extractAffected(text)],
      ['AddKeyword', found.map(titleCase).join(' & ')],
      ['Duration', extractDuration(text)],
    ],
    text
  );
}

/**
 * Build the static ability line for a block classified as static, or null
 * when a modifier or keyword sentence carries nothing scriptable
 */
export function parseStaticAbility(text: string): AbilityLine | null {
  if (/\bgets?\s/.test(text)) {
    return parsePtModifier(text);
  }
  if (/can't|cannot/.test(text)) {
    return staticLine([], text);
  }
  if (/\b(?:has|have)\s/.test(text)) {
    return parseKeywordGrant(text);
  }
  return staticLine([], text);
}
