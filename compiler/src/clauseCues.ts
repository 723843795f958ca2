/**
 * Parameter extraction shared by the effect resolver and the static
 * ability heuristics: magnitudes, durations, counter types, affected sets.
 */

import { collapseWhitespace, WORD_TO_NUMBER } from '../../shared/src/textUtils';
import type { Duration } from './types';

// =============================================================================
// MAGNITUDE
// =============================================================================

// An integer that is not part of a power/toughness pattern like "+1/+1" or "2/2"
const INTEGER = String.raw`(?<![+\-−/\d])(\d+)(?![/\d])`;

// Up to three words may sit between the number and its unit ("2 1/1 goblin tokens")
const FILLER_WORDS = String.raw`(?:[\w/+\-−']+\s+){0,3}?`;

const NUMBER_WORDS = Object.keys(WORD_TO_NUMBER).join('|');

function wordValue(word: string): string {
  return String(WORD_TO_NUMBER[word.toLowerCase()] ?? 1);
}

// Digit runs stay text; only leading zeros are dropped
function digits(value: string): string {
  return value.replace(/^0+(?=\d)/, '');
}

/**
 * Extract the magnitude of an effect.
 *
 * Lookup order: an integer next to the unit word, the first integer
 * literal in the clause, a number word next to the unit, the first number
 * word in the clause. Defaults to 1.
 * The result is the decimal text of the magnitude.
 *
 * @param unit Singular unit noun ("card", "life", "damage"); empty for none
 */
export function extractMagnitude(text: string, unit: string = ''): string {
  if (unit) {
    const anchored = text.match(new RegExp(`${INTEGER}\\s+${FILLER_WORDS}${unit}`, 'i'));
    if (anchored) return digits(anchored[1]);
  }

  const literal = text.match(new RegExp(INTEGER));
  if (literal) return digits(literal[1]);

  if (unit) {
    const anchoredWord = text.match(new RegExp(`\\b(${NUMBER_WORDS})\\s+${FILLER_WORDS}${unit}`, 'i'));
    if (anchoredWord) return wordValue(anchoredWord[1]);
  }

  const word = text.match(new RegExp(`\\b(${NUMBER_WORDS})\\b`, 'i'));
  return word ? wordValue(word[1]) : '1';
}

// =============================================================================
// DURATION
// =============================================================================

export function extractDuration(text: string): Duration {
  return /until end of turn/i.test(text) ? 'EndOfTurn' : 'Permanent';
}

// =============================================================================
// COUNTERS
// =============================================================================

const COUNTER_TYPES: ReadonlyArray<readonly [string, string]> = [
  ['+1/+1', 'P1P1'],
  ['-1/-1', 'M1M1'],
  ['drunken', 'DRUNKEN'],
  ['stun', 'STUN'],
  ['obsession', 'OBSESSION'],
  ['charge', 'CHARGE'],
  ['loyalty', 'LOYALTY'],
  ['haze', 'HAZE'],
  ['lost family', 'LOST_FAMILY'],
  ['oil', 'OIL'],
  ['shield', 'SHIELD'],
];

export const GENERIC_COUNTER_TYPE = 'GENERIC';

/**
 * Look up the counter type named in a clause
 */
export function extractCounterType(text: string): string {
  // Oracle text prints a minus sign, card exports often a hyphen
  const lower = text.toLowerCase().replace(/−/g, '-');
  for (const [name, counterType] of COUNTER_TYPES) {
    if (new RegExp(`(?<![\\w+\\-/])${escapeRegExp(name)}(?![\\w/])`).test(lower)) {
      return counterType;
    }
  }
  return GENERIC_COUNTER_TYPE;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// =============================================================================
// TARGETS AND AFFECTED SETS
// =============================================================================

export interface TargetSpec {
  /** ValidTgts$ filter */
  readonly valid: string;
  /** Noun used in the target prompt */
  readonly noun: string;
}

const TARGET_TYPES: ReadonlyArray<readonly [RegExp, TargetSpec]> = [
  [/\btarget creature\b/, { valid: 'Creature', noun: 'creature' }],
  [/\btarget artifact\b/, { valid: 'Artifact', noun: 'artifact' }],
  [/\btarget enchantment\b/, { valid: 'Enchantment', noun: 'enchantment' }],
  [/\btarget land\b/, { valid: 'Land', noun: 'land' }],
  [/\btarget planeswalker\b/, { valid: 'Planeswalker', noun: 'planeswalker' }],
  [/\btarget opponent\b/, { valid: 'Player.Opponent', noun: 'opponent' }],
  [/\btarget player\b/, { valid: 'Player', noun: 'player' }],
  [/\btarget spell\b/, { valid: 'Card', noun: 'spell' }],
  [/\btarget permanent\b/, { valid: 'Permanent', noun: 'permanent' }],
];

const ANY_TARGET: TargetSpec = { valid: 'Any', noun: 'any' };

/**
 * Target named in a lower-cased clause ("target creature" → Creature),
 * or null when the clause does not target
 */
export function extractTarget(lower: string): TargetSpec | null {
  for (const [pattern, spec] of TARGET_TYPES) {
    if (pattern.test(lower)) return spec;
  }
  return /\btarget\b/.test(lower) ? ANY_TARGET : null;
}

/**
 * Target parameters in script form
 */
export function targetParams(target: TargetSpec): Array<[string, string]> {
  const prompt = target === ANY_TARGET ? 'Select any target' : `Select target ${target.noun}`;
  return [
    ['ValidTgts', target.valid],
    ['TgtPrompt', prompt],
  ];
}

/**
 * Affected-set filter for continuous effects
 */
export function extractAffected(text: string): string {
  const lower = text.toLowerCase();
  if (/\bcreatures? you control\b/.test(lower)) return 'Creature.YouCtrl';
  if (/\bcreatures your opponents control\b/.test(lower)) return 'Creature.OppCtrl';
  if (/\ball creatures\b|\beach creature\b/.test(lower)) return 'Creature';
  if (/\benchanted creature\b/.test(lower)) return 'Creature.EnchantedBy';
  if (/\bequipped creature\b/.test(lower)) return 'Creature.EquippedBy';
  return 'Card.Self';
}

// =============================================================================
// DESCRIPTIONS
// =============================================================================

export const TRIGGER_DESCRIPTION_LENGTH = 80;
export const SPELL_DESCRIPTION_LENGTH = 100;

/**
 * Single-line description embedded in an ability line
 */
export function describeAbility(text: string, maxLength: number): string {
  return collapseWhitespace(text).slice(0, maxLength);
}
