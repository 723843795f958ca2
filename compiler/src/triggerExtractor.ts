/**
 * triggerExtractor.ts
 *
 * Turns the condition clause of a triggered ability ("Whenever this creature
 * attacks") or the timing of a periodic one ("your upkeep") into a trigger
 * descriptor. Rules are ordered most specific first.
 */

import { Phase, TriggerMode, type TriggerDescriptor } from './types';

export interface TriggerRule {
  readonly name: string;
  readonly matches: (condition: string) => boolean;
  readonly build: (condition: string) => TriggerDescriptor;
}

const SELF_ENTERS: TriggerDescriptor = {
  mode: TriggerMode.CHANGES_ZONE,
  attributes: [
    ['Destination', 'Battlefield'],
    ['ValidCard', 'Card.Self'],
    ['TriggerZones', 'Battlefield'],
  ],
};

/**
 * Condition rules, tested against the lower-cased clause with its
 * leading "when"/"whenever" removed
 */
export const TRIGGER_RULES: readonly TriggerRule[] = [
  {
    name: 'enters-the-battlefield',
    matches: (c) => c.includes('enters the battlefield') && !/^(?:a|an|another)\s+creature\b/.test(c),
    build: () => SELF_ENTERS,
  },
  {
    name: 'self-enters',
    matches: (c) => /^(?:this\b|~).*\benters\b/.test(c),
    build: () => SELF_ENTERS,
  },
  {
    name: 'dies',
    matches: (c) => /\bdies\b/.test(c) || c.includes('put into a graveyard'),
    build: () => ({
      mode: TriggerMode.CHANGES_ZONE,
      attributes: [
        ['Origin', 'Battlefield'],
        ['Destination', 'Graveyard'],
        ['ValidCard', 'Card.Self'],
        ['TriggerZones', 'Graveyard'],
      ],
    }),
  },
  {
    name: 'attacks',
    matches: (c) => /\battacks\b/.test(c),
    build: (c) => ({
      mode: TriggerMode.ATTACKS,
      attributes: [
        ['ValidCard', /\bcreatures? you control\b/.test(c) ? 'Creature.YouCtrl' : 'Card.Self'],
        ['TriggerZones', 'Battlefield'],
      ],
    }),
  },
  {
    name: 'discards',
    matches: (c) => /\bdiscards?\b/.test(c) && /\b(?:you|opponents?)\b/.test(c),
    build: (c) => ({
      mode: TriggerMode.DISCARD,
      attributes: [
        ...(/\bopponents?\b/.test(c) ? [['ValidCard', 'Card.OppOwn'] as const] : []),
        ['TriggerZones', 'Battlefield'],
      ],
    }),
  },
  {
    name: 'creature-enters',
    matches: (c) => /\bcreature\b/.test(c) && /\benters\b/.test(c),
    build: (c) => ({
      mode: TriggerMode.CHANGES_ZONE,
      attributes: [
        ['Destination', 'Battlefield'],
        ['ValidCard', /\byou control\b/.test(c) ? 'Creature.YouCtrl' : 'Creature'],
        ['TriggerZones', 'Battlefield'],
      ],
    }),
  },
  {
    name: 'casts',
    matches: (c) => /\bcasts?\b/.test(c),
    build: (c) => ({
      mode: TriggerMode.SPELL_CAST,
      attributes: [
        ['ValidCard', /\bopponents?\b/.test(c) ? 'Card.OppCtrl' : 'Card.YouOwn'],
        ['TriggerZones', 'Battlefield'],
      ],
    }),
  },
  {
    name: 'taps',
    matches: (c) => /\btaps\b|\btapped\b/.test(c),
    build: () => ({
      mode: TriggerMode.TAPS,
      attributes: [['TriggerZones', 'Battlefield']],
    }),
  },
  {
    name: 'sacrifice',
    matches: (c) => /\bsacrifices?\b/.test(c),
    build: () => ({
      mode: TriggerMode.CHANGES_ZONE,
      attributes: [
        ['Destination', 'Graveyard'],
        ['TriggerZones', 'Graveyard'],
      ],
    }),
  },
];

/**
 * Phase timing table; first phrase contained in the timing text wins
 */
export const PHASE_TABLE: ReadonlyArray<readonly [string, Phase]> = [
  ['upkeep', Phase.UPKEEP],
  ['combat', Phase.BEGIN_COMBAT],
  ['end step', Phase.END_OF_TURN],
  ['end of turn', Phase.END_OF_TURN],
];

/**
 * Build a phase trigger from "at the beginning of" timing text
 * ("your upkeep", "each end step"). Returns null for unmapped timing.
 */
export function extractPhaseTrigger(timing: string): TriggerDescriptor | null {
  const lower = timing.toLowerCase();
  const entry = PHASE_TABLE.find(([phrase]) => lower.includes(phrase));
  if (!entry) return null;

  const attributes: Array<readonly [string, string]> = [['Phase', entry[1]]];
  if (/\byour\b/.test(lower)) {
    attributes.push(['ValidPlayer', 'You']);
  }
  attributes.push(['TriggerZones', 'Battlefield']);
  return { mode: TriggerMode.PHASE, attributes };
}

/**
 * Extract a trigger descriptor from a condition clause
 * ("Whenever this creature attacks", "At the beginning of your upkeep").
 */
export function extractTrigger(clause: string): TriggerDescriptor | null {
  const lower = clause.toLowerCase().trim();

  const beginning = lower.match(/^at the beginning of\s+(.+)$/s);
  if (beginning) {
    return extractPhaseTrigger(beginning[1]);
  }

  const condition = lower.replace(/^(?:whenever|when)\s+/, '');
  const rule = TRIGGER_RULES.find((candidate) => candidate.matches(condition));
  if (rule) {
    return rule.build(condition);
  }

  // Periodic wording without the "at the beginning of" opener
  if (/\b(?:upkeep|end of turn|end step)\b/.test(condition)) {
    return extractPhaseTrigger(condition);
  }
  return null;
}

/**
 * Render a trigger descriptor, e.g. "Mode$ Attacks | ValidCard$ Card.Self"
 */
export function renderTrigger(trigger: TriggerDescriptor): string {
  return [`Mode$ ${trigger.mode}`, ...trigger.attributes.map(([key, value]) => `${key}$ ${value}`)].join(' | ');
}
