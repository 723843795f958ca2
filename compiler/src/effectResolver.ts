/**
 * effectResolver.ts
 *
 * Maps an effect clause ("you gain 1 life", "draw two cards") to an effect
 * token: an effect kind plus its script parameters.
 *
 * Resolution walks EFFECT_RULES in order and the first predicate that holds
 * decides the kind. Overlapping phrasings are settled by that order and by
 * word boundaries in the predicates:
 * - life gain before life loss, opponent life loss before plain life loss
 * - damage needs "deal"/"deals", never "damage" alone
 * - "untap" never matches the tap rule
 * - countering a spell is never "put a counter on"
 */

import {
  extractCounterType,
  extractMagnitude,
  extractTarget,
  targetParams,
} from './clauseCues';
import {
  EffectKind,
  type EffectToken,
  type ResolvedEffect,
  type ResolvedEffectKind,
  type ScriptParams,
} from './types';

type Param = [string, string];

const SELF: Param = ['Defined', 'Self'];

export interface EffectRule {
  readonly kind: ResolvedEffectKind;
  readonly matches: (lower: string) => boolean;
  readonly build: (text: string, lower: string) => ScriptParams;
}

// =============================================================================
// PARAMETER HELPERS
// =============================================================================

/**
 * Who an effect applies to when it does not target
 */
function definedPlayer(lower: string, fallback: string = 'You'): Param[] {
  if (/\beach opponent\b/.test(lower)) return [['Defined', 'Player.Opponent']];
  if (/\beach player\b/.test(lower)) return [['Defined', 'Player']];
  return [['Defined', fallback]];
}

/**
 * Player targeting when present, otherwise a defined player
 */
function playerParams(lower: string, fallback: string = 'You'): Param[] {
  const target = extractTarget(lower);
  return target ? targetParams(target) : definedPlayer(lower, fallback);
}

// Boundaries between the clauses of a compound effect ("... and you gain 2 life")
const CLAUSE_BREAK = /\b(?:and|then)\b|[,.;]/;

/**
 * Player parameters for the subject of a verb.
 *
 * Only the clause that carries the verb, up to the verb itself, is
 * searched, so "target opponent loses 2 life and you gain 2 life" gains
 * for you. An explicit "you" always means Defined$ You.
 */
function subjectParams(lower: string, verb: RegExp, fallback: string = 'You'): Param[] {
  const match = verb.exec(lower);
  if (!match) return playerParams(lower, fallback);
  const subject = lower.slice(0, match.index).split(CLAUSE_BREAK).pop() ?? '';
  if (/\byou\s*$/.test(subject)) return [['Defined', 'You']];
  return playerParams(subject, fallback);
}

const GAIN_VERB = /\bgains?\b/;
const LOSE_VERB = /\blos(?:e|es)\b/;
const DRAW_VERB = /\bdraws?\b/;
const DISCARD_VERB = /\bdiscards?\b/;
const MILL_VERB = /\bmills?\b/;

const TOKEN_SCRIPTS: readonly string[] = [
  'food', 'treasure', 'clue', 'blood', 'gold', 'map', 'powerstone',
  'beer', 'gnome', 'goblin', 'soldier', 'zombie', 'spirit', 'elf', 'saproling',
];

function tokenScript(lower: string): string {
  return TOKEN_SCRIPTS.find((name) => new RegExp(`\\b${name}\\b`).test(lower)) ?? 'generic';
}

const CARD_TYPES: ReadonlyArray<readonly [RegExp, string]> = [
  [/\bbasic land\b/, 'Land.Basic'],
  [/\bcreature\b/, 'Creature'],
  [/\bartifact\b/, 'Artifact'],
  [/\benchantment\b/, 'Enchantment'],
  [/\bland\b/, 'Land'],
  [/\bpermanent\b/, 'Permanent'],
];

function cardType(lower: string, fallback: string = 'Card'): string {
  return CARD_TYPES.find(([pattern]) => pattern.test(lower))?.[1] ?? fallback;
}

// =============================================================================
// RULE TABLE
// =============================================================================

export const EFFECT_RULES: readonly EffectRule[] = [
  {
    kind: EffectKind.GAIN_LIFE,
    matches: (lower) => /\bgains?\b.*\blife\b/.test(lower),
    build: (text, lower) => [
      ...subjectParams(lower, GAIN_VERB),
      ['LifeAmount', extractMagnitude(text, 'life')],
    ],
  },
  {
    kind: EffectKind.LOSE_LIFE,
    matches: (lower) => /\blos(?:e|es)\b.*\blife\b/.test(lower) && /\bopponents?\b/.test(lower),
    build: (text, lower) => [
      ...subjectParams(lower, LOSE_VERB, 'Player.Opponent'),
      ['LifeAmount', extractMagnitude(text, 'life')],
    ],
  },
  {
    kind: EffectKind.LOSE_LIFE,
    matches: (lower) => /\blos(?:e|es)\b.*\blife\b/.test(lower),
    build: (text, lower) => [
      ...subjectParams(lower, LOSE_VERB),
      ['LifeAmount', extractMagnitude(text, 'life')],
    ],
  },
  {
    kind: EffectKind.DRAW,
    matches: (lower) => DRAW_VERB.test(lower),
    build: (text, lower) => [
      ...subjectParams(lower, DRAW_VERB),
      ['NumCards', extractMagnitude(text, 'card')],
    ],
  },
  {
    kind: EffectKind.DEAL_DAMAGE,
    matches: (lower) => /\bdeals?\b.*\bdamage\b/.test(lower),
    build: (text, lower) => {
      const target = extractTarget(lower);
      return [
        ['NumDmg', extractMagnitude(text, 'damage')],
        ...(target ? targetParams(target) : definedPlayer(lower, 'TriggeredPlayer')),
      ];
    },
  },
  {
    kind: EffectKind.CREATE_TOKEN,
    matches: (lower) => /\bcreates?\b/.test(lower) && /\btokens?\b/.test(lower),
    build: (text, lower) => [
      ['TokenScript', tokenScript(lower)],
      ['TokenAmount', extractMagnitude(text, 'token')],
    ],
  },
  {
    kind: EffectKind.DISCARD,
    matches: (lower) => DISCARD_VERB.test(lower),
    build: (text, lower) => [
      ['Mode', /\bat random\b/.test(lower) ? 'Random' : 'TgtChoose'],
      ['NumCards', extractMagnitude(text, 'card')],
      ...subjectParams(lower, DISCARD_VERB),
    ],
  },
  {
    kind: EffectKind.MILL,
    matches: (lower) => MILL_VERB.test(lower),
    build: (text, lower) => [
      ['NumCards', extractMagnitude(text, 'card')],
      ...subjectParams(lower, MILL_VERB),
    ],
  },
  {
    kind: EffectKind.COUNTER,
    matches: (lower) =>
      /\bcounter\b.*\bspell\b/.test(lower) && !/\bcounters?\s+on\b/.test(lower),
    build: (_text, lower) => {
      const params: Param[] = [
        ['TargetType', 'Spell'],
        ['ValidTgts', 'Card'],
        ['TgtPrompt', 'Select target spell'],
      ];
      const unless = lower.match(/\bunless its controller pays \{(\d+)\}/);
      if (unless) params.push(['UnlessCost', unless[1]]);
      return params;
    },
  },
  {
    kind: EffectKind.TAP,
    matches: (lower) => /\btap\b/.test(lower) && /\btarget\b/.test(lower),
    build: (_text, lower) => targetParams(extractTarget(lower) ?? { valid: 'Creature', noun: 'creature' }),
  },
  {
    kind: EffectKind.UNTAP,
    matches: (lower) => /\buntap\b/.test(lower),
    build: (_text, lower) => {
      const target = extractTarget(lower);
      return target ? targetParams(target) : [SELF];
    },
  },
  {
    kind: EffectKind.SCRY,
    matches: (lower) => /\bscry\b/.test(lower),
    build: (text) => [['ScryNum', extractMagnitude(text)]],
  },
  {
    kind: EffectKind.SURVEIL,
    matches: (lower) => /\bsurveil\b/.test(lower),
    build: (text) => [['NumCards', extractMagnitude(text)]],
  },
  {
    kind: EffectKind.PUT_COUNTER,
    matches: (lower) => /\bput\b/.test(lower) && /\bcounters?\b/.test(lower),
    build: (text, lower) => {
      const target = extractTarget(lower);
      return [
        ['CounterType', extractCounterType(text)],
        ['CounterNum', extractMagnitude(text, 'counter')],
        ...(target ? targetParams(target) : [SELF]),
      ];
    },
  },
  {
    kind: EffectKind.SACRIFICE,
    matches: (lower) => /\bsacrifices?\b/.test(lower),
    build: (_text, lower) => {
      if (/\bsacrifice (?:(?:it|this)\b|~)/.test(lower)) return [SELF];
      const params: Param[] = [['SacValid', cardType(lower)]];
      if (/\beach (?:opponent|player)\b/.test(lower)) params.push(...definedPlayer(lower));
      return params;
    },
  },
  {
    kind: EffectKind.SEARCH_LIBRARY,
    matches: (lower) => /\bsearch(?:es)?\b/.test(lower) && /\blibrary\b/.test(lower),
    build: (text, lower) => [
      ['Origin', 'Library'],
      ['Destination', /\bonto the battlefield\b/.test(lower) ? 'Battlefield' : 'Hand'],
      ['ChangeType', cardType(lower)],
      ['ChangeNum', extractMagnitude(text, 'card')],
    ],
  },
  {
    kind: EffectKind.RETURN_FROM_GRAVEYARD,
    matches: (lower) =>
      /\breturns?\b/.test(lower) && /\bgraveyard\b/.test(lower) && /\b(?:battlefield|hand)\b/.test(lower),
    build: (_text, lower) => [
      ['Origin', 'Graveyard'],
      ['Destination', /\bbattlefield\b/.test(lower) ? 'Battlefield' : 'Hand'],
      ['ChangeType', cardType(lower)],
    ],
  },
];

// =============================================================================
// RESOLUTION
// =============================================================================

/**
 * Resolve an effect clause to an effect token
 */
export function resolveEffect(text: string): EffectToken {
  const lower = text.toLowerCase().trim();
  const rule = EFFECT_RULES.find((candidate) => candidate.matches(lower));
  if (!rule) {
    return { kind: EffectKind.UNKNOWN, text };
  }
  return { kind: rule.kind, params: rule.build(text, lower) };
}

export function isResolved(effect: EffectToken): effect is ResolvedEffect {
  return effect.kind !== EffectKind.UNKNOWN;
}

/**
 * Script API each effect kind renders as
 */
const EFFECT_API: Readonly<Record<ResolvedEffectKind, string>> = {
  [EffectKind.GAIN_LIFE]: 'GainLife',
  [EffectKind.LOSE_LIFE]: 'LoseLife',
  [EffectKind.DRAW]: 'Draw',
  [EffectKind.DEAL_DAMAGE]: 'DealDamage',
  [EffectKind.CREATE_TOKEN]: 'Token',
  [EffectKind.DISCARD]: 'Discard',
  [EffectKind.MILL]: 'Mill',
  [EffectKind.COUNTER]: 'Counter',
  [EffectKind.TAP]: 'Tap',
  [EffectKind.UNTAP]: 'Untap',
  [EffectKind.SCRY]: 'Scry',
  [EffectKind.SURVEIL]: 'Surveil',
  [EffectKind.PUT_COUNTER]: 'PutCounter',
  [EffectKind.SACRIFICE]: 'Sacrifice',
  [EffectKind.SEARCH_LIBRARY]: 'ChangeZone',
  [EffectKind.RETURN_FROM_GRAVEYARD]: 'ChangeZone',
};

/**
 * Render script parameters as " | Key$ Value" pairs
 */
export function renderParams(params: ScriptParams): string {
  return params.map(([key, value]) => ` | ${key}$ ${value}`).join('');
}

/**
 * Render an effect token, e.g. "Draw | Defined$ You | NumCards$ 1"
 */
export function renderEffect(effect: ResolvedEffect): string {
  return `${EFFECT_API[effect.kind]}${renderParams(effect.params)}`;
}
