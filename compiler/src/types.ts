/**
 * Core types for the ability-text compiler
 *
 * Everything the compiler produces is a closed tagged union, so a new
 * ability or variable shape has to be handled by every renderer before
 * the project compiles again.
 */

// =============================================================================
// SEGMENTATION
// =============================================================================

/**
 * One segmented unit of rules text
 */
export interface AbilityBlock {
  /** Raw text, including the whitespace that separated it from the next block */
  readonly raw: string;
  /** Offset of the block inside the original rules text */
  readonly offset: number;
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

export enum AbilityCategory {
  MODAL = 'modal',
  TRIGGERED = 'triggered',
  PERIODIC = 'periodic',
  UPKEEP_COST = 'upkeep_cost',
  ACTIVATED = 'activated',
  STATIC = 'static',
  SPELL_EFFECT = 'spell_effect',
  UNRECOGNIZED = 'unrecognized',
}

/**
 * Categories the classifier assigns; UNRECOGNIZED is only ever an outcome
 */
export type ClassifiedCategory = Exclude<AbilityCategory, AbilityCategory.UNRECOGNIZED>;

// =============================================================================
// TRIGGERS
// =============================================================================

export enum TriggerMode {
  CHANGES_ZONE = 'ChangesZone',
  ATTACKS = 'Attacks',
  DISCARD = 'Discard',
  SPELL_CAST = 'SpellCast',
  TAPS = 'Taps',
  PHASE = 'Phase',
}

export enum Phase {
  UPKEEP = 'Upkeep',
  BEGIN_COMBAT = 'BeginCombat',
  END_OF_TURN = 'EndOfTurn',
}

/**
 * Ordered condition attributes, e.g. [['Destination', 'Battlefield']]
 */
export type ScriptParams = ReadonlyArray<readonly [string, string]>;

export interface TriggerDescriptor {
  readonly mode: TriggerMode;
  readonly attributes: ScriptParams;
}

// =============================================================================
// EFFECTS
// =============================================================================

export enum EffectKind {
  GAIN_LIFE = 'GainLife',
  LOSE_LIFE = 'LoseLife',
  DRAW = 'Draw',
  DEAL_DAMAGE = 'DealDamage',
  CREATE_TOKEN = 'CreateToken',
  DISCARD = 'Discard',
  MILL = 'Mill',
  COUNTER = 'Counter',
  TAP = 'Tap',
  UNTAP = 'Untap',
  SCRY = 'Scry',
  SURVEIL = 'Surveil',
  PUT_COUNTER = 'PutCounter',
  SACRIFICE = 'Sacrifice',
  SEARCH_LIBRARY = 'SearchLibrary',
  RETURN_FROM_GRAVEYARD = 'ReturnFromGraveyard',
  UNKNOWN = 'Unknown',
}

export type ResolvedEffectKind = Exclude<EffectKind, EffectKind.UNKNOWN>;

export interface ResolvedEffect {
  readonly kind: ResolvedEffectKind;
  readonly params: ScriptParams;
}

export interface UnknownEffect {
  readonly kind: EffectKind.UNKNOWN;
  readonly text: string;
}

export type EffectToken = ResolvedEffect | UnknownEffect;

export type Duration = 'EndOfTurn' | 'Permanent';

// =============================================================================
// SUPPORT VARIABLES
// =============================================================================

export type SupportDefinition =
  | { readonly kind: 'effect'; readonly effect: ResolvedEffect }
  | { readonly kind: 'choices'; readonly choiceNames: readonly string[] }
  | { readonly kind: 'charm'; readonly charm: CharmSpec };

export interface SupportVariable {
  readonly name: string;
  readonly definition: SupportDefinition;
}

/**
 * Issues card-scoped support-variable names
 */
export interface SupportVariableAllocator {
  allocate(baseName: string): string;
}

// =============================================================================
// ABILITY LINES
// =============================================================================

export interface CharmSpec {
  /** Number of modes to choose */
  readonly charmNum: number;
  /** Set for "choose up to N" */
  readonly minCharmNum?: number;
  /** Name of the support variable listing the choices */
  readonly choices: string;
}

export type AbilityLine =
  | {
      readonly kind: 'trigger';
      readonly trigger: TriggerDescriptor;
      readonly execute: string;
      readonly description: string;
    }
  | {
      readonly kind: 'activated';
      readonly cost: string;
      readonly effect: ResolvedEffect;
      readonly description: string;
    }
  | {
      readonly kind: 'spell';
      readonly effect: ResolvedEffect;
      readonly description: string;
    }
  | {
      readonly kind: 'charm';
      readonly charm: CharmSpec;
      readonly description: string;
    }
  | {
      readonly kind: 'static';
      readonly params: ScriptParams;
      readonly description: string;
    };

/**
 * What one block contributes to the card script
 */
export interface BlockCompilation {
  readonly abilityLines: readonly AbilityLine[];
  readonly supportVariables: readonly SupportVariable[];
}

/**
 * Abilities compiled from one card's rules text
 */
export interface CompiledAbilities {
  readonly abilityLines: readonly AbilityLine[];
  readonly supportVariables: readonly SupportVariable[];
}

/**
 * The rendered script of one card
 */
export interface CompiledCard {
  readonly name: string;
  readonly lines: readonly string[];
  /** Blocks that produced no script line */
  readonly dropped: readonly AbilityBlock[];
}
