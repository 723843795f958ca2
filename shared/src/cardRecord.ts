/**
 * Card record as supplied by a card document reader.
 * Every field is a string; absent values are empty strings.
 */
export interface CardRecord {
  readonly name: string;
  /** Symbol-concatenated mana cost, e.g. "2U/B" */
  readonly manaCost: string;
  /** Main type and subtypes separated by a dash */
  readonly type: string;
  /** Power/toughness, stars allowed (e.g. "*" over "*+1") */
  readonly powerToughness: string;
  readonly loyalty: string;
  /** Rules text, may contain line breaks */
  readonly text: string;
}
