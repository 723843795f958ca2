/**
 * Header-line formatting for card scripts
 */

const MANA_SYMBOL = /\d+|[WUBRGCXS](?:\/[WUBRGP])?/g;

/**
 * Split a concatenated mana cost into space-separated symbols
 * ("2U/B" → "2 U/B", "{3}{G}{G}" → "3 G G"). Unknown characters are dropped.
 */
export function tokenizeManaCost(manaCost: string): string {
  const symbols = manaCost.toUpperCase().replace(/[{}]/g, '').match(MANA_SYMBOL);
  return symbols ? symbols.join(' ') : '';
}

/**
 * "Creature - Goblin Rogue" → "Creature Goblin Rogue"
 */
export function formatTypeLine(typeLine: string): string {
  const collapsed = typeLine.trim().replace(/\s+/g, ' ');
  const [main, ...subtypes] = collapsed.split(/ [-—] /);
  return subtypes.length > 0 ? `${main.trim()} ${subtypes.join(' ').trim()}` : collapsed;
}

/**
 * Oracle text on a single script line: line breaks become a literal "\n"
 * and em dashes a hyphen
 */
export function escapeOracleText(text: string): string {
  return text.replace(/\r?\n/g, '\\n').replace(/—/g, '-');
}
