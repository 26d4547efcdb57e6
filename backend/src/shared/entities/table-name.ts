/**
 * Table name for an entity type: a `_` before every non-leading uppercase
 * letter, everything lowercased.
 *
 *   GameSession -> game_session
 *   ABTest      -> a_b_test
 */
export function deriveTableName(typeName: string): string {
  let out = '';
  let index = 0;

  for (const char of typeName) {
    const isUpper = char !== char.toLowerCase();
    if (isUpper && index > 0) out += '_';
    out += char.toLowerCase();
    index += 1;
  }

  return out;
}
