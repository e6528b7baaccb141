/**
 * Module Name Parser
 * Canonical keys for module names so curriculum revisions still match
 *
 * Examples:
 * - "Media & Society II"             -> "media and society 2"
 * - "  Computing Concepts and Design 1 " -> "computing concepts and design 1"
 * - "Research Project  X"            -> "research project 10"
 */

const ROMAN_TO_ARABIC: ReadonlyMap<string, string> = new Map([
  ['i', '1'],
  ['ii', '2'],
  ['iii', '3'],
  ['iv', '4'],
  ['v', '5'],
  ['vi', '6'],
  ['vii', '7'],
  ['viii', '8'],
  ['ix', '9'],
  ['x', '10'],
]);

/**
 * Normalize a module name for comparison.
 * Only whole words are converted, so "Vision" keeps its "vi".
 */
export function normalizeModuleName(name: string): string {
  const words = name
    .trim()
    .toLowerCase()
    .replace(/&/g, 'and')
    .split(/\s+/)
    .filter(word => word.length > 0);

  return words.map(word => ROMAN_TO_ARABIC.get(word) ?? word).join(' ');
}

// Codes that were re-keyed in the portal after students had already taken them
const MODULE_CODE_ALIASES: ReadonlyMap<string, string> = new Map([
  ['DDDR110', 'DDDR1110'],
]);

/**
 * Normalize a module code, applying the known alias table
 */
export function normalizeModuleCode(code: string): string {
  const trimmed = code.trim().toUpperCase();
  return MODULE_CODE_ALIASES.get(trimmed) ?? trimmed;
}
