/**
 * ANSI color utilities - single source of truth.
 *
 * Holds the SGR codes for every named color and text attribute recolor
 * understands, plus the small `colorize` helper the logger uses for its own
 * diagnostics.
 */

export const ESC = '\x1b[';
export const RESET = `${ESC}0m`;

export const NAMED_COLOR_CODES = {
  black: 30,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36,
  white: 37,
  bright_black: 90,
  bright_red: 91,
  bright_green: 92,
  bright_yellow: 93,
  bright_blue: 94,
  bright_magenta: 95,
  bright_cyan: 96,
  bright_white: 97,
} as const;

export type NamedColor = keyof typeof NAMED_COLOR_CODES;

// Order matters: attributes are always rendered in this order.
export const ATTRIBUTE_CODES = {
  bold: 1,
  dimmed: 2,
  italic: 3,
  underline: 4,
  blink: 5,
  hidden: 8,
  strikethrough: 9,
} as const;

export type Attribute = keyof typeof ATTRIBUTE_CODES;

export const ATTRIBUTES: ReadonlyArray<Attribute> = [
  'bold',
  'dimmed',
  'italic',
  'underline',
  'blink',
  'hidden',
  'strikethrough',
];

export const colors = {
  reset: RESET,
  bright: `${ESC}${ATTRIBUTE_CODES.bold}m`,
  dim: `${ESC}${ATTRIBUTE_CODES.dimmed}m`,
  cyan: `${ESC}${NAMED_COLOR_CODES.cyan}m`,
  green: `${ESC}${NAMED_COLOR_CODES.green}m`,
  yellow: `${ESC}${NAMED_COLOR_CODES.yellow}m`,
  red: `${ESC}${NAMED_COLOR_CODES.red}m`,
  blue: `${ESC}${NAMED_COLOR_CODES.blue}m`,
  magenta: `${ESC}${NAMED_COLOR_CODES.magenta}m`,
} as const;

export type ColorName = keyof typeof colors;

export function colorize(text: string, color: ColorName): string {
  return `${colors[color]}${text}${colors.reset}`;
}

export function isNamedColor(word: string): word is NamedColor {
  return Object.prototype.hasOwnProperty.call(NAMED_COLOR_CODES, word);
}

/**
 * Build a single SGR escape from a list of parameters, e.g. `[31, 1]` → `ESC[31;1m`.
 */
export function sgr(params: ReadonlyArray<number>): string {
  return `${ESC}${params.join(';')}m`;
}

// Matches any SGR sequence (ESC [ params m).
const SGR_PATTERN = /\x1b\[[0-9;]*m/g;

/**
 * Remove every SGR escape from text.
 */
export function stripSgr(text: string): string {
  return text.replace(SGR_PATTERN, '');
}
