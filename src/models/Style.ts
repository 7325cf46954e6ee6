/**
 * Style - a terminal style for one piece of text
 *
 * A style is an optional color plus a set of text attributes. Styles are
 * built once from user input and never mutated.
 *
 * @file src/models/Style.ts
 */

import {
  ATTRIBUTES,
  ATTRIBUTE_CODES,
  NAMED_COLOR_CODES,
  RESET,
  isNamedColor,
  sgr,
  stripSgr,
} from '../utils/colors.js';
import type { Attribute, NamedColor } from '../utils/colors.js';
import { UnknownStyleTokenError } from './RecolorError.js';

export interface RgbColor {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

export type StyleColor =
  | { readonly kind: 'named'; readonly name: NamedColor }
  | { readonly kind: 'rgb'; readonly rgb: RgbColor };

export interface Style {
  readonly color?: StyleColor;
  readonly attributes: ReadonlySet<Attribute>;
}

/**
 * What a single token contributes to a style
 */
export type StyleToken =
  | { readonly type: 'color'; readonly color: StyleColor }
  | { readonly type: 'attribute'; readonly attribute: Attribute };

export const EMPTY_STYLE: Style = Object.freeze({ attributes: new Set<Attribute>() });

const ATTRIBUTE_SYNONYMS: Record<string, Attribute> = {
  bold: 'bold',
  bolded: 'bold',
  dimmed: 'dimmed',
  dim: 'dimmed',
  italic: 'italic',
  italics: 'italic',
  underline: 'underline',
  underlined: 'underline',
  blink: 'blink',
  blinking: 'blink',
  hidden: 'hidden',
  strikethrough: 'strikethrough',
  struckthrough: 'strikethrough',
  strike: 'strikethrough',
};

const HEX_COLOR = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;

export function namedStyle(name: NamedColor, ...attributes: Attribute[]): Style {
  return { color: { kind: 'named', name }, attributes: new Set(attributes) };
}

export function rgbStyle(r: number, g: number, b: number, ...attributes: Attribute[]): Style {
  return { color: { kind: 'rgb', rgb: { r, g, b } }, attributes: new Set(attributes) };
}

/**
 * Parse one comma-free token into a color or an attribute.
 *
 * @throws UnknownStyleTokenError for anything that is neither a known word
 *   nor `#` followed by exactly six hex digits
 */
export function parseStyleToken(token: string): StyleToken {
  if (isNamedColor(token)) {
    return { type: 'color', color: { kind: 'named', name: token } };
  }

  if (Object.prototype.hasOwnProperty.call(ATTRIBUTE_SYNONYMS, token)) {
    return { type: 'attribute', attribute: ATTRIBUTE_SYNONYMS[token] };
  }

  const hex = HEX_COLOR.exec(token);
  if (hex) {
    const [, r, g, b] = hex;
    return {
      type: 'color',
      color: {
        kind: 'rgb',
        rgb: { r: parseInt(r, 16), g: parseInt(g, 16), b: parseInt(b, 16) },
      },
    };
  }

  throw new UnknownStyleTokenError(token);
}

/**
 * Fold tokens left to right into one style.
 *
 * Attributes accumulate as a set; a later color replaces an earlier one.
 */
export function combineStyles(tokens: ReadonlyArray<string>): Style {
  let color: StyleColor | undefined;
  const attributes = new Set<Attribute>();

  for (const token of tokens) {
    const parsed = parseStyleToken(token);
    if (parsed.type === 'color') {
      color = parsed.color;
    } else {
      attributes.add(parsed.attribute);
    }
  }

  return color ? { color, attributes } : { attributes };
}

/**
 * Parse a comma-separated style list such as `"green,underline"`.
 */
export function parseStyle(list: string): Style {
  return combineStyles(list.split(','));
}

export function isEmptyStyle(style: Style): boolean {
  return style.color === undefined && style.attributes.size === 0;
}

/**
 * SGR parameters for a style: color first, then attributes in canonical order.
 */
export function styleCodes(style: Style): number[] {
  const codes: number[] = [];

  if (style.color?.kind === 'named') {
    codes.push(NAMED_COLOR_CODES[style.color.name]);
  } else if (style.color?.kind === 'rgb') {
    const { r, g, b } = style.color.rgb;
    codes.push(38, 2, r, g, b);
  }

  for (const attribute of ATTRIBUTES) {
    if (style.attributes.has(attribute)) {
      codes.push(ATTRIBUTE_CODES[attribute]);
    }
  }

  return codes;
}

/**
 * The escape that switches a terminal into this style, or '' for the empty style.
 */
export function styleOpening(style: Style): string {
  const codes = styleCodes(style);
  return codes.length > 0 ? sgr(codes) : '';
}

/**
 * Wrap text in the style's escape and a closing reset.
 *
 * The empty style and empty text are returned unchanged.
 */
export function applyStyle(style: Style, text: string): string {
  const opening = styleOpening(style);
  if (opening === '' || text === '') {
    return text;
  }
  return `${opening}${text}${RESET}`;
}

export function stripStyles(text: string): string {
  return stripSgr(text);
}

/**
 * Human-readable form, used in debug logs.
 */
export function describeStyle(style: Style): string {
  const parts: string[] = [];
  if (style.color?.kind === 'named') {
    parts.push(style.color.name);
  } else if (style.color?.kind === 'rgb') {
    const { r, g, b } = style.color.rgb;
    parts.push('#' + [r, g, b].map(c => c.toString(16).padStart(2, '0')).join(''));
  }
  for (const attribute of ATTRIBUTES) {
    if (style.attributes.has(attribute)) parts.push(attribute);
  }
  return parts.length > 0 ? parts.join(',') : '(none)';
}
