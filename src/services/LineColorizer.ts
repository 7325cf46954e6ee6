/**
 * LineColorizer - styles the capture groups of one line
 *
 * Group spans never partially overlap within a match, but they can nest or
 * touch. Styles are kept on a stack while walking the span boundaries left to
 * right: text inside an inner group takes the inner style, and the enclosing
 * group's style resumes once the inner group closes.
 */

import type { GroupStyles } from '../models/GroupInfo.js';
import type { Style } from '../models/Style.js';
import { applyStyle } from '../models/Style.js';
import { styleForGroup } from './GroupStyler.js';
import type { CompiledPattern } from './PatternCompiler.js';

/** Half-open [start, end) range of string offsets */
export type Span = readonly [number, number];

export interface MatchResult {
  span: Span;
  /** One entry per capture group, undefined when the group did not participate */
  groups: Array<Span | undefined>;
}

function toMatchResult(match: RegExpExecArray | RegExpMatchArray, groupCount: number): MatchResult {
  const start = match.index ?? 0;
  const span: Span = [start, start + match[0].length];
  const groups: Array<Span | undefined> = [];

  for (let ordinal = 1; ordinal <= groupCount; ordinal++) {
    const range: [number, number] | undefined = match.indices?.[ordinal];
    groups.push(range);
  }

  return { span, groups };
}

/**
 * Find the match (or, for a global pattern, every match) in a line.
 */
export function findMatches(line: string, pattern: CompiledPattern): MatchResult[] {
  const groupCount = pattern.groups.length;

  if (pattern.global) {
    return Array.from(line.matchAll(pattern.regex), match => toMatchResult(match, groupCount));
  }

  const match = pattern.regex.exec(line);
  return match ? [toMatchResult(match, groupCount)] : [];
}

interface Boundary {
  opens: number[];
  closes: number[];
}

function collectBoundaries(matches: ReadonlyArray<MatchResult>): Map<number, Boundary> {
  const boundaries = new Map<number, Boundary>();
  const at = (position: number): Boundary => {
    let boundary = boundaries.get(position);
    if (!boundary) {
      boundary = { opens: [], closes: [] };
      boundaries.set(position, boundary);
    }
    return boundary;
  };

  for (const match of matches) {
    match.groups.forEach((span, index) => {
      // Absent and empty groups have nothing to style.
      if (!span || span[0] === span[1]) return;
      at(span[0]).opens.push(index);
      at(span[1]).closes.push(index);
    });
  }

  return boundaries;
}

/**
 * Colorize a single line.
 *
 * A line the pattern does not match is returned unchanged. Text outside
 * every participating group is copied verbatim; the overall match itself is
 * never styled.
 */
export function colorizeLine(line: string, pattern: CompiledPattern, groupStyles: GroupStyles): string {
  const matches = findMatches(line, pattern);
  if (matches.length === 0) {
    return line;
  }

  const styles: Style[] = pattern.groups.map(group => styleForGroup(group, groupStyles));
  const boundaries = collectBoundaries(matches);
  const positions = [...boundaries.keys()].sort((a, b) => a - b);

  const stack: number[] = [];
  const current = (): Style | undefined =>
    stack.length > 0 ? styles[stack[stack.length - 1]] : undefined;
  const emit = (text: string): string => {
    const style = current();
    return style ? applyStyle(style, text) : text;
  };

  let out = '';
  let cursor = 0;

  for (const position of positions) {
    const boundary = boundaries.get(position);
    if (!boundary) continue;

    out += emit(line.slice(cursor, position));
    cursor = position;

    for (const index of boundary.closes) {
      const at = stack.lastIndexOf(index);
      if (at !== -1) stack.splice(at, 1);
    }
    // Lower index = outer group when several open together.
    for (const index of [...boundary.opens].sort((a, b) => a - b)) {
      stack.push(index);
    }
  }

  return out + emit(line.slice(cursor));
}
