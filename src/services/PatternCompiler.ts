/**
 * PatternCompiler - builds the RegExp for a run and lists its capture groups
 *
 * @file src/services/PatternCompiler.ts
 *
 * @remarks
 * JavaScript regular expressions do not expose group names by position, so
 * groups are enumerated from the pattern source. Python-style `(?P<name>...)`
 * and `(?P=name)` are rewritten to `(?<name>...)` and `\k<name>` on the way.
 *
 * Patterns compile in Unicode mode: `.` consumes a whole code point and
 * `\p{...}` property classes are available.
 */

import type { GroupInfo } from '../models/GroupInfo.js';
import { GROUP_NAME_CHAR } from '../models/GroupInfo.js';
import { InvalidPatternError } from '../models/RecolorError.js';

export interface CompilePatternOptions {
  /** Colorize every match in a line instead of only the first */
  global?: boolean;
}

export interface CompiledPattern {
  /** The pattern exactly as the user typed it */
  readonly source: string;
  readonly regex: RegExp;
  readonly groups: ReadonlyArray<GroupInfo>;
  readonly global: boolean;
}

export interface ScannedPattern {
  /** Source with Python-style named groups rewritten */
  source: string;
  groups: GroupInfo[];
}

function readName(source: string, start: number, terminator: string): { name: string; end: number } | null {
  let end = start;
  while (end < source.length && GROUP_NAME_CHAR.test(source[end])) {
    end++;
  }
  if (end === start || source[end] !== terminator) {
    return null;
  }
  return { name: source.slice(start, end), end };
}

/**
 * Walk the pattern source once, collecting capture groups in order of their
 * opening parenthesis.
 *
 * Escapes and character classes are skipped; `(?:`, lookarounds and any
 * other `(?` construct that is not a named group do not capture.
 */
export function enumerateGroups(source: string): ScannedPattern {
  const groups: GroupInfo[] = [];
  let out = '';
  let inClass = false;
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (ch === '\\') {
      out += source.slice(i, i + 2);
      i += 2;
      continue;
    }

    if (inClass) {
      if (ch === ']') inClass = false;
      out += ch;
      i++;
      continue;
    }

    if (ch === '[') {
      inClass = true;
      out += ch;
      i++;
      continue;
    }

    if (ch !== '(') {
      out += ch;
      i++;
      continue;
    }

    if (source[i + 1] !== '?') {
      groups.push({ ordinal: groups.length + 1 });
      out += ch;
      i++;
      continue;
    }

    // (?P<name>  ->  (?<name>
    if (source.startsWith('(?P<', i)) {
      const named = readName(source, i + 4, '>');
      if (named) {
        groups.push({ ordinal: groups.length + 1, name: named.name });
        out += `(?<${named.name}>`;
        i = named.end + 1;
        continue;
      }
    }

    // (?P=name)  ->  \k<name>
    if (source.startsWith('(?P=', i)) {
      const ref = readName(source, i + 4, ')');
      if (ref) {
        out += `\\k<${ref.name}>`;
        i = ref.end + 1;
        continue;
      }
    }

    // (?<name>, but not the lookbehinds (?<= and (?<!
    if (source.startsWith('(?<', i) && source[i + 3] !== '=' && source[i + 3] !== '!') {
      const named = readName(source, i + 3, '>');
      if (named) {
        groups.push({ ordinal: groups.length + 1, name: named.name });
        out += source.slice(i, named.end + 1);
        i = named.end + 1;
        continue;
      }
    }

    out += ch;
    i++;
  }

  return { source: out, groups };
}

function engineGroupCount(regex: RegExp): number {
  // An alternation with the empty pattern always matches, exposing every group.
  const probe = new RegExp(`${regex.source}|`, regex.flags).exec('');
  return probe ? probe.length - 1 : 0;
}

/**
 * Compile a user-supplied single-line pattern.
 *
 * @throws InvalidPatternError when the pattern spans lines or does not compile
 */
export function compilePattern(source: string, options: CompilePatternOptions = {}): CompiledPattern {
  if (/[\r\n]/.test(source)) {
    throw new InvalidPatternError(source, 'pattern must be a single line');
  }

  const global = options.global ?? false;
  const scanned = enumerateGroups(source);

  let regex: RegExp;
  try {
    regex = new RegExp(scanned.source, global ? 'dgu' : 'du');
  } catch (err: unknown) {
    throw new InvalidPatternError(source, err instanceof Error ? err.message : String(err));
  }

  const count = engineGroupCount(regex);
  if (count !== scanned.groups.length) {
    throw new InvalidPatternError(
      source,
      `found ${scanned.groups.length} capture groups but the regex engine reports ${count}`
    );
  }

  return { source, regex, groups: scanned.groups, global };
}
