/**
 * PatternCompiler unit tests
 *
 * @file tests/unit/services/PatternCompiler.test.ts
 */

import { describe, it, expect } from 'vitest';
import { compilePattern, enumerateGroups } from '../../../src/services/PatternCompiler.js';
import { InvalidPatternError } from '../../../src/models/RecolorError.js';

describe('enumerateGroups', () => {
  it('numbers plain groups left to right', () => {
    expect(enumerateGroups('(a)(b(c))').groups).toEqual([{ ordinal: 1 }, { ordinal: 2 }, { ordinal: 3 }]);
  });

  it('reads names from (?<name>...) groups', () => {
    expect(enumerateGroups('(?<year>\\d{4})-(\\d\\d)').groups).toEqual([
      { ordinal: 1, name: 'year' },
      { ordinal: 2 },
    ]);
  });

  it('rewrites (?P<name>...) groups', () => {
    const scanned = enumerateGroups('(?P<a>\\d+)\\.(?P<b>\\d+)');

    expect(scanned.source).toBe('(?<a>\\d+)\\.(?<b>\\d+)');
    expect(scanned.groups).toEqual([
      { ordinal: 1, name: 'a' },
      { ordinal: 2, name: 'b' },
    ]);
  });

  it('rewrites (?P=name) back-references', () => {
    expect(enumerateGroups('(?P<q>[\'"]).*?(?P=q)').source).toBe('(?<q>[\'"]).*?\\k<q>');
  });

  it('skips non-capturing groups and lookarounds', () => {
    expect(enumerateGroups('(?:a)(?=b)(?!c)(?<=d)(?<!e)(f)').groups).toEqual([{ ordinal: 1 }]);
  });

  it('skips escaped parentheses', () => {
    expect(enumerateGroups('\\(a\\)(b)').groups).toEqual([{ ordinal: 1 }]);
  });

  it('skips parentheses inside character classes', () => {
    expect(enumerateGroups('[(](x)').groups).toEqual([{ ordinal: 1 }]);
    expect(enumerateGroups('[\\]()](y)').groups).toEqual([{ ordinal: 1 }]);
  });

  it('leaves a pattern without groups unchanged', () => {
    expect(enumerateGroups('foo.*bar')).toEqual({ source: 'foo.*bar', groups: [] });
  });
});

describe('compilePattern', () => {
  it('compiles in Unicode mode with match indices and without the global flag by default', () => {
    const compiled = compilePattern('(foo)');

    expect(compiled.source).toBe('(foo)');
    expect(compiled.regex.flags).toBe('du');
    expect(compiled.global).toBe(false);
    expect(compiled.groups).toEqual([{ ordinal: 1 }]);
  });

  it('adds the global flag on request', () => {
    const compiled = compilePattern('(foo)', { global: true });

    expect(compiled.regex.flags).toBe('dgu');
    expect(compiled.global).toBe(true);
  });

  it('keeps the user source while compiling the rewritten one', () => {
    const compiled = compilePattern('(?P<n>\\d+)');

    expect(compiled.source).toBe('(?P<n>\\d+)');
    expect(compiled.regex.source).toBe('(?<n>\\d+)');
    expect(compiled.regex.exec('ab12')?.groups).toEqual({ n: '12' });
  });

  it('throws InvalidPatternError for a pattern that does not compile', () => {
    try {
      compilePattern('(unclosed');
      expect.fail('expected compilePattern to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidPatternError);
      if (err instanceof InvalidPatternError) {
        expect(err.kind).toBe('InvalidPattern');
        expect(err.pattern).toBe('(unclosed');
        expect(err.message.startsWith('invalid pattern "(unclosed": ')).toBe(true);
      }
    }
  });

  it('rejects an invalid (?P<...> group', () => {
    expect(() => compilePattern('(?P<1bad>x)')).toThrow(InvalidPatternError);
  });

  it('matches astral characters as one code point', () => {
    expect(compilePattern('(.)').regex.exec('\u{1F600}x')?.[1]).toBe('\u{1F600}');
  });

  it('supports Unicode property classes', () => {
    expect(compilePattern('(\\p{L}+)').regex.exec('12 abc')?.[1]).toBe('abc');
    expect(compilePattern('(\\p{L}+)').regex.exec('p{L}')?.[1]).toBe('p');
  });

  it('accepts $ in group names', () => {
    expect(compilePattern('(?<a$b>x)').groups).toEqual([{ ordinal: 1, name: 'a$b' }]);
  });

  it('rejects escapes that Unicode mode forbids', () => {
    expect(() => compilePattern('(\\-)')).toThrow(InvalidPatternError);
  });

  it('rejects multi-line patterns', () => {
    expect(() => compilePattern('a\nb')).toThrow('invalid pattern "a\nb": pattern must be a single line');
  });
});
