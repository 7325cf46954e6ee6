import { describe, it, expect } from 'vitest';
import { DEFAULT_PALETTE, PaletteCycler } from '../../../src/services/PaletteCycler.js';
import { namedStyle, styleOpening } from '../../../src/models/Style.js';

describe('PaletteCycler', () => {
  it('has at least eight distinct default styles', () => {
    const openings = new Set(DEFAULT_PALETTE.map(styleOpening));
    expect(DEFAULT_PALETTE.length).toBeGreaterThanOrEqual(8);
    expect(openings.size).toBe(DEFAULT_PALETTE.length);
  });

  it('starts with green', () => {
    expect(new PaletteCycler().next()).toEqual(namedStyle('green'));
  });

  it('hands out the palette in order and wraps around', () => {
    const palette = new PaletteCycler();
    const handedOut = Array.from({ length: DEFAULT_PALETTE.length + 2 }, () => palette.next());

    expect(handedOut.slice(0, DEFAULT_PALETTE.length)).toEqual([...DEFAULT_PALETTE]);
    expect(handedOut[DEFAULT_PALETTE.length]).toBe(DEFAULT_PALETTE[0]);
    expect(handedOut[DEFAULT_PALETTE.length + 1]).toBe(DEFAULT_PALETTE[1]);
    expect(palette.position).toBe(DEFAULT_PALETTE.length + 2);
  });

  it('keeps separate counters per instance', () => {
    const first = new PaletteCycler();
    first.next();
    first.next();

    expect(new PaletteCycler().next()).toBe(DEFAULT_PALETTE[0]);
  });

  it('cycles a custom palette', () => {
    const palette = new PaletteCycler([namedStyle('red'), namedStyle('blue')]);

    expect([palette.next(), palette.next(), palette.next()]).toEqual([
      namedStyle('red'),
      namedStyle('blue'),
      namedStyle('red'),
    ]);
  });

  it('refuses an empty palette', () => {
    expect(() => new PaletteCycler([])).toThrow('PaletteCycler needs at least one style');
  });
});
