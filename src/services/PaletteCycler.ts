/**
 * PaletteCycler - default styles for groups without an override
 *
 * One instance per run. The counter only moves while group styles are being
 * resolved, so every line of output sees the same assignment.
 */

import type { Style } from '../models/Style.js';
import { namedStyle } from '../models/Style.js';

export const DEFAULT_PALETTE: ReadonlyArray<Style> = Object.freeze([
  namedStyle('green'),
  namedStyle('yellow'),
  namedStyle('blue'),
  namedStyle('magenta'),
  namedStyle('cyan'),
  namedStyle('red'),
  namedStyle('bright_green'),
  namedStyle('bright_blue'),
]);

export class PaletteCycler {
  private counter = 0;
  private readonly palette: ReadonlyArray<Style>;

  constructor(palette: ReadonlyArray<Style> = DEFAULT_PALETTE) {
    if (palette.length === 0) {
      throw new Error('PaletteCycler needs at least one style');
    }
    this.palette = palette;
  }

  next(): Style {
    const style = this.palette[this.counter % this.palette.length];
    this.counter++;
    return style;
  }

  /** How many defaults have been handed out so far */
  get position(): number {
    return this.counter;
  }
}
