/**
 * StyleSpecParser - turns `key=style[,style...]` arguments into an override map
 *
 * @file src/services/StyleSpecParser.ts
 *
 * @remarks
 * - Split happens on the first `=` only
 * - A numeric key is an ordinal and is stored as a number, so `01` and `1`
 *   name the same group
 * - Giving the same key twice is rejected
 */

import type { GroupIdentifier, OverrideMap } from '../models/GroupInfo.js';
import { isGroupName } from '../models/GroupInfo.js';
import { DuplicateOverrideKeyError, MalformedOverrideError } from '../models/RecolorError.js';
import type { Style } from '../models/Style.js';
import { parseStyle } from '../models/Style.js';

export interface ParsedOverride {
  key: GroupIdentifier;
  style: Style;
}

const ORDINAL_KEY = /^[0-9]+$/;

/**
 * Parse a single override argument.
 *
 * @throws MalformedOverrideError when the argument is not `key=value-list`
 * @throws UnknownStyleTokenError when a style word is not recognised
 */
export function parseOverride(argument: string): ParsedOverride {
  const separator = argument.indexOf('=');
  if (separator === -1) {
    throw new MalformedOverrideError(argument, 'expected key=style[,style...]');
  }

  const rawKey = argument.slice(0, separator);
  const value = argument.slice(separator + 1);

  if (value === '') {
    throw new MalformedOverrideError(argument, 'no styles given');
  }

  return { key: parseKey(rawKey, argument), style: parseStyle(value) };
}

function parseKey(rawKey: string, argument: string): GroupIdentifier {
  if (ORDINAL_KEY.test(rawKey)) {
    const ordinal = parseInt(rawKey, 10);
    if (ordinal === 0) {
      throw new MalformedOverrideError(argument, 'group ordinals start at 1');
    }
    return ordinal;
  }

  if (isGroupName(rawKey)) {
    return rawKey;
  }

  throw new MalformedOverrideError(
    argument,
    rawKey === '' ? 'missing group key' : `"${rawKey}" is not a group name or number`
  );
}

/**
 * Parse every override argument into one map.
 *
 * @throws DuplicateOverrideKeyError when two arguments target the same key
 */
export function parseOverrides(args: ReadonlyArray<string>): OverrideMap {
  const overrides = new Map<GroupIdentifier, Style>();

  for (const argument of args) {
    const { key, style } = parseOverride(argument);
    if (overrides.has(key)) {
      throw new DuplicateOverrideKeyError(key, argument);
    }
    overrides.set(key, style);
  }

  return overrides;
}
