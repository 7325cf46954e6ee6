/**
 * GroupStyler - decides the style of every capture group once per run
 *
 * For each group in ordinal order an override keyed by the group's name
 * wins, then one keyed by its ordinal. Only groups with no override take
 * the next palette entry, so overriding a group never shifts the defaults
 * the other groups receive.
 */

import type { ILogger } from '../interfaces/ILogger.js';
import { SilentLogger } from '../interfaces/ILogger.js';
import type { GroupIdentifier, GroupInfo, GroupStyles, OverrideMap } from '../models/GroupInfo.js';
import { formatGroup, groupIdentifier } from '../models/GroupInfo.js';
import type { Style } from '../models/Style.js';
import { EMPTY_STYLE, describeStyle } from '../models/Style.js';
import type { PaletteCycler } from './PaletteCycler.js';

function findOverride(group: GroupInfo, overrides: OverrideMap): Style | undefined {
  if (group.name !== undefined) {
    const byName = overrides.get(group.name);
    if (byName) return byName;
  }
  return overrides.get(group.ordinal);
}

export function resolveGroupStyles(
  groups: ReadonlyArray<GroupInfo>,
  overrides: OverrideMap,
  palette: PaletteCycler,
  logger: ILogger = new SilentLogger()
): GroupStyles {
  const styles = new Map<GroupIdentifier, Style>();
  const usedKeys = new Set<GroupIdentifier>();

  for (const group of groups) {
    const override = findOverride(group, overrides);
    let style: Style;
    if (override) {
      style = override;
      usedKeys.add(group.name !== undefined && overrides.has(group.name) ? group.name : group.ordinal);
    } else {
      style = palette.next();
    }

    styles.set(groupIdentifier(group), style);
    logger.debug(`group ${formatGroup(group)} -> ${describeStyle(style)}`, {
      source: override ? 'override' : 'palette',
    });
  }

  for (const key of overrides.keys()) {
    if (!usedKeys.has(key)) {
      logger.warn(`style override "${key}" does not match any capture group`);
    }
  }

  return styles;
}

/**
 * Style for one group, or the empty style when the group is unknown.
 */
export function styleForGroup(group: GroupInfo, styles: GroupStyles): Style {
  return styles.get(groupIdentifier(group)) ?? EMPTY_STYLE;
}
