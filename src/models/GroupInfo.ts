import type { Style } from './Style.js';

/**
 * A capture group is identified by its name when it has one, otherwise by
 * its 1-based ordinal position in the pattern source.
 */
export type GroupIdentifier = number | string;

export interface GroupInfo {
  /** 1-based position, counting opening parentheses left to right */
  ordinal: number;
  name?: string;
}

/**
 * Style per group, user overrides keyed the same way
 */
export type OverrideMap = ReadonlyMap<GroupIdentifier, Style>;
export type GroupStyles = ReadonlyMap<GroupIdentifier, Style>;

/** One character of a group name, as written in `(?<name>` or a style override */
export const GROUP_NAME_CHAR = /[A-Za-z0-9_$]/;

const GROUP_NAME = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function isGroupName(text: string): boolean {
  return GROUP_NAME.test(text);
}

export function groupIdentifier(group: GroupInfo): GroupIdentifier {
  return group.name ?? group.ordinal;
}

export function formatGroup(group: GroupInfo): string {
  return group.name ? `${group.ordinal}:${group.name}` : `${group.ordinal}`;
}
