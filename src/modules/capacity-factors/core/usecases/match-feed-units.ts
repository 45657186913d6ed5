import type { DailyPowerRecord } from '../types.js';

export interface FeedMatch {
  /** Records per registry unit name; units without feed data map to an empty list */
  recordsByUnit: Map<string, DailyPowerRecord[]>;
  /** Registry unit name -> feed unit name actually used */
  feedNames: Map<string, string>;
  /** Feed units no registry unit claimed, in first-appearance order */
  unmatchedFeedUnits: string[];
}

/**
 * Feed name for a registry unit: the registry name itself when the feed carries it,
 * otherwise the configured alias.
 */
export const resolveFeedName = (
  unitName: string,
  feedUnits: ReadonlySet<string> | ReadonlyMap<string, unknown>,
  aliases: Readonly<Record<string, string>>
): string | null => {
  if (feedUnits.has(unitName)) {
    return unitName;
  }

  const alias = aliases[unitName];
  return alias !== undefined && feedUnits.has(alias) ? alias : null;
};

export const matchFeedUnits = (
  unitNames: readonly string[],
  feedRecords: ReadonlyMap<string, DailyPowerRecord[]>,
  aliases: Readonly<Record<string, string>>
): FeedMatch => {
  const recordsByUnit = new Map<string, DailyPowerRecord[]>();
  const feedNames = new Map<string, string>();
  const claimed = new Set<string>();

  for (const unitName of unitNames) {
    const feedName = resolveFeedName(unitName, feedRecords, aliases);
    if (feedName === null) {
      recordsByUnit.set(unitName, []);
      continue;
    }

    claimed.add(feedName);
    feedNames.set(unitName, feedName);
    recordsByUnit.set(unitName, feedRecords.get(feedName) ?? []);
  }

  const unmatchedFeedUnits = [...feedRecords.keys()].filter((name) => !claimed.has(name));

  return { recordsByUnit, feedNames, unmatchedFeedUnits };
};
