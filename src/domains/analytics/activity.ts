// ──────────────────────────────────────────
// Analytics: Unified user activity
// ──────────────────────────────────────────
// Active users, new users, retention and churn all read the same
// (user, period) relation so the four metrics agree on who was active.

import { ActivitySource, RawTables } from '../../shared/types';
import { groupByPeriod } from './aggregator';
import { PeriodAssigner } from './periods';

export interface ActivityRecord {
  user_id: string;
  timestamp: Date;
}

export interface ActivityEntry {
  user_id: string;
  period_start: Date;
}

export interface ActivityOptions {
  sources: ActivitySource[];
  minUrlViews: number;
}

/** Activity signals of each configured source, one list per source. */
export function selectActivity(tables: RawTables, options: ActivityOptions): ActivityRecord[][] {
  return options.sources.map((source) => {
    switch (source) {
      case 'streams':
        return tables.streams.filter((r) => r.attributes.converted).map(toActivity);
      case 'urls':
        return tables.urls.filter((r) => r.attributes.view_count >= options.minUrlViews).map(toActivity);
      case 'livestreams':
        return tables.livestreams.map(toActivity);
    }
  });
}

/** One entry per (user, period), however many source rows produced it. */
export function unifyActivity(sources: ActivityRecord[][], assigner: PeriodAssigner): ActivityEntry[] {
  const entries: ActivityEntry[] = [];
  for (const group of groupByPeriod(sources.flat(), assigner)) {
    const users = Array.from(new Set(group.rows.map((r) => r.user_id))).sort();
    for (const user_id of users) {
      entries.push({ user_id, period_start: group.start });
    }
  }
  return entries;
}

/** Each user's earliest activity across every source. */
export function firstAppearances(sources: ActivityRecord[][]): ActivityRecord[] {
  const first = new Map<string, Date>();
  for (const record of sources.flat()) {
    const seen = first.get(record.user_id);
    if (!seen || record.timestamp < seen) first.set(record.user_id, record.timestamp);
  }
  return Array.from(first.entries()).map(([user_id, timestamp]) => ({ user_id, timestamp }));
}

function toActivity(record: { user_id: string; timestamp: Date }): ActivityRecord {
  return { user_id: record.user_id, timestamp: record.timestamp };
}
