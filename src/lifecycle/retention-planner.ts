import { type BucketKey, type BucketTier, bucketKeyFor, sameBucket } from "./bucket-key.js";
import type { KeepReason, PurgeSchedule, RetentionDecision, Snapshot } from "./types.js";

const HOUR_MS = 3_600_000;

/** Age thresholds, in whole hours, derived from a purge schedule. */
export interface TierBoundaries {
  youthHours: number;
  dailyEnd: number;
  weeklyEnd: number;
}

export function tierBoundaries(schedule: PurgeSchedule): TierBoundaries {
  const dailyEnd = schedule.hours + schedule.days * 24;
  return {
    youthHours: schedule.hours,
    dailyEnd,
    weeklyEnd: dailyEnd + schedule.weeks * 24 * 7,
  };
}

/** Which tier an age falls in; "young" snapshots are never eligible for deletion. */
export function classifyAge(ageHours: number, bounds: TierBoundaries): BucketTier | "young" {
  if (ageHours <= bounds.youthHours) return "young";
  if (ageHours <= bounds.dailyEnd) return "daily";
  if (ageHours <= bounds.weeklyEnd) return "weekly";
  return "monthly";
}

export function ageInHours(now: Date, createdAt: Date): number {
  return Math.floor((now.getTime() - createdAt.getTime()) / HOUR_MS);
}

/**
 * Split one volume's snapshots into keep and delete sets.
 *
 * Walks oldest to newest. Past the youth window, the first snapshot seen in
 * each daily/weekly/monthly bucket is kept and later ones in the same bucket
 * are deleted. The newest snapshot is always kept.
 *
 * `snapshots` must belong to a single volume and exclude error-status entries.
 */
export function planPurge(now: Date, snapshots: readonly Snapshot[], schedule: PurgeSchedule): RetentionDecision {
  const decision: RetentionDecision = { keep: new Set(), delete: new Set(), reasons: new Map() };
  if (snapshots.length === 0) return decision;

  const ordered = [...snapshots].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  const newestId = ordered[ordered.length - 1].id;
  const bounds = tierBoundaries(schedule);

  const keep = (id: string, reason: KeepReason) => {
    decision.keep.add(id);
    decision.reasons.set(id, reason);
  };

  let prev: BucketKey | null = null;
  for (const snap of ordered) {
    const tier = classifyAge(ageInHours(now, snap.createdAt), bounds);
    if (tier === "young") {
      // does not claim a bucket
      keep(snap.id, "young");
      continue;
    }

    const key = bucketKeyFor(tier, snap.createdAt);
    if (!sameBucket(prev, key)) {
      keep(snap.id, "bucket");
      prev = key;
    } else if (snap.id === newestId) {
      keep(snap.id, "newest");
    } else {
      decision.delete.add(snap.id);
    }
  }

  return decision;
}
