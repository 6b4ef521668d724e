export type BucketTier = "daily" | "weekly" | "monthly";

/** Retention bucket identity: a tier plus the first UTC calendar day it covers. */
export interface BucketKey {
  readonly tier: BucketTier;
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  readonly day: number;
}

const DAY_MS = 86_400_000;

/** Bucket containing `instant` for the given tier. Weeks start on Monday (ISO 8601). */
export function bucketKeyFor(tier: BucketTier, instant: Date): BucketKey {
  const year = instant.getUTCFullYear();
  const month = instant.getUTCMonth();
  const day = instant.getUTCDate();

  switch (tier) {
    case "daily":
      return { tier, year, month: month + 1, day };
    case "weekly": {
      // Sunday (0) is the last day of the ISO week
      const dayOfWeek = instant.getUTCDay() || 7;
      const start = new Date(Date.UTC(year, month, day) - (dayOfWeek - 1) * DAY_MS);
      return { tier, year: start.getUTCFullYear(), month: start.getUTCMonth() + 1, day: start.getUTCDate() };
    }
    case "monthly":
      return { tier, year, month: month + 1, day: 1 };
  }
}

/** Structural equality. `null` is the "no bucket yet" sentinel and equals nothing. */
export function sameBucket(a: BucketKey | null, b: BucketKey): boolean {
  return a !== null && a.tier === b.tier && a.year === b.year && a.month === b.month && a.day === b.day;
}
