import { subtractDuration } from "./duration.js";
import type { CreationSchedule, Snapshot } from "./types.js";

/**
 * Newest non-error snapshot time, or null when there is none.
 * When `volumeId` is given, other volumes' snapshots are ignored.
 */
export function newestSnapshotTime(history: readonly Snapshot[], volumeId?: string): Date | null {
  let newest: number | null = null;
  for (const snap of history) {
    if (snap.status === "error") continue;
    if (volumeId !== undefined && snap.volumeId !== volumeId) continue;
    const t = snap.createdAt.getTime();
    if (newest === null || t > newest) newest = t;
  }
  return newest === null ? null : new Date(newest);
}

/**
 * True when the volume needs a new snapshot: it has no usable snapshot, or its
 * newest one is strictly older than `now - schedule`. Exactly on the boundary
 * counts as fresh.
 */
export function needsSnapshot(
  now: Date,
  history: readonly Snapshot[],
  schedule: CreationSchedule,
  volumeId?: string,
): boolean {
  const newest = newestSnapshotTime(history, volumeId);
  if (newest === null) return true;
  return newest.getTime() < subtractDuration(now, schedule).getTime();
}
