import { logger } from "../config/logger.js";
import { formatDuration } from "./duration.js";
import {
  ApiError,
  DeleteError,
  errorMessage,
  LifecycleError,
  type LifecycleErrorReport,
  type LifecycleOperation,
  toErrorReport,
  VolumeNotFoundError,
} from "./errors.js";
import { planPurge } from "./retention-planner.js";
import { resolveSchedule } from "./schedule-resolver.js";
import { needsSnapshot } from "./staleness-detector.js";
import type {
  BlockStorageProvider,
  CreationSchedule,
  LifecycleIntent,
  LifecycleNotifier,
  PurgeSchedule,
  ResolvedSchedules,
  ScheduleTable,
  Snapshot,
  Volume,
} from "./types.js";

export interface LifecycleDeps {
  storage: BlockStorageProvider;
  notifier?: LifecycleNotifier;
}

export interface LifecycleRequest {
  /** Captured once by the caller; every age in the run is measured against it. */
  now: Date;
  volumeIds: readonly string[];
  creationSchedules: ScheduleTable<CreationSchedule>;
  purgeSchedules: ScheduleTable<PurgeSchedule>;
  /** Skip a volume whose lookup or create fails instead of aborting the run. */
  continueOnError?: boolean;
  /** Compute intents without calling create/delete. */
  dryRun?: boolean;
  snapshotNamePrefix?: string;
}

export interface LifecycleRunResult {
  created: string[];
  deleted: string[];
  errors: LifecycleErrorReport[];
  intents: LifecycleIntent[];
  schedules: ResolvedSchedules[];
  notifications: string[];
  aborted: boolean;
}

/** Name given to a created snapshot: `<prefix>-<volumeId>-<yyyyMMddHHmmss>` (UTC). */
export function snapshotName(prefix: string, volumeId: string, now: Date): string {
  const stamp = now
    .toISOString()
    .replace(/\.\d{3}Z$/, "")
    .replace(/[-:T]/g, "");
  return `${prefix}-${volumeId}-${stamp}`;
}

/** Wrap anything a collaborator throws into a lifecycle error with context. */
function asLifecycleError(
  err: unknown,
  operation: LifecycleOperation,
  context: { volumeId?: string; snapshotId?: string } = {},
): LifecycleError {
  if (err instanceof LifecycleError) return err;
  if (operation === "delete-snapshot" && context.snapshotId !== undefined) {
    return new DeleteError(context.snapshotId, errorMessage(err), err);
  }
  return new ApiError(`${operation} failed: ${errorMessage(err)}`, { operation, ...context, cause: err });
}

function volumeLabel(volume: Volume | undefined, volumeId: string): string {
  return volume?.name ? `${volume.name} (${volumeId})` : volumeId;
}

/**
 * One lifecycle pass over the configured volumes.
 *
 * 1. Resolve both schedules for every volume (no I/O yet)
 * 2. Validate the volume list against the provider
 * 3. Fetch the snapshot inventory once
 * 4. Create snapshots for stale volumes
 * 5. Re-fetch the inventory if anything was created
 * 6. Plan and execute deletions per volume
 * 7. Send the notification summary
 */
export async function runLifecycle(deps: LifecycleDeps, request: LifecycleRequest): Promise<LifecycleRunResult> {
  const { storage, notifier } = deps;
  const { now, volumeIds } = request;
  const continueOnError = request.continueOnError ?? false;
  const dryRun = request.dryRun ?? false;
  const prefix = request.snapshotNamePrefix ?? "auto";

  const result: LifecycleRunResult = {
    created: [],
    deleted: [],
    errors: [],
    intents: [],
    schedules: [],
    notifications: [],
    aborted: false,
  };

  const fail = (err: LifecycleError, level: "error" | "warn" = "error") => {
    const report = toErrorReport(err);
    result.errors.push(report);
    logger[level](`Snapshot lifecycle: ${err.message}`, report);
  };

  const abort = (): LifecycleRunResult => {
    result.aborted = true;
    logger.error("Snapshot lifecycle: run aborted", { errors: result.errors.length });
    return result;
  };

  logger.info("Snapshot lifecycle: run started", { now: now.toISOString(), volumes: volumeIds.length, dryRun });

  // 1. Schedules
  for (const volumeId of volumeIds) {
    try {
      result.schedules.push({
        volumeId,
        creation: resolveSchedule(request.creationSchedules, volumeId, "creation"),
        purge: resolveSchedule(request.purgeSchedules, volumeId, "purge"),
      });
    } catch (err) {
      fail(asLifecycleError(err, "resolve-schedule", { volumeId }));
      return abort();
    }
  }

  // 2. Volumes
  let volumes: Map<string, Volume>;
  try {
    const listed = await storage.listVolumes(volumeIds);
    volumes = new Map(listed.map((v) => [v.id, v]));
  } catch (err) {
    fail(asLifecycleError(err, "list-volumes"));
    return abort();
  }

  const missing = volumeIds.filter((id) => !volumes.has(id));
  for (const volumeId of missing) {
    fail(new VolumeNotFoundError(volumeId), continueOnError ? "warn" : "error");
  }
  if (missing.length > 0 && !continueOnError) return abort();

  const active = result.schedules.filter((s) => volumes.has(s.volumeId));

  // 3. Inventory
  let inventory: Snapshot[];
  try {
    inventory = await storage.listSnapshots();
  } catch (err) {
    fail(asLifecycleError(err, "list-snapshots"));
    return abort();
  }

  // 4. Freshness
  const skipped = new Set<string>();
  for (const { volumeId, creation } of active) {
    if (!needsSnapshot(now, inventory, creation, volumeId)) {
      logger.debug(`Volume ${volumeId} is fresh`, { volumeId, maxAge: formatDuration(creation) });
      continue;
    }

    result.intents.push({ type: "create", volumeId });
    if (dryRun) {
      logger.info(`[dry-run] Would create snapshot for volume ${volumeId}`, { volumeId });
      continue;
    }

    try {
      const created = await storage.createSnapshot(volumeId, snapshotName(prefix, volumeId, now));
      result.created.push(created.id);
      result.notifications.push(
        `Created snapshot ${created.id} for volume ${volumeLabel(volumes.get(volumeId), volumeId)}`,
      );
      logger.info(`Created snapshot ${created.id} for volume ${volumeId}`, {
        volumeId,
        snapshotId: created.id,
        maxAge: formatDuration(creation),
      });
    } catch (err) {
      fail(asLifecycleError(err, "create-snapshot", { volumeId }), continueOnError ? "warn" : "error");
      if (!continueOnError) return abort();
      skipped.add(volumeId);
    }
  }

  // 5. Refresh so new snapshots take part in the purge
  if (result.created.length > 0) {
    try {
      inventory = await storage.listSnapshots();
    } catch (err) {
      fail(asLifecycleError(err, "list-snapshots"));
      return abort();
    }
  }

  // 6. Purge
  for (const { volumeId, purge } of active) {
    if (skipped.has(volumeId)) continue;

    const history = inventory.filter((s) => s.volumeId === volumeId && s.status !== "error");
    const decision = planPurge(now, history, purge);
    const doomed = history
      .filter((s) => decision.delete.has(s.id))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());

    logger.info(`Retention for volume ${volumeId}: keep=${decision.keep.size}, delete=${doomed.length}`, {
      volumeId,
      hours: purge.hours,
      days: purge.days,
      weeks: purge.weeks,
    });

    for (const snap of doomed) {
      result.intents.push({ type: "delete", volumeId, snapshotId: snap.id });
      if (dryRun) {
        logger.info(`[dry-run] Would delete snapshot ${snap.id} of volume ${volumeId}`, {
          volumeId,
          snapshotId: snap.id,
          createdAt: snap.createdAt.toISOString(),
        });
        continue;
      }

      try {
        await storage.deleteSnapshot(snap.id);
        result.deleted.push(snap.id);
        const label = volumeLabel(volumes.get(volumeId), volumeId);
        result.notifications.push(`Deleted snapshot ${snap.id} (${snap.createdAt.toISOString()}) of volume ${label}`);
        logger.info(`Deleted snapshot ${snap.id} of volume ${volumeId}`, { volumeId, snapshotId: snap.id });
      } catch (err) {
        // A failed delete never blocks the others
        fail(asLifecycleError(err, "delete-snapshot", { volumeId, snapshotId: snap.id }), "warn");
      }
    }
  }

  // 7. Notify
  if (notifier && result.notifications.length > 0) {
    try {
      await notifier.notify(result.notifications.join("\n"));
    } catch (err) {
      logger.warn("Snapshot lifecycle: notification failed", { err: errorMessage(err) });
    }
  }

  const { created, deleted, errors } = result;
  logger.info(
    `Snapshot lifecycle: run complete (created=${created.length}, deleted=${deleted.length}, errors=${errors.length})`,
    { dryRun, intents: result.intents.length },
  );

  return result;
}

/** One line per snapshot for the `list` command: planned decision and bucket. */
export function describeRetention(now: Date, volumeId: string, snapshots: readonly Snapshot[], purge: PurgeSchedule) {
  const history = snapshots.filter((s) => s.volumeId === volumeId && s.status !== "error");
  const decision = planPurge(now, history, purge);
  return [...history]
    .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
    .map((s) => ({
      snapshotId: s.id,
      createdAt: s.createdAt.toISOString(),
      action: decision.delete.has(s.id) ? ("delete" as const) : ("keep" as const),
      reason: decision.reasons.get(s.id) ?? null,
    }));
}
