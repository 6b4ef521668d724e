import { z } from "zod";

/** Snapshot states reported by the block-storage provider. */
export const snapshotStatusSchema = z.enum(["pending", "completed", "error"]);
export type SnapshotStatus = z.infer<typeof snapshotStatusSchema>;

/** A point-in-time snapshot of one volume, as observed at the start of a run. */
export interface Snapshot {
  id: string;
  volumeId: string;
  createdAt: Date;
  status: SnapshotStatus;
  name?: string;
}

export interface Volume {
  id: string;
  name?: string;
  region?: string;
  sizeGigabytes?: number;
}

const durationField = z.number().int().min(0).optional();

/** Calendar-like duration. Years and months are calendar units; the rest are fixed. */
export const durationSchema = z
  .object({
    years: durationField,
    months: durationField,
    days: durationField,
    hours: durationField,
    minutes: durationField,
  })
  .strict();
export type Duration = z.infer<typeof durationSchema>;

/** Maximum age of the newest snapshot before a new one is taken. */
export const creationScheduleSchema = durationSchema.refine(
  (d) => Object.values(d).some((v) => v !== undefined && v > 0),
  { message: "creation schedule must have at least one positive field" },
);
export type CreationSchedule = z.infer<typeof creationScheduleSchema>;

/**
 * Tiered retention thresholds.
 *
 * `hours` is the youth window; `days` and `weeks` are tier widths. Anything
 * older than `hours + days*24 + weeks*168` hours falls in the unbounded monthly tier.
 */
export const purgeScheduleSchema = z
  .object({
    hours: z.number().min(0).default(0),
    days: z.number().min(0).default(0),
    weeks: z.number().min(0).default(0),
    months: z.number().min(0).default(0),
  })
  .strict();
export type PurgeSchedule = z.infer<typeof purgeScheduleSchema>;

/** Schedule records keyed by volume id, with `*` as the fallback. */
export type ScheduleTable<T> = Readonly<Record<string, T>>;

export const WILDCARD = "*";

export type ScheduleKind = "creation" | "purge";

export type KeepReason = "young" | "bucket" | "newest";

export interface RetentionDecision {
  keep: Set<string>;
  delete: Set<string>;
  /** Why each kept snapshot survived. */
  reasons: Map<string, KeepReason>;
}

export interface ResolvedSchedules {
  volumeId: string;
  creation: CreationSchedule;
  purge: PurgeSchedule;
}

export type LifecycleIntent =
  | { type: "create"; volumeId: string }
  | { type: "delete"; volumeId: string; snapshotId: string };

/** Cloud side of the run. Implementations do I/O; the planner never does. */
export interface BlockStorageProvider {
  /** Every snapshot in the account; may include volumes outside the configured set. */
  listSnapshots(): Promise<Snapshot[]>;
  /** The subset of `ids` that exist. Missing ids are simply absent from the result. */
  listVolumes(ids: readonly string[]): Promise<Volume[]>;
  createSnapshot(volumeId: string, name: string): Promise<Snapshot>;
  deleteSnapshot(snapshotId: string): Promise<void>;
}

export interface LifecycleNotifier {
  notify(text: string): Promise<void>;
}
