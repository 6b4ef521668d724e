import { DeleteError } from "../lifecycle/errors.js";
import type { BlockStorageProvider, Snapshot, SnapshotStatus, Volume } from "../lifecycle/types.js";

export interface InMemoryBlockStorageOptions {
  volumes?: Volume[];
  snapshots?: Snapshot[];
  /** Timestamp given to created snapshots. */
  clock?: () => Date;
  /** Status given to created snapshots. */
  createdStatus?: SnapshotStatus;
}

/** In-process provider for tests and local dry runs. */
export class InMemoryBlockStorage implements BlockStorageProvider {
  private readonly volumes: Map<string, Volume>;
  private readonly snapshots = new Map<string, Snapshot>();
  private readonly clock: () => Date;
  private readonly createdStatus: SnapshotStatus;
  private nextId = 1;

  constructor(opts: InMemoryBlockStorageOptions = {}) {
    this.volumes = new Map((opts.volumes ?? []).map((v) => [v.id, v]));
    for (const snap of opts.snapshots ?? []) this.snapshots.set(snap.id, snap);
    this.clock = opts.clock ?? (() => new Date());
    this.createdStatus = opts.createdStatus ?? "completed";
  }

  async listSnapshots(): Promise<Snapshot[]> {
    return [...this.snapshots.values()].map((s) => ({ ...s }));
  }

  async listVolumes(ids: readonly string[]): Promise<Volume[]> {
    return ids.flatMap((id) => {
      const volume = this.volumes.get(id);
      return volume ? [{ ...volume }] : [];
    });
  }

  async createSnapshot(volumeId: string, name: string): Promise<Snapshot> {
    const snapshot: Snapshot = {
      id: `snap-${this.nextId++}`,
      volumeId,
      createdAt: this.clock(),
      status: this.createdStatus,
      name,
    };
    this.snapshots.set(snapshot.id, snapshot);
    return { ...snapshot };
  }

  async deleteSnapshot(snapshotId: string): Promise<void> {
    if (!this.snapshots.delete(snapshotId)) {
      throw new DeleteError(snapshotId, "snapshot not found");
    }
  }

  /** Current snapshot ids, for assertions. */
  snapshotIds(): string[] {
    return [...this.snapshots.keys()].sort();
  }
}
