import { logger } from "../config/logger.js";
import { ApiError, DeleteError, errorMessage, type LifecycleOperation } from "../lifecycle/errors.js";
import type { BlockStorageProvider, Snapshot, Volume } from "../lifecycle/types.js";
import type { DOClient, DOSnapshot, DOVolume } from "./do-client.js";

/** Tag put on every snapshot this tool creates. */
export const LIFECYCLE_TAG = "snapshot-lifecycle";

export function toSnapshot(snap: DOSnapshot): Snapshot {
  return {
    id: snap.id,
    volumeId: snap.resource_id,
    createdAt: new Date(snap.created_at),
    // DO only lists snapshots once they are usable
    status: "completed",
    name: snap.name,
  };
}

export function toVolume(vol: DOVolume): Volume {
  return {
    id: vol.id,
    name: vol.name,
    region: vol.region.slug,
    sizeGigabytes: vol.size_gigabytes,
  };
}

/** BlockStorageProvider backed by DigitalOcean volumes and volume snapshots. */
export class DOBlockStorage implements BlockStorageProvider {
  constructor(private readonly client: DOClient) {}

  async listSnapshots(): Promise<Snapshot[]> {
    const snapshots = await this.call("list-snapshots", () => this.client.listVolumeSnapshots());
    const parsed = snapshots.map(toSnapshot);
    const invalid = parsed.filter((s) => Number.isNaN(s.createdAt.getTime()));
    if (invalid.length > 0) {
      throw new ApiError(`Snapshots with unparseable created_at: ${invalid.map((s) => s.id).join(", ")}`, {
        operation: "list-snapshots",
      });
    }
    return parsed;
  }

  async listVolumes(ids: readonly string[]): Promise<Volume[]> {
    const volumes = await this.call("list-volumes", () => this.client.listVolumes());
    const wanted = new Set(ids);
    return volumes.filter((v) => wanted.has(v.id)).map(toVolume);
  }

  async createSnapshot(volumeId: string, name: string): Promise<Snapshot> {
    const created = await this.call(
      "create-snapshot",
      () => this.client.createVolumeSnapshot(volumeId, name, [LIFECYCLE_TAG]),
      volumeId,
    );
    logger.debug(`DO snapshot ${created.id} created for volume ${volumeId}`, { name });
    return toSnapshot(created);
  }

  async deleteSnapshot(snapshotId: string): Promise<void> {
    try {
      await this.client.deleteSnapshot(snapshotId);
    } catch (err) {
      throw new DeleteError(snapshotId, errorMessage(err), err);
    }
  }

  private async call<T>(operation: LifecycleOperation, fn: () => Promise<T>, volumeId?: string): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new ApiError(`DigitalOcean ${operation} failed: ${errorMessage(err)}`, { operation, volumeId, cause: err });
    }
  }
}
