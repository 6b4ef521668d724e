import { beforeEach, describe, expect, it, vi } from "vitest";
import { InMemoryBlockStorage } from "../cloud/in-memory-block-storage.js";
import { describeRetention, type LifecycleRequest, runLifecycle, snapshotName } from "./orchestrator.js";
import type { Snapshot } from "./types.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

const NOW = new Date("2026-03-20T12:00:00.000Z");

function snap(id: string, volumeId: string, createdAt: string, overrides: Partial<Snapshot> = {}): Snapshot {
  return { id, volumeId, createdAt: new Date(createdAt), status: "completed", ...overrides };
}

function makeRequest(overrides: Partial<LifecycleRequest> = {}): LifecycleRequest {
  return {
    now: NOW,
    volumeIds: ["vol-a"],
    creationSchedules: { "*": { hours: 24 } },
    purgeSchedules: { "*": { hours: 24, days: 7, weeks: 4, months: 0 } },
    ...overrides,
  };
}

describe("snapshotName", () => {
  it("stamps the prefix, volume and UTC time", () => {
    expect(snapshotName("auto", "vol-a", NOW)).toBe("auto-vol-a-20260320120000");
  });
});

describe("runLifecycle", () => {
  let storage: InMemoryBlockStorage;

  beforeEach(() => {
    vi.clearAllMocks();
    storage = new InMemoryBlockStorage({
      volumes: [{ id: "vol-a", name: "db-data" }, { id: "vol-b" }],
      clock: () => NOW,
    });
  });

  it("creates a snapshot for a volume with no history and refreshes the inventory", async () => {
    const listSpy = vi.spyOn(storage, "listSnapshots");
    const createSpy = vi.spyOn(storage, "createSnapshot");

    const result = await runLifecycle({ storage }, makeRequest());

    expect(result.aborted).toBe(false);
    expect(result.created).toEqual(["snap-1"]);
    expect(result.deleted).toEqual([]);
    expect(result.intents).toEqual([{ type: "create", volumeId: "vol-a" }]);
    expect(result.notifications).toEqual(["Created snapshot snap-1 for volume db-data (vol-a)"]);
    expect(createSpy).toHaveBeenCalledWith("vol-a", "auto-vol-a-20260320120000");
    expect(listSpy).toHaveBeenCalledTimes(2);
    expect(storage.snapshotIds()).toEqual(["snap-1"]);
  });

  it("purges against the refreshed inventory so the new snapshot displaces the old newest", async () => {
    storage = new InMemoryBlockStorage({
      volumes: [{ id: "vol-a" }],
      snapshots: [snap("s1", "vol-a", "2026-03-18T09:00:00.000Z"), snap("s2", "vol-a", "2026-03-18T10:00:00.000Z")],
      clock: () => NOW,
    });

    const result = await runLifecycle({ storage }, makeRequest());

    expect(result.created).toEqual(["snap-1"]);
    expect(result.deleted).toEqual(["s2"]);
    expect(storage.snapshotIds()).toEqual(["s1", "snap-1"]);
  });

  it("counts a still-pending created snapshot as fresh and as part of the history", async () => {
    storage = new InMemoryBlockStorage({
      volumes: [{ id: "vol-a" }],
      snapshots: [snap("s1", "vol-a", "2026-03-18T09:00:00.000Z"), snap("s2", "vol-a", "2026-03-18T10:00:00.000Z")],
      clock: () => NOW,
      createdStatus: "pending",
    });

    const first = await runLifecycle({ storage }, makeRequest());
    expect(first.created).toEqual(["snap-1"]);
    expect(first.deleted).toEqual(["s2"]);

    const second = await runLifecycle({ storage }, makeRequest());
    expect(second.created).toEqual([]);
    expect(second.intents).toEqual([]);
    expect(storage.snapshotIds()).toEqual(["s1", "snap-1"]);
  });

  it("does not create or refresh when the newest snapshot is fresh", async () => {
    storage = new InMemoryBlockStorage({
      volumes: [{ id: "vol-a" }],
      snapshots: [snap("s1", "vol-a", "2026-03-20T06:00:00.000Z")],
    });
    const listSpy = vi.spyOn(storage, "listSnapshots");

    const result = await runLifecycle({ storage }, makeRequest());

    expect(result.created).toEqual([]);
    expect(result.intents).toEqual([]);
    expect(listSpy).toHaveBeenCalledTimes(1);
  });

  it("deletes redundant snapshots and ignores error-status ones", async () => {
    storage = new InMemoryBlockStorage({
      volumes: [{ id: "vol-a", name: "db-data" }],
      snapshots: [
        snap("e1", "vol-a", "2026-03-13T08:00:00.000Z", { status: "error" }),
        snap("s1", "vol-a", "2026-03-13T09:00:00.000Z"),
        snap("s2", "vol-a", "2026-03-13T10:00:00.000Z"),
        snap("s3", "vol-a", "2026-03-20T11:00:00.000Z"),
        snap("other", "vol-z", "2026-03-13T11:00:00.000Z"),
      ],
    });

    const result = await runLifecycle({ storage }, makeRequest());

    expect(result.deleted).toEqual(["s2"]);
    expect(result.intents).toEqual([{ type: "delete", volumeId: "vol-a", snapshotId: "s2" }]);
    expect(result.notifications).toEqual(["Deleted snapshot s2 (2026-03-13T10:00:00.000Z) of volume db-data (vol-a)"]);
    expect(storage.snapshotIds()).toEqual(["e1", "other", "s1", "s3"]);
  });

  it("resolves per-volume schedules ahead of the wildcard", async () => {
    storage = new InMemoryBlockStorage({
      volumes: [{ id: "vol-a" }, { id: "vol-b" }],
      snapshots: [snap("a1", "vol-a", "2026-03-20T06:00:00.000Z"), snap("b1", "vol-b", "2026-03-20T06:00:00.000Z")],
      clock: () => NOW,
    });

    const result = await runLifecycle(
      { storage },
      makeRequest({
        volumeIds: ["vol-a", "vol-b"],
        creationSchedules: { "*": { hours: 24 }, "vol-b": { hours: 4 } },
      }),
    );

    expect(result.intents).toEqual([{ type: "create", volumeId: "vol-b" }]);
    expect(result.schedules.map((s) => [s.volumeId, s.creation])).toEqual([
      ["vol-a", { hours: 24 }],
      ["vol-b", { hours: 4 }],
    ]);
  });

  it("aborts before any I/O when a volume has no schedule", async () => {
    const listVolumesSpy = vi.spyOn(storage, "listVolumes");

    const result = await runLifecycle(
      { storage },
      makeRequest({
        volumeIds: ["vol-a", "vol-b"],
        purgeSchedules: { "vol-a": { hours: 24, days: 7, weeks: 4, months: 0 } },
      }),
    );

    expect(result.aborted).toBe(true);
    expect(result.errors).toEqual([
      {
        kind: "ConfigurationError",
        operation: "resolve-schedule",
        message: "No purge schedule for volume vol-b",
        volumeId: "vol-b",
      },
    ]);
    expect(listVolumesSpy).not.toHaveBeenCalled();
  });

  it("aborts when a configured volume does not exist", async () => {
    const createSpy = vi.spyOn(storage, "createSnapshot");

    const result = await runLifecycle({ storage }, makeRequest({ volumeIds: ["vol-a", "vol-gone"] }));

    expect(result.aborted).toBe(true);
    expect(result.errors).toEqual([
      {
        kind: "VolumeNotFoundError",
        operation: "list-volumes",
        message: "Volume not found: vol-gone",
        volumeId: "vol-gone",
      },
    ]);
    expect(createSpy).not.toHaveBeenCalled();
  });

  it("skips a missing volume when continueOnError is set", async () => {
    const result = await runLifecycle(
      { storage },
      makeRequest({ volumeIds: ["vol-gone", "vol-a"], continueOnError: true }),
    );

    expect(result.aborted).toBe(false);
    expect(result.errors.map((e) => e.kind)).toEqual(["VolumeNotFoundError"]);
    expect(result.intents).toEqual([{ type: "create", volumeId: "vol-a" }]);
  });

  it("aborts when the inventory cannot be listed", async () => {
    vi.spyOn(storage, "listSnapshots").mockRejectedValueOnce(new Error("boom"));

    const result = await runLifecycle({ storage }, makeRequest());

    expect(result.aborted).toBe(true);
    expect(result.errors).toEqual([
      { kind: "ApiError", operation: "list-snapshots", message: "list-snapshots failed: boom" },
    ]);
  });

  it("aborts on the first failed create by default", async () => {
    const createSpy = vi.spyOn(storage, "createSnapshot").mockRejectedValueOnce(new Error("quota exceeded"));

    const result = await runLifecycle({ storage }, makeRequest({ volumeIds: ["vol-a", "vol-b"] }));

    expect(result.aborted).toBe(true);
    expect(createSpy).toHaveBeenCalledTimes(1);
    expect(result.errors).toEqual([
      {
        kind: "ApiError",
        operation: "create-snapshot",
        message: "create-snapshot failed: quota exceeded",
        volumeId: "vol-a",
      },
    ]);
  });

  it("continues past a failed create and skips that volume's purge when continueOnError is set", async () => {
    storage = new InMemoryBlockStorage({
      volumes: [{ id: "vol-a" }, { id: "vol-b" }],
      snapshots: [snap("s1", "vol-a", "2026-03-13T09:00:00.000Z"), snap("s2", "vol-a", "2026-03-13T10:00:00.000Z")],
      clock: () => NOW,
    });
    vi.spyOn(storage, "createSnapshot").mockRejectedValueOnce(new Error("quota exceeded"));

    const result = await runLifecycle(
      { storage },
      makeRequest({ volumeIds: ["vol-a", "vol-b"], continueOnError: true }),
    );

    expect(result.aborted).toBe(false);
    expect(result.created).toEqual(["snap-1"]);
    expect(result.deleted).toEqual([]);
    expect(result.errors.map((e) => [e.kind, e.volumeId])).toEqual([["ApiError", "vol-a"]]);
    expect(storage.snapshotIds()).toEqual(["s1", "s2", "snap-1"]);
  });

  it("collects delete failures and keeps deleting the rest", async () => {
    storage = new InMemoryBlockStorage({
      volumes: [{ id: "vol-a" }],
      snapshots: [
        snap("s1", "vol-a", "2026-03-13T09:00:00.000Z"),
        snap("s2", "vol-a", "2026-03-13T10:00:00.000Z"),
        snap("s3", "vol-a", "2026-03-13T11:00:00.000Z"),
        snap("s4", "vol-a", "2026-03-20T11:00:00.000Z"),
      ],
    });
    vi.spyOn(storage, "deleteSnapshot").mockRejectedValueOnce(new Error("snapshot in use"));

    const result = await runLifecycle({ storage }, makeRequest());

    expect(result.aborted).toBe(false);
    expect(result.deleted).toEqual(["s3"]);
    expect(result.errors).toEqual([
      {
        kind: "DeleteError",
        operation: "delete-snapshot",
        message: "Failed to delete snapshot s2: snapshot in use",
        snapshotId: "s2",
      },
    ]);
    expect(storage.snapshotIds()).toEqual(["s1", "s2", "s4"]);
  });

  it("emits intents without executing them in dry-run mode", async () => {
    storage = new InMemoryBlockStorage({
      volumes: [{ id: "vol-a" }, { id: "vol-b" }],
      snapshots: [snap("s1", "vol-a", "2026-03-13T09:00:00.000Z"), snap("s2", "vol-a", "2026-03-13T10:00:00.000Z")],
    });
    const createSpy = vi.spyOn(storage, "createSnapshot");
    const deleteSpy = vi.spyOn(storage, "deleteSnapshot");
    const listSpy = vi.spyOn(storage, "listSnapshots");

    const result = await runLifecycle({ storage }, makeRequest({ volumeIds: ["vol-a", "vol-b"], dryRun: true }));

    expect(result.intents).toEqual([
      { type: "create", volumeId: "vol-a" },
      { type: "create", volumeId: "vol-b" },
      { type: "delete", volumeId: "vol-a", snapshotId: "s2" },
    ]);
    expect(result.created).toEqual([]);
    expect(result.deleted).toEqual([]);
    expect(result.notifications).toEqual([]);
    expect(createSpy).not.toHaveBeenCalled();
    expect(deleteSpy).not.toHaveBeenCalled();
    expect(listSpy).toHaveBeenCalledTimes(1);
  });

  it("sends one notification with every executed action", async () => {
    const notifier = { notify: vi.fn().mockResolvedValue(undefined) };

    await runLifecycle({ storage, notifier }, makeRequest({ volumeIds: ["vol-a", "vol-b"] }));

    expect(notifier.notify).toHaveBeenCalledOnce();
    expect(notifier.notify).toHaveBeenCalledWith(
      "Created snapshot snap-1 for volume db-data (vol-a)\nCreated snapshot snap-2 for volume vol-b",
    );
  });

  it("does not notify when nothing was done", async () => {
    storage = new InMemoryBlockStorage({
      volumes: [{ id: "vol-a" }],
      snapshots: [snap("s1", "vol-a", "2026-03-20T06:00:00.000Z")],
    });
    const notifier = { notify: vi.fn().mockResolvedValue(undefined) };

    await runLifecycle({ storage, notifier }, makeRequest());

    expect(notifier.notify).not.toHaveBeenCalled();
  });

  it("does not fail the run when the notification fails", async () => {
    const notifier = { notify: vi.fn().mockRejectedValue(new Error("webhook down")) };

    const result = await runLifecycle({ storage, notifier }, makeRequest());

    expect(result.aborted).toBe(false);
    expect(result.errors).toEqual([]);
    expect(result.created).toEqual(["snap-1"]);
  });
});

describe("describeRetention", () => {
  it("lists each snapshot oldest first with its planned action", () => {
    const snapshots = [
      snap("s3", "vol-a", "2026-03-20T11:00:00.000Z"),
      snap("s1", "vol-a", "2026-03-13T09:00:00.000Z"),
      snap("s2", "vol-a", "2026-03-13T10:00:00.000Z"),
      snap("x", "vol-b", "2026-03-13T10:00:00.000Z"),
    ];

    const rows = describeRetention(NOW, "vol-a", snapshots, { hours: 24, days: 7, weeks: 4, months: 0 });

    expect(rows).toEqual([
      { snapshotId: "s1", createdAt: "2026-03-13T09:00:00.000Z", action: "keep", reason: "bucket" },
      { snapshotId: "s2", createdAt: "2026-03-13T10:00:00.000Z", action: "delete", reason: null },
      { snapshotId: "s3", createdAt: "2026-03-20T11:00:00.000Z", action: "keep", reason: "young" },
    ]);
  });
});
