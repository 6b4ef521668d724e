export type LifecycleOperation =
  | "load-config"
  | "resolve-schedule"
  | "load-policy"
  | "list-volumes"
  | "list-snapshots"
  | "create-snapshot"
  | "delete-snapshot"
  | "notify";

export interface LifecycleErrorContext {
  operation: LifecycleOperation;
  volumeId?: string;
  snapshotId?: string;
  cause?: unknown;
}

/** Base class for every failure the lifecycle run knows how to report. */
export class LifecycleError extends Error {
  readonly operation: LifecycleOperation;
  readonly volumeId?: string;
  readonly snapshotId?: string;

  constructor(message: string, context: LifecycleErrorContext) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = "LifecycleError";
    this.operation = context.operation;
    this.volumeId = context.volumeId;
    this.snapshotId = context.snapshotId;
  }
}

/** Missing schedule, invalid policy file or invalid environment. Always fatal. */
export class ConfigurationError extends LifecycleError {
  constructor(
    message: string,
    context: Omit<LifecycleErrorContext, "operation"> & { operation?: LifecycleOperation } = {},
  ) {
    super(message, { ...context, operation: context.operation ?? "resolve-schedule" });
    this.name = "ConfigurationError";
  }
}

export class VolumeNotFoundError extends LifecycleError {
  constructor(volumeId: string) {
    super(`Volume not found: ${volumeId}`, { operation: "list-volumes", volumeId });
    this.name = "VolumeNotFoundError";
  }
}

/** A collaborator call failed. `cause` carries the provider's own error. */
export class ApiError extends LifecycleError {
  constructor(message: string, context: LifecycleErrorContext) {
    super(message, context);
    this.name = "ApiError";
  }
}

export class DeleteError extends LifecycleError {
  constructor(snapshotId: string, reason: string, cause?: unknown) {
    super(`Failed to delete snapshot ${snapshotId}: ${reason}`, { operation: "delete-snapshot", snapshotId, cause });
    this.name = "DeleteError";
  }
}

export class NotificationError extends LifecycleError {
  constructor(message: string, cause?: unknown) {
    super(message, { operation: "notify", cause });
    this.name = "NotificationError";
  }
}

export type LifecycleErrorKind =
  | "ConfigurationError"
  | "VolumeNotFoundError"
  | "ApiError"
  | "DeleteError"
  | "NotificationError";

/** Plain-data form of an error, as carried in a run result. */
export interface LifecycleErrorReport {
  kind: LifecycleErrorKind;
  operation: LifecycleOperation;
  message: string;
  volumeId?: string;
  snapshotId?: string;
}

function kindOf(err: LifecycleError): LifecycleErrorKind {
  if (err instanceof ConfigurationError) return "ConfigurationError";
  if (err instanceof VolumeNotFoundError) return "VolumeNotFoundError";
  if (err instanceof DeleteError) return "DeleteError";
  if (err instanceof NotificationError) return "NotificationError";
  return "ApiError";
}

export function toErrorReport(err: LifecycleError): LifecycleErrorReport {
  const report: LifecycleErrorReport = { kind: kindOf(err), operation: err.operation, message: err.message };
  if (err.volumeId !== undefined) report.volumeId = err.volumeId;
  if (err.snapshotId !== undefined) report.snapshotId = err.snapshotId;
  return report;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
