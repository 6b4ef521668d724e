import { ConfigurationError } from "./errors.js";
import { type ScheduleKind, type ScheduleTable, WILDCARD } from "./types.js";

/**
 * Look up the schedule for a volume: its own entry first, then `*`.
 *
 * @throws ConfigurationError when neither entry exists
 */
export function resolveSchedule<T>(table: ScheduleTable<T>, volumeId: string, kind: ScheduleKind): T {
  const own = Object.hasOwn(table, volumeId) ? table[volumeId] : undefined;
  if (own !== undefined) return own;

  const fallback = Object.hasOwn(table, WILDCARD) ? table[WILDCARD] : undefined;
  if (fallback !== undefined) return fallback;

  throw new ConfigurationError(`No ${kind} schedule for volume ${volumeId}`, {
    operation: "resolve-schedule",
    volumeId,
  });
}
