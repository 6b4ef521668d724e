import fs from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";
import { creationScheduleSchema, purgeScheduleSchema } from "./types.js";

export const snapshotPolicySchema = z.object({
  /** Volumes to manage, processed in this order. */
  volumes: z
    .array(z.string().min(1))
    .min(1)
    .refine((ids) => new Set(ids).size === ids.length, { message: "volume ids must be unique" }),
  /** Maximum snapshot age per volume id, or `*`. */
  creationSchedules: z.record(z.string().min(1), creationScheduleSchema),
  /** Retention tiers per volume id, or `*`. */
  purgeSchedules: z.record(z.string().min(1), purgeScheduleSchema),
});

export type SnapshotPolicy = z.infer<typeof snapshotPolicySchema>;

/** Parse and validate a YAML snapshot policy document. */
export function parsePolicy(content: string, filename: string): SnapshotPolicy {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new ConfigurationError(`Invalid snapshot policy "${filename}": ${errorMessage(err)}`, {
      operation: "load-policy",
      cause: err,
    });
  }

  const result = snapshotPolicySchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid snapshot policy "${filename}": ${result.error.message}`, {
      operation: "load-policy",
    });
  }
  return result.data;
}

/** Load the snapshot policy file from disk. */
export function loadPolicy(filePath: string): SnapshotPolicy {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read snapshot policy "${filePath}": ${errorMessage(err)}`, {
      operation: "load-policy",
      cause: err,
    });
  }
  return parsePolicy(content, filePath);
}
