import { z } from "zod";

/** "true"/"false" env flag. `z.coerce.boolean()` would read "false" as true. */
const envFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

/** Longest interval `setInterval` honours (2^31-1 ms); longer delays fire after 1 ms. */
export const MAX_RUN_INTERVAL_MINUTES = 35_791;

export const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** DigitalOcean API access. */
  digitalocean: z
    .object({
      token: z.string().default(""),
    })
    .default({ token: "" }),

  /** Snapshot lifecycle run settings. */
  lifecycle: z
    .object({
      /** YAML file with the volume list and the creation/purge schedule tables. */
      policyFile: z.string().min(1).default("./snapshot-policy.yaml"),
      /** Skip a failing volume instead of aborting the run. */
      continueOnError: envFlag,
      /** Daemon mode interval between runs. Timers cap out at 2^31-1 ms. */
      runIntervalMinutes: z.coerce.number().int().min(1).max(MAX_RUN_INTERVAL_MINUTES).default(60),
      /** Prefix of the names given to created snapshots. */
      snapshotNamePrefix: z
        .string()
        .regex(/^[a-zA-Z0-9_-]+$/)
        .default("auto"),
    })
    .default({}),

  /** Optional webhook that receives the run summary. */
  notifications: z
    .object({
      webhookUrl: z.string().url().optional(),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

/** Empty strings in the environment count as unset. */
function env(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function loadConfig(): Config {
  return configSchema.parse({
    nodeEnv: env("NODE_ENV"),
    logLevel: env("LOG_LEVEL"),
    digitalocean: {
      token: env("DO_API_TOKEN"),
    },
    lifecycle: {
      policyFile: env("SNAPSHOT_POLICY_FILE"),
      continueOnError: env("CONTINUE_ON_ERROR"),
      runIntervalMinutes: env("RUN_INTERVAL_MINUTES"),
      snapshotNamePrefix: env("SNAPSHOT_NAME_PREFIX"),
    },
    notifications: {
      webhookUrl: env("NOTIFY_WEBHOOK_URL"),
    },
  });
}

export const config = loadConfig();
