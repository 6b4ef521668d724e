import { parseArgs } from "node:util";
import type { Config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { LifecycleDaemon } from "./lifecycle/daemon.js";
import { formatDuration } from "./lifecycle/duration.js";
import { errorMessage, LifecycleError } from "./lifecycle/errors.js";
import { describeRetention, type LifecycleRunResult, runLifecycle } from "./lifecycle/orchestrator.js";
import { loadPolicy } from "./lifecycle/policy-loader.js";
import { resolveSchedule } from "./lifecycle/schedule-resolver.js";
import type { BlockStorageProvider, LifecycleNotifier } from "./lifecycle/types.js";

export const HELP = `snapshot-lifecycle: keep block-storage volume snapshots fresh and pruned

Usage: snapshot-lifecycle [command] [options]

Commands:
  run                 Create stale snapshots and purge redundant ones (default)
  list                Show each volume's schedules and planned keep/delete decisions

Options:
  --policy <file>       Snapshot policy file (default: $SNAPSHOT_POLICY_FILE)
  --dry-run             Log the planned actions without executing them
  --daemon              Repeat "run" every $RUN_INTERVAL_MINUTES minutes
  --continue-on-error   Skip a failing volume instead of aborting the run
  -h, --help            Show this help
`;

export type CliCommand = "run" | "list" | "help";

function isRunnableCommand(value: string): value is "run" | "list" {
  return value === "run" || value === "list";
}

export interface CliOptions {
  command: CliCommand;
  dryRun: boolean;
  daemon: boolean;
  continueOnError?: boolean;
  policyFile?: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv);
  } catch (err) {
    throw new UsageError(errorMessage(err));
  }

  const { values, positionals } = parsed;
  if (values.help) return { command: "help", dryRun: false, daemon: false };

  if (positionals.length > 1) {
    throw new UsageError(`Unexpected arguments: ${positionals.slice(1).join(" ")}`);
  }
  const command = positionals[0] ?? "run";
  if (!isRunnableCommand(command)) {
    throw new UsageError(`Unknown command: ${command}`);
  }
  if (command === "list" && values.daemon) {
    throw new UsageError("--daemon only applies to the run command");
  }

  return {
    command,
    dryRun: values["dry-run"] ?? false,
    daemon: values.daemon ?? false,
    continueOnError: values["continue-on-error"],
    policyFile: values.policy,
  };
}

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      policy: { type: "string" },
      "dry-run": { type: "boolean" },
      daemon: { type: "boolean" },
      "continue-on-error": { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });
}

export interface CliContext {
  config: Config;
  storage: BlockStorageProvider;
  notifier?: LifecycleNotifier;
  now?: () => Date;
  print?: (line: string) => void;
}

/** One lifecycle pass using the policy file named by the options or the config. */
export async function runOnce(ctx: CliContext, options: CliOptions): Promise<LifecycleRunResult> {
  const policy = loadPolicy(options.policyFile ?? ctx.config.lifecycle.policyFile);
  return runLifecycle(
    { storage: ctx.storage, notifier: ctx.notifier },
    {
      now: (ctx.now ?? (() => new Date()))(),
      volumeIds: policy.volumes,
      creationSchedules: policy.creationSchedules,
      purgeSchedules: policy.purgeSchedules,
      continueOnError: options.continueOnError ?? ctx.config.lifecycle.continueOnError,
      dryRun: options.dryRun,
      snapshotNamePrefix: ctx.config.lifecycle.snapshotNamePrefix,
    },
  );
}

/** Print each configured volume with its schedules and per-snapshot plan. Never mutates. */
export async function listPlan(ctx: CliContext, options: CliOptions): Promise<void> {
  const print = ctx.print ?? ((line: string) => console.log(line));
  const policy = loadPolicy(options.policyFile ?? ctx.config.lifecycle.policyFile);
  const now = (ctx.now ?? (() => new Date()))();

  const volumes = new Map((await ctx.storage.listVolumes(policy.volumes)).map((v) => [v.id, v]));
  const snapshots = await ctx.storage.listSnapshots();

  for (const volumeId of policy.volumes) {
    const creation = resolveSchedule(policy.creationSchedules, volumeId, "creation");
    const purge = resolveSchedule(policy.purgeSchedules, volumeId, "purge");
    const volume = volumes.get(volumeId);
    let label = volumeId;
    if (volume === undefined) {
      label = `${volumeId} (not found)`;
    } else if (volume.name) {
      label = `${volumeId} (${volume.name})`;
    }

    const keep = `keep hours=${purge.hours} days=${purge.days} weeks=${purge.weeks} months=${purge.months}`;
    print(`${label}  max age ${formatDuration(creation)}  ${keep}`);
    for (const row of describeRetention(now, volumeId, snapshots, purge)) {
      print(`  ${row.snapshotId}  ${row.createdAt}  ${row.action}${row.reason ? ` (${row.reason})` : ""}`);
    }
  }
}

/** Exit code of a finished run: 0 clean, 1 aborted or with errors. */
export function exitCodeFor(result: LifecycleRunResult): number {
  return result.aborted || result.errors.length > 0 ? 1 : 0;
}

/**
 * Execute a parsed command. Daemon mode resolves with the started daemon so
 * the caller can stop it on a signal; every other command resolves with an exit code.
 */
export async function execute(ctx: CliContext, options: CliOptions): Promise<number | LifecycleDaemon> {
  const print = ctx.print ?? ((line: string) => console.log(line));

  switch (options.command) {
    case "help":
      print(HELP);
      return 0;

    case "list":
      try {
        await listPlan(ctx, options);
        return 0;
      } catch (err) {
        if (!(err instanceof LifecycleError)) throw err;
        logger.error(err.message, { operation: err.operation, volumeId: err.volumeId });
        return 1;
      }

    case "run": {
      if (options.daemon) {
        const daemon = new LifecycleDaemon(() => runOnce(ctx, options), {
          intervalMs: ctx.config.lifecycle.runIntervalMinutes * 60_000,
        });
        daemon.start();
        return daemon;
      }

      try {
        return exitCodeFor(await runOnce(ctx, options));
      } catch (err) {
        if (!(err instanceof LifecycleError)) throw err;
        logger.error(err.message, { operation: err.operation });
        return 1;
      }
    }
  }
}
