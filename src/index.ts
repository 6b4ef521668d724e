#!/usr/bin/env node
import { type CliContext, type CliOptions, execute, HELP, parseCliArgs, UsageError } from "./cli.js";
import { DOBlockStorage } from "./cloud/do-block-storage.js";
import { DOClient } from "./cloud/do-client.js";
import { type Config, config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { ConfigurationError } from "./lifecycle/errors.js";
import { WebhookNotifier } from "./notifications/webhook-notifier.js";
import { installProcessHandlers } from "./process-handlers.js";

installProcessHandlers();

function buildContext(cfg: Config): CliContext {
  if (!cfg.digitalocean.token) {
    throw new ConfigurationError("DO_API_TOKEN is required", { operation: "load-config" });
  }
  const { webhookUrl } = cfg.notifications;
  return {
    config: cfg,
    storage: new DOBlockStorage(new DOClient(cfg.digitalocean.token)),
    notifier: webhookUrl ? new WebhookNotifier({ webhookUrl }) : undefined,
  };
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`${err.message}\n\n${HELP}`);
    process.exitCode = 2;
    return;
  }

  if (options.command === "help") {
    console.log(HELP);
    return;
  }

  let ctx: CliContext;
  try {
    ctx = buildContext(config);
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    logger.error(err.message, { operation: err.operation });
    process.exitCode = 1;
    return;
  }

  const outcome = await execute(ctx, options);
  if (typeof outcome === "number") {
    process.exitCode = outcome;
    return;
  }

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, stopping snapshot lifecycle daemon`);
    outcome.stop().catch((err: unknown) => {
      logger.error("Failed to stop snapshot lifecycle daemon", { err });
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
  logger.info("Snapshot lifecycle daemon started", { intervalMinutes: config.lifecycle.runIntervalMinutes });
}

main().catch((err: unknown) => {
  logger.error("Snapshot lifecycle failed", { err });
  process.exitCode = 1;
});
