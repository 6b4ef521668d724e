import { logger } from "../config/logger.js";
import { errorMessage } from "./errors.js";

/** Node clamps longer timer delays to 1 ms. */
const MAX_TIMER_MS = 2_147_483_647;

export interface DaemonConfig {
  /** Time between runs in milliseconds */
  intervalMs: number;
}

/**
 * Repeats a lifecycle run on a fixed interval.
 *
 * Runs once on start, then on every tick. A tick that arrives while the
 * previous run is still in flight is skipped, so runs never overlap.
 */
export class LifecycleDaemon {
  private readonly task: () => Promise<unknown>;
  private readonly intervalMs: number;

  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(task: () => Promise<unknown>, config: DaemonConfig) {
    if (!Number.isInteger(config.intervalMs) || config.intervalMs < 1 || config.intervalMs > MAX_TIMER_MS) {
      throw new RangeError(`Daemon interval must be between 1 and ${MAX_TIMER_MS} ms, got ${config.intervalMs}`);
    }
    this.task = task;
    this.intervalMs = config.intervalMs;
  }

  /**
   * Start the daemon timer
   */
  start(): void {
    if (this.timer) {
      logger.warn("Snapshot lifecycle daemon already running");
      return;
    }

    logger.info("Starting snapshot lifecycle daemon", { intervalMs: this.intervalMs });
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    void this.tick();
  }

  /**
   * Stop the timer and wait for an in-flight run to finish
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info("Snapshot lifecycle daemon stopped");
    }
    await this.inFlight;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Run the task unless one is already in flight. Resolves when that run settles. */
  tick(): Promise<void> {
    if (this.inFlight) {
      logger.warn("Previous snapshot lifecycle run still in progress, skipping tick");
      return this.inFlight;
    }

    this.inFlight = this.task()
      .then(() => undefined)
      .catch((err: unknown) => {
        logger.error("Snapshot lifecycle run failed", { err: errorMessage(err) });
      })
      .finally(() => {
        this.inFlight = null;
      });
    return this.inFlight;
  }
}
