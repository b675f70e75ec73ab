/**
 * Interval daemon: periodic backups and uploads
 */

import { MAX_INTERVAL_HOURS } from "../../config/defaults";
import type { DaemonSettings } from "../../types";
import { formatErrorChain } from "../../utils/errors";
import { logger } from "../../utils/logger";

const HOUR_MS = 60 * 60 * 1000;

export type DaemonTaskName = "backup" | "upload";

export type DaemonTasks = Record<DaemonTaskName, () => Promise<unknown>>;

/**
 * Two timers feed one queue. Handlers run one at a time, each timer holds at
 * most one pending tick, and a failed handler is logged and forgotten.
 */
export class Daemon {
  private readonly settings: DaemonSettings;
  private readonly tasks: DaemonTasks;
  private timers: NodeJS.Timeout[] = [];
  private pending: DaemonTaskName[] = [];
  private draining: Promise<void> | null = null;
  private running = false;

  constructor(settings: DaemonSettings, tasks: DaemonTasks) {
    for (const [label, hours] of [
      ["backup", settings.backupIntervalHours],
      ["upload", settings.uploadIntervalHours],
    ] as const) {
      if (!(hours > 0 && hours <= MAX_INTERVAL_HOURS)) {
        // Node turns larger timer delays into 1 ms
        throw new RangeError(`${label} interval must be between 0 and ${MAX_INTERVAL_HOURS} hours, got ${hours}`);
      }
    }
    this.settings = settings;
    this.tasks = tasks;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      logger.warn("Daemon is already running");
      return;
    }

    this.running = true;
    logger.info(
      `Daemon started (backup every ${this.settings.backupIntervalHours}h, upload every ${this.settings.uploadIntervalHours}h)`,
    );

    this.timers = [
      setInterval(() => this.enqueue("backup"), this.settings.backupIntervalHours * HOUR_MS),
      setInterval(() => this.enqueue("upload"), this.settings.uploadIntervalHours * HOUR_MS),
    ];

    // Upload whatever is already on disk; the first backup waits a full period
    this.enqueue("upload");
  }

  /**
   * Stop the timers, drop pending ticks and wait for the running handler.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers = [];
    this.pending = [];

    await this.idle();
    logger.info("Daemon stopped");
  }

  /**
   * Resolves once the queue is empty
   */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private enqueue(task: DaemonTaskName): void {
    if (!this.running) return;

    if (this.pending.includes(task)) {
      logger.debug(`Scheduled ${task} already pending, tick dropped`);
      return;
    }

    this.pending.push(task);
    if (!this.draining) {
      this.draining = this.drain().finally(() => {
        this.draining = null;
      });
    }
  }

  private async drain(): Promise<void> {
    for (let task = this.pending.shift(); task; task = this.pending.shift()) {
      logger.info(`Scheduled ${task} triggered`);
      try {
        await this.tasks[task]();
      } catch (error) {
        logger.warn(`Scheduled ${task} failed: ${formatErrorChain(error)}`);
      }
    }
  }
}
