import { randomUUID } from "crypto";
import type { ProviderConfigurationService } from "./providers/configuration";
import { failedRunReport, runIndexer } from "./sync/engine";
import type { IndexRunReport, IndexerDeps, IndexerOptions } from "./sync/types";
import { createLogger } from "./log";

const logger = createLogger("scheduler");

export interface SchedulerOptions {
  intervalMinutes: number;
  runOnStartup: boolean;
  indexer: Partial<IndexerOptions>;
}

export interface TriggeredRun {
  runId: string;
  /** False when the trigger joined a run that was already in progress. */
  started: boolean;
  completion: Promise<IndexRunReport>;
}

interface ActiveRun {
  runId: string;
  controller: AbortController;
  completion: Promise<IndexRunReport>;
}

/**
 * Runs the indexer on an interval. At most one run is active; triggering
 * while one is in flight hands back that run instead of starting another.
 */
export class IndexerScheduler {
  private isRunning = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private active: ActiveRun | null = null;

  constructor(
    private readonly configuration: ProviderConfigurationService,
    private readonly deps: IndexerDeps,
    private readonly options: SchedulerOptions,
  ) {}

  start() {
    if (this.isRunning) return;
    this.isRunning = true;
    logger.info(`Starting, interval ${this.options.intervalMinutes} minute(s)`);

    if (this.options.runOnStartup) {
      this.runNow();
    } else {
      this.scheduleNext();
    }
  }

  /** Stops the timer and cancels the in-flight run, waiting for it to wind down. */
  async stop(): Promise<void> {
    this.isRunning = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    const active = this.active;
    if (active) {
      logger.info(`Cancelling run ${active.runId}`);
      active.controller.abort();
      await active.completion;
    }
    logger.info("Stopped");
  }

  get currentRunId(): string | null {
    return this.active?.runId ?? null;
  }

  runNow(): TriggeredRun {
    if (this.active) {
      logger.info(`Run ${this.active.runId} already in progress`);
      return { runId: this.active.runId, started: false, completion: this.active.completion };
    }

    const runId = randomUUID();
    const controller = new AbortController();
    const completion = this.execute(runId, controller.signal).finally(() => {
      this.active = null;
      this.scheduleNext();
    });

    this.active = { runId, controller, completion };
    return { runId, started: true, completion };
  }

  private scheduleNext() {
    if (!this.isRunning) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runNow();
    }, this.options.intervalMinutes * 60 * 1000);
  }

  /** Never rejects: a snapshot that cannot be loaded becomes a failed report. */
  private async execute(runId: string, signal: AbortSignal): Promise<IndexRunReport> {
    const startedAt = new Date();
    try {
      const snapshot = await this.configuration.reload();
      return await runIndexer(snapshot, this.deps, { ...this.options.indexer, runId }, signal);
    } catch (error) {
      logger.error(`Run ${runId} could not start`, error);
      const report = failedRunReport(runId, startedAt, error);
      try {
        await this.deps.store.recordRun({
          id: runId,
          status: report.status,
          exitCode: report.exitCode,
          startedAt: report.startedAt,
          finishedAt: report.finishedAt,
          durationMs: report.durationMs,
          reportJson: report,
          error: report.error ?? null,
        });
      } catch (recordError) {
        logger.error(`Failed to persist report for run ${runId}`, recordError);
      }
      return report;
    }
  }
}
