import cron, { ScheduledTask } from 'node-cron';
import { CycleReport } from './pollCycle';
import { SerializedError, logAppError, normalizeError } from '../utils/errorHandler';
import { toCronExpression } from '../utils/cronInterval';
import { logger } from '../utils/logger';

export interface CycleRunner {
  run(): Promise<CycleReport>;
}

export interface SchedulerConfig {
  intervalSeconds: number;
  timezone?: string;
  runOnStart?: boolean;
}

export type SchedulerState = 'idle' | 'running';
export type TriggerSource = 'timer' | 'manual' | 'startup';

export interface SchedulerStatus {
  alive: boolean;
  state: SchedulerState;
  intervalSeconds: number;
  cronExpression: string;
  cyclesCompleted: number;
  triggersDropped: number;
  lastCycle: CycleReport | null;
  lastError: SerializedError | null;
}

/**
 * Drives the poll cycle on a fixed cron step.
 *
 * At most one cycle runs at a time. A timer tick that lands while a cycle is running is
 * dropped; a manual trigger in the same situation joins the running cycle and gets its report.
 */
export class SchedulerService {
  private readonly runner: CycleRunner;
  private readonly intervalSeconds: number;
  private readonly cronExpression: string;
  private readonly timezone: string;
  private readonly runOnStart: boolean;
  private task: ScheduledTask | null = null;
  private inFlight: Promise<CycleReport> | null = null;
  private cyclesCompleted = 0;
  private triggersDropped = 0;
  private lastCycle: CycleReport | null = null;
  private lastError: SerializedError | null = null;

  constructor(runner: CycleRunner, config: SchedulerConfig) {
    this.runner = runner;
    this.intervalSeconds = config.intervalSeconds;
    this.cronExpression = toCronExpression(config.intervalSeconds);
    this.timezone = config.timezone ?? 'UTC';
    this.runOnStart = config.runOnStart ?? true;
  }

  start(): void {
    if (this.task) {
      logger.warn('Scheduler is already running');
      return;
    }

    this.task = cron.schedule(this.cronExpression, async () => {
      await this.onTick();
    }, {
      scheduled: true,
      timezone: this.timezone
    });

    logger.info(`Scheduled poll cycle every ${this.intervalSeconds}s (${this.cronExpression}, ${this.timezone})`);

    if (this.runOnStart) {
      this.execute('startup').catch((error: unknown) => {
        logger.error('Startup cycle failed', error);
      });
    }
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('Scheduler stopped');
    }
  }

  /** Runs a cycle now, or joins the one already running. */
  triggerNow(): Promise<CycleReport> {
    if (this.inFlight) {
      logger.info('Manual trigger joined the running cycle');
      return this.inFlight;
    }
    return this.execute('manual');
  }

  /** Resolves once the running cycle (if any) has finished. */
  async waitForIdle(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  isSchedulerRunning(): boolean {
    return this.task !== null;
  }

  getState(): SchedulerState {
    return this.inFlight ? 'running' : 'idle';
  }

  getStatus(): SchedulerStatus {
    return {
      alive: this.isSchedulerRunning(),
      state: this.getState(),
      intervalSeconds: this.intervalSeconds,
      cronExpression: this.cronExpression,
      cyclesCompleted: this.cyclesCompleted,
      triggersDropped: this.triggersDropped,
      lastCycle: this.lastCycle,
      lastError: this.lastError
    };
  }

  private async onTick(): Promise<void> {
    if (this.inFlight) {
      this.triggersDropped++;
      logger.warn('Previous cycle still running, skipping this tick');
      return;
    }
    await this.execute('timer');
  }

  private execute(source: TriggerSource): Promise<CycleReport> {
    const cycle = this.runGuarded(source).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async runGuarded(source: TriggerSource): Promise<CycleReport> {
    const startedAt = new Date().toISOString();
    logger.debug(`Starting poll cycle (${source})`);

    let report: CycleReport;
    try {
      report = await this.runner.run();
    } catch (error) {
      const appError = normalizeError(error, { operation: 'poll_cycle', additionalData: { source } });
      logAppError(appError);
      report = {
        outcome: 'aborted',
        startedAt,
        finishedAt: new Date().toISOString(),
        fetched: 0,
        selected: 0,
        notified: [],
        failed: [],
        persisted: false,
        ledgerSize: 0,
        errors: [appError.toJSON()]
      };
    }

    this.cyclesCompleted++;
    this.lastCycle = report;
    const lastReportedError = report.errors[report.errors.length - 1];
    if (lastReportedError) {
      this.lastError = lastReportedError;
    }
    return report;
  }
}
