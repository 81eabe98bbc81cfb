import { FilterConfig } from '../types/filter';
import { PairSource } from './dexscreener';
import { AlertLedger } from './ledger';
import { Notifier } from './notifier';
import { selectCandidates, summarizeRejections } from './candidateFilter';
import { AppError, SerializedError, logAppError, normalizeError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export type CycleOutcome = 'completed' | 'fetch_failed' | 'aborted';

export interface CycleReport {
  outcome: CycleOutcome;
  startedAt: string;
  finishedAt: string;
  fetched: number;
  selected: number;
  notified: string[];
  failed: string[];
  persisted: boolean;
  ledgerSize: number;
  errors: SerializedError[];
}

export interface PollCycleDeps {
  source: PairSource;
  ledger: AlertLedger;
  notifier: Notifier;
  filter: FilterConfig;
  clock?: () => number;
}

/**
 * One fetch → filter → notify → persist run.
 *
 * The ledger is written after every successful alert, so anything already sent is on
 * disk before the next dispatch starts. A cycle that alerts nobody never writes.
 * Callers must not run two cycles against the same ledger at once; see SchedulerService.
 */
export class PollCycle {
  private readonly source: PairSource;
  private readonly ledger: AlertLedger;
  private readonly notifier: Notifier;
  private readonly filter: FilterConfig;
  private readonly clock: () => number;

  constructor(deps: PollCycleDeps) {
    this.source = deps.source;
    this.ledger = deps.ledger;
    this.notifier = deps.notifier;
    this.filter = deps.filter;
    this.clock = deps.clock ?? Date.now;
  }

  async run(): Promise<CycleReport> {
    const startedAt = new Date(this.clock()).toISOString();
    const errors: AppError[] = [];
    const report = (partial: Omit<CycleReport, 'startedAt' | 'finishedAt' | 'errors'>): CycleReport => ({
      ...partial,
      startedAt,
      finishedAt: new Date(this.clock()).toISOString(),
      errors: errors.map(error => error.toJSON())
    });

    const fetched = await this.source.fetchPairs();
    if (!fetched.ok) {
      logAppError(fetched.error);
      errors.push(fetched.error);
      return report({
        outcome: 'fetch_failed',
        fetched: 0,
        selected: 0,
        notified: [],
        failed: [],
        persisted: false,
        ledgerSize: 0
      });
    }

    const snapshots = fetched.value;
    const loaded = await this.ledger.load();
    let alerted: Set<string>;
    if (loaded.ok) {
      alerted = loaded.value;
    } else {
      logAppError(loaded.error);
      logger.warn('Continuing with an empty ledger; it will be overwritten on the next alert');
      errors.push(loaded.error);
      alerted = new Set<string>();
    }

    const now = this.clock();
    const candidates = selectCandidates(snapshots, alerted, now, this.filter);
    logger.info(`Fetched ${snapshots.length} pairs, ${candidates.length} qualify for an alert`, {
      rejected: summarizeRejections(snapshots, alerted, now, this.filter)
    });

    const notified: string[] = [];
    const failed: string[] = [];
    let persisted = false;

    for (const pair of candidates) {
      let sent: boolean;
      try {
        const result = await this.notifier.notify(pair);
        if (!result.ok) {
          logAppError(result.error);
          errors.push(result.error);
        }
        sent = result.ok;
      } catch (error) {
        const appError = normalizeError(error, { operation: 'notify', identifier: pair.identifier });
        logAppError(appError);
        errors.push(appError);
        sent = false;
      }

      if (!sent) {
        failed.push(pair.identifier);
        continue;
      }

      alerted.add(pair.identifier);
      notified.push(pair.identifier);

      const saved = await this.ledger.save(alerted);
      if (saved.ok) {
        persisted = true;
      } else {
        logAppError(saved.error);
        errors.push(saved.error);
      }
    }

    logger.info(`Cycle finished: ${notified.length} alerted, ${failed.length} failed`, {
      ledgerSize: alerted.size
    });

    return report({
      outcome: 'completed',
      fetched: snapshots.length,
      selected: candidates.length,
      notified,
      failed,
      persisted,
      ledgerSize: alerted.size
    });
  }
}
