import cron, { type ScheduledTask } from 'node-cron';
import { cycleIdFor, systemClock, type Clock } from './lib/dates.js';
import { runPortfolioCycle, type CycleDeps, type CycleReport } from './pipeline/portfolio-cycle.js';
import type { CandidateBatch } from './pipeline/candidate-batch.js';

export interface SchedulerOptions {
  deps: CycleDeps;
  /** Supplies the candidate batch for each run. */
  loadCandidates: () => Promise<CandidateBatch>;
  crons: string[];
  timeZone: string;
  clock?: Clock;
}

/**
 * Runs a portfolio cycle on every configured cron expression. A run that fires
 * while the previous one is still going is skipped; stop() aborts the active
 * run between transitions.
 */
export class CycleScheduler {
  private readonly tasks: ScheduledTask[] = [];
  private readonly clock: Clock;
  private active: AbortController | null = null;

  constructor(private readonly options: SchedulerOptions) {
    this.clock = options.clock ?? systemClock;
  }

  get isRunning(): boolean {
    return this.active !== null;
  }

  start(): void {
    for (const expression of this.options.crons) {
      if (!cron.validate(expression)) {
        throw new Error(`[Scheduler] Invalid cron expression: "${expression}"`);
      }
      this.tasks.push(cron.schedule(expression, () => {
        this.runOnce().catch(err => console.error('[Scheduler] Cycle crashed:', err));
      }, { timezone: this.options.timeZone }));
      console.log(`[Scheduler] Cycle cron: "${expression}" (${this.options.timeZone})`);
    }
  }

  /** Run one cycle now; resolves to null when a cycle is already in progress. */
  async runOnce(): Promise<CycleReport | null> {
    if (this.active) {
      console.log('[Scheduler] Skipping — previous cycle still active');
      return null;
    }

    const controller = new AbortController();
    this.active = controller;
    try {
      const cycle = cycleIdFor(this.clock(), this.options.timeZone);
      console.log(`[Scheduler] Cycle ${cycle.cycleId} triggered`);
      const batch = await this.options.loadCandidates();
      return await runPortfolioCycle(this.options.deps, {
        cycle,
        candidates: batch.candidates,
        marketCondition: batch.marketCondition,
        signal: controller.signal,
      });
    } finally {
      this.active = null;
    }
  }

  stop(): void {
    for (const task of this.tasks) task.stop();
    this.tasks.length = 0;
    this.active?.abort();
  }
}
