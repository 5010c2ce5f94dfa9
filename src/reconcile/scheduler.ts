/**
 * reconcile/scheduler.ts
 *
 * One routine, two triggers: a fixed-interval timer and an explicit wake().
 * Runs never overlap. Wakes that arrive during a run collapse into a single
 * follow-up run, and everyone who asked gets that follow-up's completion.
 */

import { errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('reconcile/scheduler');

export type Routine = (trigger: 'timer' | 'wake') => Promise<void>;

export class ReconcileScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;
  private followUp: Promise<void> | null = null;

  constructor(
    private readonly routine: Routine,
    private readonly intervalMs: number
  ) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      // A tick during a run is dropped; the run in progress is at least as fresh
      if (this.running) return;
      this.launch('timer').catch((e: unknown) => {
        log.error({ error: errorMessage(e) }, 'Scheduled pass failed');
      });
    }, this.intervalMs);
    log.info({ intervalMs: this.intervalMs }, 'Reconciliation scheduler started');
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    log.info('Reconciliation scheduler stopped');
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Ask for a pass now. Resolves when a pass that started after this call
   * has finished; rejects with that pass's error.
   */
  wake(): Promise<void> {
    if (!this.running) return this.launch('wake');

    if (!this.followUp) {
      const current = this.running;
      this.followUp = current
        .catch(() => undefined)
        .then(() => {
          this.followUp = null;
          return this.launch('wake');
        });
    }
    return this.followUp;
  }

  private launch(trigger: 'timer' | 'wake'): Promise<void> {
    const run = this.routine(trigger).finally(() => {
      if (this.running === run) this.running = null;
    });
    this.running = run;
    return run;
  }
}
