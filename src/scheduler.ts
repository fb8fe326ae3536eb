import { silentLogger, type Logger } from './logger.js';
import type { TriggerResult } from './syncOrchestrator.js';
import type { SyncTrigger } from './types.js';

export interface SyncTarget {
  trigger(source: SyncTrigger): TriggerResult;
}

export interface SyncSchedulerOptions {
  intervalMs: number;
  logger?: Logger;
}

export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function hoursToMs(hours: number): number {
  return Math.round(hours * 60 * 60 * 1000);
}

/**
 * Fires a startup sync and then one every interval. Every tick goes through
 * the orchestrator's trigger, so a tick that lands on a running sync is skipped.
 */
export class SyncScheduler {
  private timer: NodeJS.Timeout | null = null;
  private readonly logger: Logger;

  constructor(private readonly target: SyncTarget, private readonly options: SyncSchedulerOptions) {
    if (!Number.isInteger(options.intervalMs) || options.intervalMs < 1 || options.intervalMs > MAX_TIMER_DELAY_MS) {
      throw new RangeError(`Sync interval must be 1-${MAX_TIMER_DELAY_MS} ms (got ${options.intervalMs})`);
    }
    this.logger = options.logger ?? silentLogger;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.fire('startup');
    this.timer = setInterval(() => this.fire('scheduled'), this.options.intervalMs);
    this.timer.unref();
    this.logger.info(`Next sync every ${Math.round(this.options.intervalMs / 60000)} minutes`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private fire(source: SyncTrigger): void {
    const result = this.target.trigger(source);
    if (!result.accepted) {
      this.logger.warn(`Skipped ${source} sync; a run has been active since ${result.runningSince}`);
    }
  }
}
