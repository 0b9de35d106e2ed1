/**
 * Sync scheduler
 *
 * Starts sync cycles on a timer, when connectivity comes back and on demand.
 * Overlapping triggers share one cycle. Cycles are skipped while there is no
 * valid token, since every upload would be refused.
 */

import type { SyncEngine } from './sync-engine.js';
import type { SyncResult } from './sync-result.js';
import type { TokenProvider } from './api-client.js';
import type { ConnectivityMonitor } from './connectivity.js';
import { getLogger } from '../utils/logger.js';
import { toError } from '../../../shared/errors.js';

const logger = getLogger('SyncScheduler');

export type SyncTrigger = 'timer' | 'connectivity' | 'manual';

export interface SyncSchedulerOptions {
  intervalMs: number;
  onCycleComplete?: (result: SyncResult, trigger: SyncTrigger) => void;
}

export class SyncScheduler {
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<SyncResult | null> | null = null;
  private abortController: AbortController | null = null;
  private lastResult: SyncResult | null = null;
  private lastRunAt: string | null = null;
  private readonly onOnline = () => this.trigger('connectivity');

  constructor(
    private readonly engine: SyncEngine,
    private readonly tokenProvider: TokenProvider,
    private readonly options: SyncSchedulerOptions,
    private readonly connectivity: ConnectivityMonitor | null = null
  ) {}

  start(): void {
    if (this.timer) {
      clearInterval(this.timer);
    }
    this.timer = setInterval(() => this.trigger('timer'), this.options.intervalMs);
    this.connectivity?.on('online', this.onOnline);
    logger.info(`Auto-sync started (every ${this.options.intervalMs / 1000}s)`);
  }

  /**
   * Stops the timer and cancels the running cycle, if any. A cycle that fails
   * while stopping is logged; its own callers still see the error.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.connectivity?.off('online', this.onOnline);
    this.abortController?.abort();
    if (this.current) {
      await this.current.catch(err => {
        logger.error('Sync cycle failed during shutdown', toError(err));
      });
    }
  }

  isRunning(): boolean {
    return this.current !== null;
  }

  getLastResult(): SyncResult | null {
    return this.lastResult;
  }

  getLastRunAt(): string | null {
    return this.lastRunAt;
  }

  /** Runs a cycle now, or joins the one in progress. Null when skipped. */
  syncNow(): Promise<SyncResult | null> {
    return this.run('manual');
  }

  private trigger(trigger: SyncTrigger): void {
    this.run(trigger).catch(err => {
      logger.error('Scheduled sync failed', toError(err), { trigger });
    });
  }

  private run(trigger: SyncTrigger): Promise<SyncResult | null> {
    if (this.current) {
      logger.debug('Sync already running, joining', { trigger });
      return this.current;
    }
    if (!this.tokenProvider.isTokenValid()) {
      logger.debug('Skipping sync: not signed in', { trigger });
      return Promise.resolve(null);
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.current = this.engine
      .syncAll({ signal: controller.signal })
      .then(result => {
        this.lastResult = result;
        this.lastRunAt = new Date().toISOString();
        this.options.onCycleComplete?.(result, trigger);
        return result;
      })
      .finally(() => {
        this.current = null;
        this.abortController = null;
      });
    return this.current;
  }
}
