import { matchIdFromTimeoutKey, type KeyValueStore, type Unsubscribe } from '../cache/redis';
import { getMetricsService, type MetricsService } from '../services/MetricsService';
import { logger } from '../utils/logger';
import type { MatchStore } from './MatchStore';

/**
 * Watches key-expiry notifications and applies the timeout consequence for
 * every expired `match:{id}:timeout` key.
 *
 * Runs beside the request path: it reacts only to expirations, never polls,
 * and a failure on one match is logged and counted without stopping the
 * listener.
 */
export class TimeoutSentinel {
  private unsubscribe: Unsubscribe | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly metrics: MetricsService;

  constructor(
    private readonly store: KeyValueStore,
    private readonly matches: MatchStore,
    metrics?: MetricsService
  ) {
    this.metrics = metrics ?? getMetricsService();
  }

  get isRunning(): boolean {
    return this.unsubscribe !== null;
  }

  async start(): Promise<void> {
    if (this.unsubscribe) {
      logger.warn('TimeoutSentinel is already running');
      return;
    }
    this.unsubscribe = await this.store.onKeyExpired((key) => this.track(this.handleExpiredKey(key)));
    logger.info('TimeoutSentinel started - listening for key expirations');
  }

  /** Stop listening and wait for expirations already being processed. */
  async stop(): Promise<void> {
    const unsubscribe = this.unsubscribe;
    this.unsubscribe = null;
    if (unsubscribe) {
      await unsubscribe();
    }
    await Promise.allSettled([...this.inFlight]);
    logger.info('TimeoutSentinel stopped');
  }

  /**
   * Process one expired key. Keys other than timeout keys are ignored.
   * Never rejects.
   */
  async handleExpiredKey(key: string): Promise<void> {
    const matchId = matchIdFromTimeoutKey(key);
    if (matchId === null) {
      return;
    }

    try {
      const applied = await this.matches.applyExpiredTimeout(matchId);
      if (applied) {
        logger.info('Applied expired turn clock', {
          matchId,
          action: applied.action,
          timedOutIdentifier: applied.timedOutIdentifier,
        });
      } else {
        logger.debug('Timeout key expired with nothing to apply', { matchId });
      }
    } catch (error) {
      this.metrics.recordSentinelFailure();
      logger.error('Error handling expired timeout key', { matchId, error });
    }
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    task.finally(() => this.inFlight.delete(task)).catch((error: unknown) => {
      logger.error('Timeout task bookkeeping failed', { error });
    });
  }
}
