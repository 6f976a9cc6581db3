/**
 * MetricsService - Prometheus metrics for match orchestration.
 *
 * Tracks match lifecycle (created / ended by result), move throughput and
 * rejections, timeout consequences, and failures inside the timeout
 * sentinel. Metrics live in the default prom-client registry and are
 * exposed on /metrics.
 */

import client, { Counter, Histogram, type Registry } from 'prom-client';
import type { GameKind, MatchResult, TimeoutAction } from '../../shared/types/match';
import type { MatchErrorCode } from '../../shared/errors/MatchDomainErrors';

/**
 * Singleton MetricsService class that manages all Prometheus metrics.
 */
export class MetricsService {
  private static instance: MetricsService | null = null;
  private readonly registry: Registry;

  /** Counter: matches created by game kind */
  public readonly matchesCreated: Counter<'kind'>;

  /** Counter: matches ended by game kind and result */
  public readonly matchesEnded: Counter<'kind' | 'result'>;

  /** Counter: accepted moves by game kind */
  public readonly movesProcessed: Counter<'kind'>;

  /** Counter: rejected moves by game kind and reason code */
  public readonly movesRejected: Counter<'kind' | 'code'>;

  /** Histogram: time spent in makeMove, store round-trips included */
  public readonly moveLatency: Histogram<'kind'>;

  /** Counter: applied timeout consequences by kind, action and detection path */
  public readonly timeoutsApplied: Counter<'kind' | 'action' | 'source'>;

  /** Counter: expirations the sentinel failed to process */
  public readonly sentinelFailures: Counter<string>;

  private constructor() {
    this.registry = client.register;

    this.matchesCreated = new Counter({
      name: 'match_created_total',
      help: 'Total number of matches created by game kind',
      labelNames: ['kind'] as const,
    });

    this.matchesEnded = new Counter({
      name: 'match_ended_total',
      help: 'Total number of matches ended by game kind and result',
      labelNames: ['kind', 'result'] as const,
    });

    this.movesProcessed = new Counter({
      name: 'match_moves_total',
      help: 'Total number of accepted moves by game kind',
      labelNames: ['kind'] as const,
    });

    this.movesRejected = new Counter({
      name: 'match_moves_rejected_total',
      help: 'Total number of rejected moves by game kind and reason',
      labelNames: ['kind', 'code'] as const,
    });

    this.moveLatency = new Histogram({
      name: 'match_move_duration_seconds',
      help: 'Duration of move processing in seconds',
      labelNames: ['kind'] as const,
      buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
    });

    this.timeoutsApplied = new Counter({
      name: 'match_timeouts_total',
      help: 'Timeout consequences applied by game kind, action and detection path',
      labelNames: ['kind', 'action', 'source'] as const,
    });

    this.sentinelFailures = new Counter({
      name: 'match_timeout_sentinel_failures_total',
      help: 'Key expirations the timeout sentinel failed to process',
    });
  }

  /**
   * Get the singleton MetricsService instance.
   */
  public static getInstance(): MetricsService {
    if (!MetricsService.instance) {
      MetricsService.instance = new MetricsService();
    }
    return MetricsService.instance;
  }

  /**
   * Reset the singleton instance (for testing only).
   */
  public static resetInstance(): void {
    if (MetricsService.instance) {
      client.register.clear();
      MetricsService.instance = null;
    }
  }

  /**
   * Get metrics in Prometheus text format.
   */
  public async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  public getContentType(): string {
    return this.registry.contentType;
  }

  // ===================
  // Recording helpers
  // ===================

  public recordMatchCreated(kind: GameKind): void {
    this.matchesCreated.labels(kind).inc();
  }

  public recordMatchEnded(kind: GameKind, result: MatchResult): void {
    this.matchesEnded.labels(kind, result).inc();
  }

  public recordMove(kind: GameKind, durationSeconds: number): void {
    this.movesProcessed.labels(kind).inc();
    this.moveLatency.labels(kind).observe(durationSeconds);
  }

  public recordMoveRejected(kind: GameKind, code: MatchErrorCode): void {
    this.movesRejected.labels(kind, code).inc();
  }

  /**
   * @param source `move` when a late move uncovered the expiry, `sentinel`
   * when the key-expiry listener did.
   */
  public recordTimeout(kind: GameKind, action: TimeoutAction, source: 'move' | 'sentinel'): void {
    this.timeoutsApplied.labels(kind, action, source).inc();
  }

  public recordSentinelFailure(): void {
    this.sentinelFailures.inc();
  }
}

export const getMetricsService = (): MetricsService => MetricsService.getInstance();
