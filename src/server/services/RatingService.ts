import type { KeyValueStore } from '../cache/redis';
import { MatchKeys } from '../cache/redis';
import { logger } from '../utils/logger';

/** Only registered accounts carry a rating; guests are skipped. */
const RATED_PREFIX = 'user:';

/**
 * Result of applying one participant's adjustment.
 */
export interface RatingUpdateResult {
  participantId: string;
  change: number;
  newRating: number;
}

/**
 * Applies the rating deltas an engine computes at match end.
 *
 * Ratings are running totals in a Redis hash keyed by participant
 * identifier. Settlement runs after the match result is already persisted,
 * so a failure here is logged and never undoes the result.
 */
export class RatingService {
  constructor(private readonly store: KeyValueStore) {}

  static isRated(participantId: string): boolean {
    return participantId.startsWith(RATED_PREFIX) && participantId.length > RATED_PREFIX.length;
  }

  async applyAdjustments(
    matchId: string,
    adjustments: Record<string, number>
  ): Promise<RatingUpdateResult[]> {
    const results: RatingUpdateResult[] = [];
    try {
      for (const [participantId, change] of Object.entries(adjustments)) {
        if (change === 0 || !RatingService.isRated(participantId)) {
          continue;
        }
        const newRating = await this.store.hIncrBy(MatchKeys.ratings(), participantId, change);
        results.push({ participantId, change, newRating });
      }
      if (results.length > 0) {
        logger.info('Ratings updated', { matchId, adjustments });
      }
    } catch (error) {
      logger.error('Failed to update ratings', { matchId, error });
    }
    return results;
  }

  /** Current rating delta total, 0 when the participant was never rated. */
  async getRating(participantId: string): Promise<number> {
    const ratings = await this.store.hGetAll(MatchKeys.ratings());
    const raw = ratings[participantId];
    return raw === undefined ? 0 : Number.parseInt(raw, 10);
  }
}
