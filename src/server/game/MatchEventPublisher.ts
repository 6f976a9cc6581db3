import type { Server as SocketIOServer } from 'socket.io';
import type { GameInfo, MatchResult, MatchState } from '../../shared/types/match';
import { MatchKeys, type KeyValueStore } from '../cache/redis';
import { logger } from '../utils/logger';

/**
 * Outbound notifications for a match. Every event carries the state after
 * the transition so subscribers never need a follow-up read.
 */
export type MatchEvent =
  | {
      type: 'game_started';
      matchId: string;
      info: GameInfo;
      state: MatchState;
      currentTurnIdentifier: string;
    }
  | {
      type: 'move_made';
      matchId: string;
      participantId: string;
      move: unknown;
      state: MatchState;
      currentTurnIdentifier: string;
    }
  | {
      type: 'turn_skipped';
      matchId: string;
      skippedIdentifier: string;
      state: MatchState;
      currentTurnIdentifier: string;
    }
  | { type: 'player_forfeited'; matchId: string; participantId: string; state: MatchState }
  | { type: 'player_left'; matchId: string; participantId: string; state: MatchState }
  | {
      type: 'game_ended';
      matchId: string;
      result: MatchResult;
      winnerIdentifier: string | null;
      state: MatchState;
    };

export interface MatchEventPublisher {
  publish(event: MatchEvent): Promise<void>;
}

/** JSON on the `match:{id}:events` pub/sub channel. */
export class RedisMatchEventPublisher implements MatchEventPublisher {
  constructor(private readonly store: KeyValueStore) {}

  async publish(event: MatchEvent): Promise<void> {
    await this.store.publish(MatchKeys.events(event.matchId), JSON.stringify(event));
  }
}

/** Emits to the Socket.IO room named after the match. */
export class SocketIoMatchEventPublisher implements MatchEventPublisher {
  constructor(private readonly io: SocketIOServer) {}

  static roomFor(matchId: string): string {
    return `match:${matchId}`;
  }

  async publish(event: MatchEvent): Promise<void> {
    this.io.to(SocketIoMatchEventPublisher.roomFor(event.matchId)).emit(event.type, event);
  }
}

/**
 * Sends each event to every publisher. One failing sink is logged and does
 * not stop the others; the state is already persisted by then.
 */
export class FanoutMatchEventPublisher implements MatchEventPublisher {
  constructor(private readonly publishers: readonly MatchEventPublisher[]) {}

  async publish(event: MatchEvent): Promise<void> {
    const results = await Promise.allSettled(this.publishers.map((p) => p.publish(event)));
    for (const result of results) {
      if (result.status === 'rejected') {
        logger.error('Failed to publish match event', {
          matchId: event.matchId,
          type: event.type,
          error: result.reason,
        });
      }
    }
  }
}
