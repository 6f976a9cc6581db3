import { v4 as uuidv4 } from 'uuid';
import {
  CorruptMatchStateError,
  IllegalMoveError,
  MatchConflictError,
  MatchErrorCode,
  MatchNotFoundError,
  TimeoutPreemptedError,
} from '../../shared/errors/MatchDomainErrors';
import type { ConcessionKind, EngineContext, MatchEngine, TimeoutOutcome } from '../../shared/engine/GameEngine';
import { createEngine, getGameInfo, isGameKind, listGames } from '../../shared/engine/registry';
import {
  MatchConfigurationSchema,
  MatchEnvelopeSchema,
  isTerminalResult,
  type GameInfo,
  type GameKind,
  type MatchConfiguration,
  type MatchResult,
  type MatchState,
  type RuleOverrides,
  type TimingInfo,
} from '../../shared/types/match';
import { MatchKeys, type KeyValueStore, type StoreOperation } from '../cache/redis';
import { config } from '../config';
import { getMetricsService, type MetricsService } from '../services/MetricsService';
import type { RatingService } from '../services/RatingService';
import { logger, runWithMatchContext } from '../utils/logger';
import type { MatchEvent, MatchEventPublisher } from './MatchEventPublisher';

export interface CreateMatchRequest {
  /** Generated when omitted. */
  matchId?: string;
  kind: string;
  participants: string[];
  rules?: RuleOverrides;
}

export interface CreatedMatch {
  matchId: string;
  state: MatchState;
  info: GameInfo;
  currentTurnIdentifier: string;
}

export interface StoredMatch {
  configuration: MatchConfiguration;
  state: MatchState;
}

export interface MoveOutcome {
  state: MatchState;
  result: MatchResult;
  winnerIdentifier: string | null;
  currentTurnIdentifier: string;
}

export interface ConcessionOutcome {
  state: MatchState;
  result: MatchResult;
  winnerIdentifier: string | null;
}

export interface AppliedTimeout {
  matchId: string;
  action: TimeoutOutcome<MatchState>['action'];
  state: MatchState;
  timedOutIdentifier: string;
  winnerIdentifier: string | null;
  currentTurnIdentifier: string;
}

export interface MatchStoreOptions {
  store: KeyValueStore;
  publisher?: MatchEventPublisher;
  ratings?: RatingService;
  metrics?: MetricsService;
  engineContext?: EngineContext;
  /** Expiry for config, state and routing keys. */
  ttlSeconds?: number;
  /** Added to the remaining clock when arming the timeout key. */
  timeoutKeyBufferSeconds?: number;
}

interface LoadedMatch {
  configuration: MatchConfiguration;
  engine: MatchEngine;
  state: MatchState;
}

/**
 * Binds engines to match documents in the key-value store.
 *
 * Nothing is cached between calls: every operation rebuilds the engine from
 * the stored configuration, so the store stays the single source of truth
 * and any process can serve any match. Multi-key writes go through one
 * MULTI/EXEC batch. There is no version check, so two writers racing on the
 * same match resolve as last-write-wins.
 */
export class MatchStore {
  private readonly store: KeyValueStore;
  private readonly publisher: MatchEventPublisher | null;
  private readonly ratings: RatingService | null;
  private readonly metrics: MetricsService;
  private readonly engineContext: EngineContext | undefined;
  private readonly ttlSeconds: number;
  private readonly timeoutKeyBufferSeconds: number;

  constructor(options: MatchStoreOptions) {
    this.store = options.store;
    this.publisher = options.publisher ?? null;
    this.ratings = options.ratings ?? null;
    this.metrics = options.metrics ?? getMetricsService();
    this.engineContext = options.engineContext;
    this.ttlSeconds = options.ttlSeconds ?? config.matches.ttlSeconds;
    this.timeoutKeyBufferSeconds =
      options.timeoutKeyBufferSeconds ?? config.matches.timeoutKeyBufferSeconds;
  }

  listGames(): GameInfo[] {
    return listGames();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Creation and lookup
  // ═══════════════════════════════════════════════════════════════════════

  async create(request: CreateMatchRequest): Promise<CreatedMatch> {
    const matchId = request.matchId ?? uuidv4();
    return runWithMatchContext({ matchId, operation: 'create' }, async () => {
      const existing = await this.store.get(MatchKeys.state(matchId));
      if (existing !== null) {
        const previous = MatchEnvelopeSchema.safeParse(safeJson(existing));
        if (previous.success && !isTerminalResult(previous.data.result)) {
          throw new MatchConflictError(matchId);
        }
        logger.info('Replacing finished match', {
          previousResult: previous.success ? previous.data.result : 'unreadable',
        });
        await this.delete(matchId);
      }

      const engine = createEngine(
        request.kind,
        { matchId, participants: request.participants, rules: request.rules },
        this.engineContext
      );
      const state = engine.initializeState();
      const configuration = engine.getConfiguration();

      const operations: StoreOperation[] = [
        this.setOp(MatchKeys.config(matchId), JSON.stringify(configuration)),
        this.setOp(MatchKeys.state(matchId), JSON.stringify(state)),
        this.setOp(MatchKeys.kind(matchId), engine.kind),
        ...engine.participants.map((id) => this.setOp(MatchKeys.participantMatch(id), matchId)),
      ];
      await this.store.atomic(operations);

      try {
        await this.syncTimeoutKey(matchId, engine, state);
      } catch (error) {
        logger.warn('Could not arm timeout key; clock enforcement disabled until next move', {
          error,
        });
      }

      this.metrics.recordMatchCreated(engine.kind);
      logger.info('Match created', {
        kind: engine.kind,
        participants: engine.participants,
        timeoutKind: engine.timeoutKind,
      });

      await this.emit({
        type: 'game_started',
        matchId,
        info: engine.info,
        state,
        currentTurnIdentifier: engine.currentParticipant,
      });

      return {
        matchId,
        state,
        info: engine.info,
        currentTurnIdentifier: engine.currentParticipant,
      };
    });
  }

  async get(matchId: string): Promise<StoredMatch | null> {
    const loaded = await this.load(matchId);
    return loaded ? { configuration: loaded.configuration, state: loaded.state } : null;
  }

  async getState(matchId: string): Promise<MatchState | null> {
    const loaded = await this.load(matchId);
    return loaded ? loaded.state : null;
  }

  /** Game kind of a match from the routing mapping, or null. */
  async getGameKind(matchId: string): Promise<GameKind | null> {
    const kind = await this.store.get(MatchKeys.kind(matchId));
    return kind !== null && isGameKind(kind) ? kind : null;
  }

  /** Match a participant was last placed in, for late-joining routing. */
  async getCurrentMatch(participantId: string): Promise<string | null> {
    return this.store.get(MatchKeys.participantMatch(participantId));
  }

  getGameInfo(kind: string): GameInfo {
    return getGameInfo(kind);
  }

  async getTimingInfo(matchId: string): Promise<TimingInfo | null> {
    const loaded = await this.load(matchId);
    return loaded ? loaded.engine.getTimingInfo(loaded.state) : null;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Moves
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Validate and apply one move.
   *
   * @throws MatchNotFoundError when the match is gone
   * @throws TimeoutPreemptedError when the mover's clock had already run
   * out; the timeout consequence is persisted before throwing
   * @throws IllegalMoveError for any other rejection
   */
  async makeMove(matchId: string, participantId: string, move: unknown): Promise<MoveOutcome> {
    return runWithMatchContext({ matchId, participantId, operation: 'move' }, async () => {
      const startedAt = Date.now();
      const { engine, state } = await this.require(matchId);

      if (!isTerminalResult(state.result)) {
        const timeout = engine.resolveTimeout(state);
        if (timeout) {
          const applied = await this.persistTimeout(matchId, engine, timeout, 'move');
          this.metrics.recordMoveRejected(engine.kind, MatchErrorCode.MOVE_TIMEOUT_PREEMPTED);
          throw new TimeoutPreemptedError(
            applied.action === 'end_game'
              ? 'Time limit exceeded - game ended'
              : 'Time limit exceeded - your turn was skipped',
            applied,
            { matchId, participantId }
          );
        }
      }

      const validation = engine.validateMove(state, participantId, move);
      if (!validation.valid) {
        this.metrics.recordMoveRejected(engine.kind, validation.code);
        logger.debug('Move rejected', { code: validation.code, reason: validation.error });
        throw new IllegalMoveError(validation.code, validation.error, { matchId, participantId });
      }

      const next = engine.completeMove(state, participantId, validation.move);
      await this.persist(matchId, engine, next);
      await this.syncTimeoutKeyQuietly(matchId, engine, next);

      this.metrics.recordMove(engine.kind, (Date.now() - startedAt) / 1000);
      logger.info('Move processed', { result: next.result, moveCount: next.moveCount });

      await this.emit({
        type: 'move_made',
        matchId,
        participantId,
        move: validation.move,
        state: next,
        currentTurnIdentifier: next.currentTurnIdentifier,
      });
      if (isTerminalResult(next.result)) {
        await this.finish(matchId, engine, next);
      }

      return {
        state: next,
        result: next.result,
        winnerIdentifier: next.winnerIdentifier,
        currentTurnIdentifier: next.currentTurnIdentifier,
      };
    });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Concessions
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * End the match because a participant gave up. Rejected for a finished
   * match or a non-participant.
   */
  async forfeit(matchId: string, participantId: string): Promise<ConcessionOutcome> {
    return runWithMatchContext({ matchId, participantId, operation: 'forfeit' }, async () => {
      const loaded = await this.require(matchId);
      if (isTerminalResult(loaded.state.result)) {
        throw new IllegalMoveError(
          MatchErrorCode.MOVE_GAME_OVER,
          `Game is already over (${loaded.state.result})`,
          { matchId, participantId }
        );
      }
      return this.concede(loaded, participantId, 'forfeit');
    });
  }

  /**
   * End the match because a participant disconnected for good. A finished
   * match is returned unchanged.
   */
  async playerLeft(matchId: string, participantId: string): Promise<ConcessionOutcome> {
    return runWithMatchContext({ matchId, participantId, operation: 'player_left' }, async () => {
      const loaded = await this.require(matchId);
      if (isTerminalResult(loaded.state.result)) {
        return {
          state: loaded.state,
          result: loaded.state.result,
          winnerIdentifier: loaded.state.winnerIdentifier,
        };
      }
      return this.concede(loaded, participantId, 'player_left');
    });
  }

  private async concede(
    { engine, state }: LoadedMatch,
    participantId: string,
    kind: ConcessionKind
  ): Promise<ConcessionOutcome> {
    if (!engine.participants.includes(participantId)) {
      throw new IllegalMoveError(
        MatchErrorCode.MOVE_NOT_PARTICIPANT,
        'You are not a participant in this match',
        { matchId: engine.matchId, participantId }
      );
    }

    const next = engine.concede(state, participantId, kind);
    await this.persist(engine.matchId, engine, next);
    await this.syncTimeoutKeyQuietly(engine.matchId, engine, next);
    logger.info(kind === 'forfeit' ? 'Participant forfeited' : 'Participant left', {
      winnerIdentifier: next.winnerIdentifier,
    });

    await this.emit(
      kind === 'forfeit'
        ? { type: 'player_forfeited', matchId: engine.matchId, participantId, state: next }
        : { type: 'player_left', matchId: engine.matchId, participantId, state: next }
    );
    await this.finish(engine.matchId, engine, next);

    return { state: next, result: next.result, winnerIdentifier: next.winnerIdentifier };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Timeouts
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Apply the timeout consequence for a match whose timeout key expired.
   * Returns null when there is nothing to do: the match is gone or over,
   * or a move landed first and the clock has not actually run out.
   */
  async applyExpiredTimeout(matchId: string): Promise<AppliedTimeout | null> {
    return runWithMatchContext({ matchId, operation: 'timeout' }, async () => {
      const loaded = await this.load(matchId);
      if (!loaded) {
        logger.debug('Timeout key expired for a match that no longer exists');
        return null;
      }
      const { engine, state } = loaded;
      if (isTerminalResult(state.result)) {
        return null;
      }

      const timeout = engine.resolveTimeout(state);
      if (!timeout) {
        // Fired early or raced a move; make sure a key still guards the turn.
        await this.syncTimeoutKeyQuietly(matchId, engine, state);
        return null;
      }
      return this.persistTimeout(matchId, engine, timeout, 'sentinel');
    });
  }

  private async persistTimeout(
    matchId: string,
    engine: MatchEngine,
    timeout: TimeoutOutcome<MatchState>,
    source: 'move' | 'sentinel'
  ): Promise<AppliedTimeout> {
    const next = timeout.state;
    await this.persist(matchId, engine, next);
    await this.syncTimeoutKeyQuietly(matchId, engine, next);

    this.metrics.recordTimeout(engine.kind, next.timing.timeoutAction, source);
    logger.info('Turn clock ran out', {
      action: timeout.action,
      timedOutIdentifier: timeout.timedOutIdentifier,
      source,
    });

    if (timeout.action === 'end_game') {
      await this.finish(matchId, engine, next);
    } else {
      await this.emit({
        type: 'turn_skipped',
        matchId,
        skippedIdentifier: timeout.timedOutIdentifier,
        state: next,
        currentTurnIdentifier: timeout.currentTurnIdentifier,
      });
    }

    return {
      matchId,
      action: timeout.action,
      state: next,
      timedOutIdentifier: timeout.timedOutIdentifier,
      winnerIdentifier: timeout.winnerIdentifier,
      currentTurnIdentifier: timeout.currentTurnIdentifier,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Deletion
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Remove a match: configuration, state, routing mapping, timeout key and
   * any participant mapping that still points at it.
   */
  async delete(matchId: string): Promise<void> {
    const configRaw = await this.store.get(MatchKeys.config(matchId));
    const parsed = configRaw === null ? null : MatchConfigurationSchema.safeParse(safeJson(configRaw));
    const participants = parsed && parsed.success ? parsed.data.participants : [];

    const operations: StoreOperation[] = [
      { op: 'del', key: MatchKeys.config(matchId) },
      { op: 'del', key: MatchKeys.state(matchId) },
      { op: 'del', key: MatchKeys.kind(matchId) },
      { op: 'del', key: MatchKeys.timeout(matchId) },
    ];
    if (participants.length > 0) {
      const mapped = await this.store.mGet(participants.map((id) => MatchKeys.participantMatch(id)));
      participants.forEach((id, index) => {
        if (mapped[index] === matchId) {
          operations.push({ op: 'del', key: MatchKeys.participantMatch(id) });
        }
      });
    }

    await this.store.atomic(operations);
    logger.info('Match deleted', { matchId });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Internals
  // ═══════════════════════════════════════════════════════════════════════

  private setOp(key: string, value: string): StoreOperation {
    return { op: 'set', key, value, ttlSeconds: this.ttlSeconds };
  }

  private async load(matchId: string): Promise<LoadedMatch | null> {
    const [configRaw, stateRaw] = await this.store.mGet([
      MatchKeys.config(matchId),
      MatchKeys.state(matchId),
    ]);
    if (configRaw === null || stateRaw === null) {
      return null;
    }

    const parsed = MatchConfigurationSchema.safeParse(parseJson(matchId, configRaw));
    if (!parsed.success) {
      throw new CorruptMatchStateError(matchId, parsed.error.message);
    }
    const configuration = parsed.data;
    const engine = createEngine(
      configuration.gameKind,
      {
        matchId,
        participants: configuration.participants,
        rules: configuration.ruleSet,
        currentTurnIndex: configuration.currentTurnIndex,
      },
      this.engineContext
    );
    const state = engine.parseState(parseJson(matchId, stateRaw));
    return { configuration, engine, state };
  }

  private async require(matchId: string): Promise<LoadedMatch> {
    const loaded = await this.load(matchId);
    if (!loaded) {
      throw new MatchNotFoundError(matchId);
    }
    return loaded;
  }

  /**
   * Write configuration (turn pointer) and state together, refreshing the
   * routing keys so they live as long as the match. Participant mappings
   * are only refreshed while the match is in progress.
   */
  private async persist(matchId: string, engine: MatchEngine, state: MatchState): Promise<void> {
    const operations: StoreOperation[] = [
      this.setOp(MatchKeys.config(matchId), JSON.stringify(engine.getConfiguration())),
      this.setOp(MatchKeys.state(matchId), JSON.stringify(state)),
      this.setOp(MatchKeys.kind(matchId), engine.kind),
    ];
    if (!isTerminalResult(state.result)) {
      operations.push(...engine.participants.map((id) => this.setOp(MatchKeys.participantMatch(id), matchId)));
    }
    await this.store.atomic(operations);
  }

  /**
   * Arm the timeout key for the open turn, or clear it when the match is
   * over or untimed. TTL is the whole seconds left plus the buffer, never
   * below one second.
   */
  private async syncTimeoutKey(matchId: string, engine: MatchEngine, state: MatchState): Promise<void> {
    const key = MatchKeys.timeout(matchId);
    const remaining = isTerminalResult(state.result) ? null : engine.getRemainingTime(state);
    if (remaining === null) {
      await this.store.del([key]);
      return;
    }
    const ttl = Math.max(1, Math.floor(remaining) + this.timeoutKeyBufferSeconds);
    await this.store.set(key, state.currentTurnIdentifier, ttl);
    logger.debug('Armed timeout key', { ttlSeconds: ttl });
  }

  /**
   * The key is only a wake-up call; a late move still detects the expiry,
   * so a failed write is logged rather than failing the transition.
   */
  private async syncTimeoutKeyQuietly(
    matchId: string,
    engine: MatchEngine,
    state: MatchState
  ): Promise<void> {
    try {
      await this.syncTimeoutKey(matchId, engine, state);
    } catch (error) {
      logger.warn('Could not update timeout key', { error });
    }
  }

  private async finish(matchId: string, engine: MatchEngine, state: MatchState): Promise<void> {
    this.metrics.recordMatchEnded(engine.kind, state.result);
    await this.emit({
      type: 'game_ended',
      matchId,
      result: state.result,
      winnerIdentifier: state.winnerIdentifier,
      state,
    });
    if (this.ratings && state.winnerIdentifier !== null) {
      await this.ratings.applyAdjustments(matchId, engine.calculateEloAdjustments(state));
    }
  }

  private async emit(event: MatchEvent): Promise<void> {
    if (!this.publisher) {
      return;
    }
    try {
      await this.publisher.publish(event);
    } catch (error) {
      logger.error('Failed to publish match event', { type: event.type, error });
    }
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function parseJson(matchId: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new CorruptMatchStateError(matchId, error instanceof Error ? error.message : String(error));
  }
}
