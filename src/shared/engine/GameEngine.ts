import type { z } from 'zod';
import {
  ConfigurationError,
  CorruptMatchStateError,
  MatchErrorCode,
  type MoveRejectionCode,
} from '../errors/MatchDomainErrors';
import {
  MatchEnvelopeSchema,
  isTerminalResult,
  type GameInfo,
  type GameKind,
  type GameOutcome,
  type MatchConfiguration,
  type MatchState,
  type ResolvedRules,
  type RuleOverrides,
  type TimeoutAction,
  type TimeoutCheck,
  type TimeoutKind,
  type TimingInfo,
  type TimingState,
  type TurnDirective,
} from '../types/match';
import { validateRuleSet } from './rules/ruleDescriptor';

/**
 * Clock and randomness used by an engine. Injected so tests can pin time
 * and dice rolls.
 */
export interface EngineContext {
  /** Milliseconds since the epoch. */
  now(): number;
  /** Uniform in [0, 1). */
  random(): number;
}

export const defaultEngineContext: EngineContext = {
  now: () => Date.now(),
  random: () => Math.random(),
};

export interface EngineConfiguration {
  matchId: string;
  participants: readonly string[];
  rules?: RuleOverrides;
  currentTurnIndex?: number;
}

export type MoveValidation<TMove = unknown> =
  | { valid: true; move: TMove }
  | { valid: false; code: MoveRejectionCode; error: string };

export interface AppliedMove<TState> {
  state: TState;
  turn: TurnDirective;
}

export interface TimeoutOutcome<TState> {
  action: 'end_game' | 'skip_turn';
  state: TState;
  timedOutIdentifier: string;
  winnerIdentifier: string | null;
  /** Participant whose turn it is after the consequence was applied. */
  currentTurnIdentifier: string;
}

export type ConcessionKind = 'forfeit' | 'player_left';

/**
 * Kind-agnostic view of an engine. This is all the orchestration layer
 * needs; it never sees a concrete game class.
 */
export interface MatchEngine {
  readonly kind: GameKind;
  readonly info: GameInfo;
  readonly matchId: string;
  readonly participants: readonly string[];
  readonly rules: Readonly<ResolvedRules>;
  readonly currentTurnIndex: number;
  readonly currentParticipant: string;
  readonly timeoutKind: TimeoutKind;

  getConfiguration(): MatchConfiguration;
  initializeState(): MatchState;
  parseState(raw: unknown): MatchState;
  validateMove(state: MatchState, participantId: string, move: unknown): MoveValidation;
  applyMove(state: MatchState, participantId: string, move: unknown): AppliedMove<MatchState>;
  completeMove(state: MatchState, participantId: string, move: unknown): MatchState;
  checkGameResult(state: MatchState): GameOutcome;
  advanceTurn(): void;
  startTurn(state: MatchState): MatchState;
  consumeTurnTime(state: MatchState): MatchState;
  getRemainingTime(state: MatchState, participantId?: string): number | null;
  getTimingInfo(state: MatchState): TimingInfo;
  checkTimeout(state: MatchState): TimeoutCheck;
  resolveTimeout(state: MatchState): TimeoutOutcome<MatchState> | null;
  forfeitGame(participantId: string): GameOutcome;
  leaveGame(participantId: string): GameOutcome;
  concede(state: MatchState, participantId: string, kind: ConcessionKind): MatchState;
  calculateEloAdjustments(state: MatchState): Record<string, number>;
}

/**
 * Base class for every rule set.
 *
 * Engines are value-oriented: each public operation takes a state document
 * and returns a new one, never touching the argument. The only instance
 * state that changes is the turn pointer and the last recorded outcome,
 * both of which the orchestrator persists in the match configuration.
 *
 * Subclasses supply the payload and move schemas plus the four kind hooks:
 * {@link initializeKindState}, {@link validateKindMove}, {@link applyKindMove}
 * and {@link evaluateKindResult}.
 */
export abstract class GameEngine<TKind extends GameKind, TPayload, TMove> implements MatchEngine {
  readonly info: GameInfo & { kind: TKind };
  readonly matchId: string;
  readonly participants: readonly string[];
  readonly rules: Readonly<ResolvedRules>;
  readonly timeoutKind: TimeoutKind;
  readonly timeoutSeconds: number;
  readonly timeoutAction: TimeoutAction;

  protected readonly context: EngineContext;
  private turnIndex: number;
  private outcome: GameOutcome = { result: 'in_progress', winnerIdentifier: null };

  protected abstract readonly payloadSchema: z.ZodType<TPayload, z.ZodTypeDef, unknown>;
  protected abstract readonly moveSchema: z.ZodType<TMove, z.ZodTypeDef, unknown>;

  constructor(
    info: GameInfo & { kind: TKind },
    configuration: EngineConfiguration,
    context: EngineContext = defaultEngineContext
  ) {
    this.info = info;
    this.context = context;
    this.matchId = configuration.matchId;

    const participants = [...configuration.participants];
    if (participants.length < info.minPlayers || participants.length > info.maxPlayers) {
      const bounds =
        info.minPlayers === info.maxPlayers
          ? `exactly ${info.minPlayers}`
          : `${info.minPlayers}-${info.maxPlayers}`;
      throw new ConfigurationError(`${info.displayName} requires ${bounds} players`, {
        kind: info.kind,
        participantCount: participants.length,
      });
    }
    if (participants.some((id) => id.length === 0)) {
      throw new ConfigurationError('Participant identifiers must be non-empty', { participants });
    }
    if (new Set(participants).size !== participants.length) {
      throw new ConfigurationError('Participant identifiers must be unique', { participants });
    }
    this.participants = Object.freeze(participants);

    const turnIndex = configuration.currentTurnIndex ?? 0;
    if (!Number.isInteger(turnIndex) || turnIndex < 0 || turnIndex >= participants.length) {
      throw new ConfigurationError(`Turn index ${turnIndex} is out of range`, { turnIndex });
    }
    this.turnIndex = turnIndex;

    this.rules = Object.freeze(validateRuleSet(info.supportedRules, configuration.rules));

    const timeoutType = this.stringRule('timeoutType');
    this.timeoutKind =
      timeoutType === 'per_turn' || timeoutType === 'total_time' ? timeoutType : 'none';
    this.timeoutSeconds = this.numberRule('timeoutSeconds');
    const action = this.stringRule('timeoutAction');
    this.timeoutAction =
      action === 'skip_turn' || action === 'eliminate_player' ? action : 'end_game';

    if (this.timeoutKind !== 'none' && this.timeoutSeconds <= 0) {
      throw new ConfigurationError('timeoutSeconds must be positive when a clock is enabled', {
        timeoutSeconds: this.timeoutSeconds,
      });
    }
  }

  get kind(): TKind {
    return this.info.kind;
  }

  get currentTurnIndex(): number {
    return this.turnIndex;
  }

  get currentParticipant(): string {
    return this.participants[this.turnIndex];
  }

  /** Outcome recorded by the last checkGameResult / forfeit / timeout. */
  get recordedOutcome(): GameOutcome {
    return { ...this.outcome };
  }

  getConfiguration(): MatchConfiguration {
    return {
      matchId: this.matchId,
      gameKind: this.kind,
      participants: [...this.participants],
      ruleSet: { ...this.rules },
      currentTurnIndex: this.turnIndex,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Kind hooks
  // ═══════════════════════════════════════════════════════════════════════

  protected abstract initializeKindState(): TPayload;

  /** Return a rejection reason, or null when the move is legal. Must not mutate. */
  protected abstract validateKindMove(
    state: MatchState<TKind, TPayload, TMove>,
    participantId: string,
    move: TMove
  ): string | null;

  /** Mutate the (already cloned) state and report what the turn does next. */
  protected abstract applyKindMove(
    state: MatchState<TKind, TPayload, TMove>,
    participantId: string,
    move: TMove
  ): TurnDirective;

  /** Terminal detection; `state.currentTurnIdentifier` is the participant to move. */
  protected abstract evaluateKindResult(state: MatchState<TKind, TPayload, TMove>): GameOutcome;

  /** Drop per-turn scratch data when a turn is skipped by the clock. */
  protected onTurnSkipped(payload: TPayload): TPayload {
    return payload;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // State lifecycle
  // ═══════════════════════════════════════════════════════════════════════

  initializeState(): MatchState<TKind, TPayload, TMove> {
    const state: MatchState<TKind, TPayload, TMove> = {
      kind: this.kind,
      payload: this.initializeKindState(),
      moveCount: 0,
      lastMove: null,
      result: 'in_progress',
      winnerIdentifier: null,
      currentTurnIdentifier: this.currentParticipant,
      timing: this.initialTiming(),
      createdAt: new Date(this.context.now()).toISOString(),
    };
    this.outcome = { result: 'in_progress', winnerIdentifier: null };
    return this.startTurn(state);
  }

  /**
   * Validate a stored document. Payload and moves go through the kind's
   * schemas so nothing downstream reads unchecked data.
   */
  parseState(raw: unknown): MatchState<TKind, TPayload, TMove> {
    const envelope = MatchEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      throw new CorruptMatchStateError(this.matchId, envelope.error.message);
    }
    const doc = envelope.data;
    if (doc.kind !== this.kind) {
      throw new CorruptMatchStateError(this.matchId, `expected ${this.kind}, found ${doc.kind}`);
    }
    const payload = this.payloadSchema.safeParse(doc.payload);
    if (!payload.success) {
      throw new CorruptMatchStateError(this.matchId, payload.error.message);
    }

    let lastMove: MatchState<TKind, TPayload, TMove>['lastMove'] = null;
    if (doc.lastMove !== null) {
      const move = this.moveSchema.safeParse(doc.lastMove.move);
      if (!move.success) {
        throw new CorruptMatchStateError(this.matchId, move.error.message);
      }
      lastMove = { participantId: doc.lastMove.participantId, move: move.data, at: doc.lastMove.at };
    }

    return {
      kind: this.kind,
      payload: payload.data,
      moveCount: doc.moveCount,
      lastMove,
      result: doc.result,
      winnerIdentifier: doc.winnerIdentifier,
      currentTurnIdentifier: doc.currentTurnIdentifier,
      timing: doc.timing,
      createdAt: doc.createdAt,
      forfeitedBy: doc.forfeitedBy,
      leftBy: doc.leftBy,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Moves
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Side-effect free. Checks, in order: membership, turn order, terminal
   * result, the mover's clock, payload shape, and kind legality.
   */
  validateMove(
    state: MatchState<TKind, TPayload, TMove>,
    participantId: string,
    move: unknown
  ): MoveValidation<TMove> {
    if (!this.participants.includes(participantId)) {
      return reject(MatchErrorCode.MOVE_NOT_PARTICIPANT, 'You are not a participant in this match');
    }
    if (participantId !== this.currentParticipant) {
      return reject(MatchErrorCode.MOVE_NOT_YOUR_TURN, 'Not your turn');
    }
    if (isTerminalResult(state.result)) {
      return reject(MatchErrorCode.MOVE_GAME_OVER, `Game is already over (${state.result})`);
    }
    if (this.checkTimeout(state).occurred) {
      return reject(MatchErrorCode.MOVE_TIME_EXPIRED, 'Your time has run out');
    }

    const parsed = this.moveSchema.safeParse(move);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : '';
      return reject(
        MatchErrorCode.MOVE_MALFORMED,
        `Malformed move${where}: ${issue ? issue.message : 'invalid payload'}`
      );
    }

    const error = this.validateKindMove(state, participantId, parsed.data);
    if (error !== null) {
      return reject(MatchErrorCode.MOVE_ILLEGAL, error);
    }
    return { valid: true, move: parsed.data };
  }

  /**
   * Apply a validated move. Updates moveCount/lastMove and returns the turn
   * directive the kind decided on; timing and turn order are untouched.
   */
  applyMove(
    state: MatchState<TKind, TPayload, TMove>,
    participantId: string,
    move: TMove
  ): AppliedMove<MatchState<TKind, TPayload, TMove>> {
    const next = structuredClone(state);
    const turn = this.applyKindMove(next, participantId, move);
    next.moveCount += 1;
    next.lastMove = {
      participantId,
      move,
      at: new Date(this.context.now()).toISOString(),
    };
    return { state: next, turn };
  }

  /**
   * Full post-validation pipeline: apply, settle the clock according to the
   * turn directive, hand the turn over, then check for a terminal result.
   */
  completeMove(
    state: MatchState<TKind, TPayload, TMove>,
    participantId: string,
    move: TMove
  ): MatchState<TKind, TPayload, TMove> {
    const applied = this.applyMove(state, participantId, move);
    let next = applied.state;

    if (applied.turn !== 'continue') {
      next = this.consumeTurnTime(next);
    }
    if (applied.turn === 'next') {
      this.advanceTurn();
    }
    next.currentTurnIdentifier = this.currentParticipant;

    const outcome = this.checkGameResult(next);
    next.result = outcome.result;
    next.winnerIdentifier = outcome.winnerIdentifier;

    if (isTerminalResult(outcome.result)) {
      return this.consumeTurnTime(next);
    }
    return this.startTurn(next);
  }

  checkGameResult(state: MatchState<TKind, TPayload, TMove>): GameOutcome {
    const outcome = this.evaluateKindResult(state);
    this.outcome = { ...outcome };
    return outcome;
  }

  advanceTurn(): void {
    this.turnIndex = (this.turnIndex + 1) % this.participants.length;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Clock
  // ═══════════════════════════════════════════════════════════════════════

  private initialTiming(): TimingState {
    const timing: TimingState = {
      timeoutKind: this.timeoutKind,
      timeoutSeconds: this.timeoutSeconds,
      timeoutAction: this.timeoutAction,
      turnStartedAt: null,
    };
    if (this.timeoutKind === 'total_time') {
      timing.remainingSeconds = Object.fromEntries(
        this.participants.map((id) => [id, this.timeoutSeconds])
      );
    }
    return timing;
  }

  private elapsedSeconds(timing: TimingState): number {
    if (timing.turnStartedAt === null) {
      return 0;
    }
    const started = Date.parse(timing.turnStartedAt);
    return Math.max(0, (this.context.now() - started) / 1000);
  }

  private budgetOf(timing: TimingState, participantId: string): number {
    return timing.remainingSeconds?.[participantId] ?? timing.timeoutSeconds;
  }

  /**
   * Open the turn window. A window that is already open is left alone so a
   * multi-step turn never restarts its own clock.
   */
  startTurn(state: MatchState<TKind, TPayload, TMove>): MatchState<TKind, TPayload, TMove> {
    if (state.timing.timeoutKind === 'none' || state.timing.turnStartedAt !== null) {
      return state;
    }
    const next = structuredClone(state);
    next.timing.turnStartedAt = new Date(this.context.now()).toISOString();
    return next;
  }

  /**
   * Close the turn window. Under `total_time` the elapsed seconds are
   * debited from the turn holder's budget, floored at zero.
   */
  consumeTurnTime(state: MatchState<TKind, TPayload, TMove>): MatchState<TKind, TPayload, TMove> {
    if (state.timing.timeoutKind === 'none' || state.timing.turnStartedAt === null) {
      return state;
    }
    const next = structuredClone(state);
    if (next.timing.timeoutKind === 'total_time') {
      // The window always belongs to whoever held the turn when it opened.
      const holder = state.currentTurnIdentifier;
      const remaining = this.budgetOf(state.timing, holder) - this.elapsedSeconds(state.timing);
      next.timing.remainingSeconds = {
        ...(next.timing.remainingSeconds ?? {}),
        [holder]: Math.max(0, remaining),
      };
    }
    next.timing.turnStartedAt = null;
    return next;
  }

  /**
   * Seconds left on a participant's clock (default: the turn holder), or
   * null for untimed matches. Clamped at zero.
   */
  getRemainingTime(state: MatchState<TKind, TPayload, TMove>, participantId?: string): number | null {
    const timing = state.timing;
    if (timing.timeoutKind === 'none') {
      return null;
    }
    const who = participantId ?? this.currentParticipant;
    const running = who === this.currentParticipant && timing.turnStartedAt !== null;
    const allowance =
      timing.timeoutKind === 'per_turn' ? timing.timeoutSeconds : this.budgetOf(timing, who);
    if (!running) {
      return allowance;
    }
    return Math.max(0, allowance - this.elapsedSeconds(timing));
  }

  getTimingInfo(state: MatchState<TKind, TPayload, TMove>): TimingInfo {
    const info: TimingInfo = {
      timeoutKind: state.timing.timeoutKind,
      timeoutSeconds: state.timing.timeoutSeconds,
      timeoutAction: state.timing.timeoutAction,
      currentIdentifier: this.currentParticipant,
      remainingSeconds: this.getRemainingTime(state),
    };
    if (state.timing.timeoutKind === 'total_time') {
      const perParticipant: Record<string, number> = {};
      for (const id of this.participants) {
        perParticipant[id] = this.getRemainingTime(state, id) ?? 0;
      }
      info.perParticipantRemaining = perParticipant;
    }
    return info;
  }

  /**
   * Has the turn holder's clock run out? Only `end_game` in a two-player
   * match names a winner.
   */
  checkTimeout(state: MatchState<TKind, TPayload, TMove>): TimeoutCheck {
    const timing = state.timing;
    const none: TimeoutCheck = { occurred: false, winnerIdentifier: null, timedOutIdentifier: null };
    if (
      timing.timeoutKind === 'none' ||
      timing.turnStartedAt === null ||
      isTerminalResult(state.result)
    ) {
      return none;
    }

    const holder = this.currentParticipant;
    const allowance =
      timing.timeoutKind === 'per_turn' ? timing.timeoutSeconds : this.budgetOf(timing, holder);
    if (this.elapsedSeconds(timing) <= allowance) {
      return none;
    }

    const winner = timing.timeoutAction === 'end_game' ? this.soleOpponentOf(holder) : null;
    return { occurred: true, winnerIdentifier: winner, timedOutIdentifier: holder };
  }

  /**
   * Apply the configured timeout consequence, or return null when the clock
   * has not actually run out (e.g. a move landed first).
   */
  resolveTimeout(
    state: MatchState<TKind, TPayload, TMove>
  ): TimeoutOutcome<MatchState<TKind, TPayload, TMove>> | null {
    const check = this.checkTimeout(state);
    if (!check.occurred || check.timedOutIdentifier === null) {
      return null;
    }

    let next = this.consumeTurnTime(state);

    if (state.timing.timeoutAction === 'end_game') {
      next = structuredClone(next);
      next.result = 'timeout';
      next.winnerIdentifier = check.winnerIdentifier;
      this.outcome = { result: 'timeout', winnerIdentifier: check.winnerIdentifier };
      return {
        action: 'end_game',
        state: next,
        timedOutIdentifier: check.timedOutIdentifier,
        winnerIdentifier: check.winnerIdentifier,
        currentTurnIdentifier: this.currentParticipant,
      };
    }

    // skip_turn; eliminate_player behaves the same for now.
    next = structuredClone(next);
    next.payload = this.onTurnSkipped(next.payload);
    this.advanceTurn();
    next.currentTurnIdentifier = this.currentParticipant;
    next = this.startTurn(next);
    return {
      action: 'skip_turn',
      state: next,
      timedOutIdentifier: check.timedOutIdentifier,
      winnerIdentifier: null,
      currentTurnIdentifier: this.currentParticipant,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Concession and ratings
  // ═══════════════════════════════════════════════════════════════════════

  private soleOpponentOf(participantId: string): string | null {
    if (this.participants.length !== 2) {
      return null;
    }
    return this.participants.find((id) => id !== participantId) ?? null;
  }

  forfeitGame(participantId: string): GameOutcome {
    this.outcome = { result: 'forfeit', winnerIdentifier: this.soleOpponentOf(participantId) };
    return { ...this.outcome };
  }

  leaveGame(participantId: string): GameOutcome {
    this.outcome = { result: 'player_left', winnerIdentifier: this.soleOpponentOf(participantId) };
    return { ...this.outcome };
  }

  /**
   * End the match because a participant gave up or disconnected for good.
   * The open turn window is closed first.
   */
  concede(
    state: MatchState<TKind, TPayload, TMove>,
    participantId: string,
    kind: ConcessionKind
  ): MatchState<TKind, TPayload, TMove> {
    const outcome = kind === 'forfeit' ? this.forfeitGame(participantId) : this.leaveGame(participantId);
    const next = structuredClone(this.consumeTurnTime(state));
    next.result = outcome.result;
    next.winnerIdentifier = outcome.winnerIdentifier;
    if (kind === 'forfeit') {
      next.forfeitedBy = participantId;
    } else {
      next.leftBy = participantId;
    }
    return next;
  }

  /**
   * Rating delta per participant. Winner +1, everyone else -1; no change
   * without a winner.
   */
  calculateEloAdjustments(state: MatchState<TKind, TPayload, TMove>): Record<string, number> {
    const winner = state.winnerIdentifier;
    if (winner === null || !this.participants.includes(winner)) {
      return {};
    }
    const adjustments: Record<string, number> = {};
    for (const id of this.participants) {
      adjustments[id] = id === winner ? 1 : -1;
    }
    return adjustments;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Rule access
  // ═══════════════════════════════════════════════════════════════════════

  protected numberRule(key: string): number {
    const value = this.rules[key];
    if (typeof value !== 'number') {
      throw new ConfigurationError(`Rule '${key}' is not numeric`, { rule: key, value });
    }
    return value;
  }

  protected stringRule(key: string): string {
    const value = this.rules[key];
    if (typeof value !== 'string') {
      throw new ConfigurationError(`Rule '${key}' is not a string`, { rule: key, value });
    }
    return value;
  }

  /** Yes/no style rules (`"Yes"`, `"yes"`, `true`). */
  protected flagRule(key: string): boolean {
    const value = this.rules[key];
    if (typeof value === 'boolean') {
      return value;
    }
    return typeof value === 'string' && value.toLowerCase() === 'yes';
  }

  protected opponentOf(participantId: string): string {
    return this.participants.find((id) => id !== participantId) ?? participantId;
  }
}

function reject(code: MoveRejectionCode, error: string): MoveValidation<never> {
  return { valid: false, code, error };
}
