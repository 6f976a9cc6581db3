import { MatchErrorCode } from '../../src/shared/errors/MatchDomainErrors';
import { TicTacToeEngine } from '../../src/shared/engine/games/TicTacToeEngine';
import type { RuleOverrides } from '../../src/shared/types/match';
import { BASE_TIME, createControlledContext } from '../helpers/engineContext';

function timedEngine(rules: RuleOverrides) {
  const context = createControlledContext();
  const engine = new TicTacToeEngine(
    { matchId: 'clock-1', participants: ['alice', 'bob'], rules },
    context
  );
  return { engine, context };
}

describe('GameEngine clock', () => {
  it('leaves untimed matches without a turn window', () => {
    const { engine, context } = timedEngine({});
    const state = engine.initializeState();
    context.advance(10_000);

    expect(state.timing.turnStartedAt).toBeNull();
    expect(engine.getRemainingTime(state)).toBeNull();
    expect(engine.checkTimeout(state)).toEqual({
      occurred: false,
      winnerIdentifier: null,
      timedOutIdentifier: null,
    });
  });

  it('opens the first window at creation', () => {
    const { engine } = timedEngine({ timeoutType: 'per_turn', timeoutSeconds: 10 });
    const state = engine.initializeState();

    expect(state.timing.turnStartedAt).toBe(new Date(BASE_TIME).toISOString());
    expect(state.createdAt).toBe(new Date(BASE_TIME).toISOString());
  });

  it('counts down the per-turn allowance', () => {
    const { engine, context } = timedEngine({ timeoutType: 'per_turn', timeoutSeconds: 10 });
    const state = engine.initializeState();
    context.advance(3.5);

    expect(engine.getRemainingTime(state)).toBeCloseTo(6.5, 5);
    expect(engine.getTimingInfo(state)).toEqual({
      timeoutKind: 'per_turn',
      timeoutSeconds: 10,
      timeoutAction: 'end_game',
      currentIdentifier: 'alice',
      remainingSeconds: 6.5,
    });
  });

  it('ends the match for the opponent when a per-turn clock runs out', () => {
    const { engine, context } = timedEngine({
      timeoutType: 'per_turn',
      timeoutSeconds: 10,
      timeoutAction: 'end_game',
    });
    const state = engine.initializeState();
    context.advance(12);

    expect(engine.checkTimeout(state)).toEqual({
      occurred: true,
      winnerIdentifier: 'bob',
      timedOutIdentifier: 'alice',
    });

    const outcome = engine.resolveTimeout(state);
    expect(outcome?.action).toBe('end_game');
    expect(outcome?.winnerIdentifier).toBe('bob');
    expect(outcome?.state.result).toBe('timeout');
    expect(outcome?.state.winnerIdentifier).toBe('bob');
    expect(outcome?.state.timing.turnStartedAt).toBeNull();
    expect(engine.recordedOutcome).toEqual({ result: 'timeout', winnerIdentifier: 'bob' });
  });

  it('treats exactly the allowance as still in time', () => {
    const { engine, context } = timedEngine({ timeoutType: 'per_turn', timeoutSeconds: 10 });
    const state = engine.initializeState();
    context.advance(10);

    expect(engine.checkTimeout(state).occurred).toBe(false);
    expect(engine.resolveTimeout(state)).toBeNull();
  });

  it('rejects a late move as time expired', () => {
    const { engine, context } = timedEngine({ timeoutType: 'per_turn', timeoutSeconds: 10 });
    const state = engine.initializeState();
    context.advance(11);

    expect(engine.validateMove(state, 'alice', { row: 0, col: 0 })).toEqual({
      valid: false,
      code: MatchErrorCode.MOVE_TIME_EXPIRED,
      error: 'Your time has run out',
    });
  });

  it('passes the turn and restarts the clock on skip_turn', () => {
    const { engine, context } = timedEngine({
      timeoutType: 'per_turn',
      timeoutSeconds: 10,
      timeoutAction: 'skip_turn',
    });
    const state = engine.initializeState();
    context.advance(11);

    const outcome = engine.resolveTimeout(state);

    expect(outcome?.action).toBe('skip_turn');
    expect(outcome?.timedOutIdentifier).toBe('alice');
    expect(outcome?.winnerIdentifier).toBeNull();
    expect(outcome?.currentTurnIdentifier).toBe('bob');
    expect(outcome?.state.result).toBe('in_progress');
    expect(outcome?.state.currentTurnIdentifier).toBe('bob');
    expect(outcome?.state.timing.turnStartedAt).toBe(new Date(BASE_TIME + 11_000).toISOString());
    expect(engine.currentParticipant).toBe('bob');
  });

  it('debits only the mover under total_time', () => {
    const { engine, context } = timedEngine({ timeoutType: 'total_time', timeoutSeconds: 60 });
    let state = engine.initializeState();
    expect(state.timing.remainingSeconds).toEqual({ alice: 60, bob: 60 });

    context.advance(10);
    state = engine.completeMove(state, 'alice', { row: 0, col: 0 });
    expect(state.timing.remainingSeconds).toEqual({ alice: 50, bob: 60 });
    expect(state.timing.turnStartedAt).toBe(new Date(BASE_TIME + 10_000).toISOString());

    context.advance(5);
    expect(engine.getTimingInfo(state)).toEqual({
      timeoutKind: 'total_time',
      timeoutSeconds: 60,
      timeoutAction: 'end_game',
      currentIdentifier: 'bob',
      remainingSeconds: 55,
      perParticipantRemaining: { alice: 50, bob: 55 },
    });
  });

  it('closes the window when the match ends', () => {
    const { engine, context } = timedEngine({ timeoutType: 'total_time', timeoutSeconds: 60 });
    let state = engine.initializeState();
    const moves = [
      { row: 0, col: 0 },
      { row: 1, col: 1 },
      { row: 0, col: 1 },
      { row: 2, col: 2 },
      { row: 0, col: 2 },
    ];
    for (const move of moves) {
      context.advance(2);
      state = engine.completeMove(state, engine.currentParticipant, move);
    }

    expect(state.result).toBe('player_win');
    expect(state.timing.turnStartedAt).toBeNull();
    expect(state.timing.remainingSeconds).toEqual({ alice: 54, bob: 56 });
    expect(engine.checkTimeout(state).occurred).toBe(false);
  });

  it('closes the window and records the loser on concession', () => {
    const { engine, context } = timedEngine({ timeoutType: 'per_turn', timeoutSeconds: 30 });
    const state = engine.initializeState();
    context.advance(4);

    const forfeited = engine.concede(state, 'alice', 'forfeit');
    expect(forfeited.result).toBe('forfeit');
    expect(forfeited.winnerIdentifier).toBe('bob');
    expect(forfeited.forfeitedBy).toBe('alice');
    expect(forfeited.timing.turnStartedAt).toBeNull();

    const left = engine.concede(state, 'bob', 'player_left');
    expect(left.result).toBe('player_left');
    expect(left.winnerIdentifier).toBe('alice');
    expect(left.leftBy).toBe('bob');
  });

  it('requires a positive allowance when a clock is enabled', () => {
    expect(() => timedEngine({ timeoutType: 'per_turn', timeoutSeconds: 0 })).toThrow(
      'timeoutSeconds must be positive when a clock is enabled'
    );
  });

  it('gives the winner +1 and the loser -1', () => {
    const { engine } = timedEngine({});
    const state = engine.concede(engine.initializeState(), 'bob', 'forfeit');

    expect(engine.calculateEloAdjustments(state)).toEqual({ alice: 1, bob: -1 });
    expect(engine.calculateEloAdjustments(engine.initializeState())).toEqual({});
  });
});
