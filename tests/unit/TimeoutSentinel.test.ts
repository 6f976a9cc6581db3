jest.mock('../../src/server/utils/logger', () =>
  jest.requireActual<typeof import('../helpers/loggerMock')>('../helpers/loggerMock').createLoggerMock()
);

import { MatchKeys } from '../../src/server/cache/redis';
import { MatchStore } from '../../src/server/game/MatchStore';
import { TimeoutSentinel } from '../../src/server/game/TimeoutSentinel';
import { MetricsService, getMetricsService } from '../../src/server/services/MetricsService';
import { logger } from '../../src/server/utils/logger';
import { createControlledContext } from '../helpers/engineContext';
import { InMemoryKeyValueStore } from '../helpers/InMemoryKeyValueStore';
import { RecordingPublisher } from '../helpers/RecordingPublisher';

function setup() {
  const context = createControlledContext();
  const store = new InMemoryKeyValueStore(() => context.now());
  const publisher = new RecordingPublisher();
  const metrics = getMetricsService();
  const matches = new MatchStore({
    store,
    publisher,
    metrics,
    engineContext: context,
    ttlSeconds: 600,
    timeoutKeyBufferSeconds: 1,
  });
  const sentinel = new TimeoutSentinel(store, matches, metrics);
  return { context, store, publisher, metrics, matches, sentinel };
}

describe('TimeoutSentinel', () => {
  afterAll(() => {
    MetricsService.resetInstance();
  });

  it('subscribes once and unsubscribes on stop', async () => {
    const { store, sentinel } = setup();

    await sentinel.start();
    await sentinel.start();
    expect(store.listenerCount).toBe(1);
    expect(sentinel.isRunning).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith('TimeoutSentinel is already running');

    await sentinel.stop();
    expect(store.listenerCount).toBe(0);
    expect(sentinel.isRunning).toBe(false);
  });

  it('ends a match when its timeout key expires', async () => {
    const { context, store, publisher, matches, sentinel } = setup();
    await matches.create({
      matchId: 'm-1',
      kind: 'tictactoe',
      participants: ['a', 'b'],
      rules: { timeoutType: 'per_turn', timeoutSeconds: 10, timeoutAction: 'end_game' },
    });
    await sentinel.start();

    context.advance(11);
    expect(store.sweep()).toEqual([MatchKeys.timeout('m-1')]);
    await sentinel.stop();

    const state = await matches.getState('m-1');
    expect(state?.result).toBe('timeout');
    expect(state?.winnerIdentifier).toBe('b');
    expect(publisher.types()).toEqual(['game_started', 'game_ended']);
    expect(publisher.events[1]).toEqual({
      type: 'game_ended',
      matchId: 'm-1',
      result: 'timeout',
      winnerIdentifier: 'b',
      state,
    });
  });

  it('skips the turn and arms a fresh key for the next participant', async () => {
    const { context, store, publisher, matches, sentinel } = setup();
    await matches.create({
      matchId: 'm-1',
      kind: 'checkers',
      participants: ['a', 'b'],
      rules: { timeoutType: 'per_turn', timeoutSeconds: 30, timeoutAction: 'skip_turn' },
    });

    context.advance(31);
    await sentinel.handleExpiredKey(MatchKeys.timeout('m-1'));

    const state = await matches.getState('m-1');
    expect(state?.result).toBe('in_progress');
    expect(state?.currentTurnIdentifier).toBe('b');
    expect(await store.get(MatchKeys.timeout('m-1'))).toBe('b');
    expect(store.ttl(MatchKeys.timeout('m-1'))).toBe(31);
    expect(publisher.types()).toEqual(['game_started', 'turn_skipped']);
    expect(publisher.events[1]).toEqual({
      type: 'turn_skipped',
      matchId: 'm-1',
      skippedIdentifier: 'a',
      state,
      currentTurnIdentifier: 'b',
    });
  });

  it('treats eliminate_player like a skipped turn', async () => {
    const { context, publisher, matches, sentinel } = setup();
    await matches.create({
      matchId: 'm-2',
      kind: 'tictactoe',
      participants: ['a', 'b'],
      rules: { timeoutType: 'per_turn', timeoutSeconds: 10, timeoutAction: 'eliminate_player' },
    });

    context.advance(11);
    await sentinel.handleExpiredKey(MatchKeys.timeout('m-2'));

    const state = await matches.getState('m-2');
    expect(state?.result).toBe('in_progress');
    expect(state?.currentTurnIdentifier).toBe('b');
    expect(publisher.events.map((event) => event.type)).toEqual(['game_started', 'turn_skipped']);
    expect(publisher.events[1]).toMatchObject({
      type: 'turn_skipped',
      matchId: 'm-2',
      skippedIdentifier: 'a',
      currentTurnIdentifier: 'b',
    });
  });

  it('publishes nothing when the clock has not run out', async () => {
    const { context, publisher, matches, sentinel } = setup();
    await matches.create({
      matchId: 'm-3',
      kind: 'tictactoe',
      participants: ['a', 'b'],
      rules: { timeoutType: 'per_turn', timeoutSeconds: 10, timeoutAction: 'end_game' },
    });

    context.advance(5);
    await sentinel.handleExpiredKey(MatchKeys.timeout('m-3'));

    expect(publisher.types()).toEqual(['game_started']);
    expect((await matches.getState('m-3'))?.result).toBe('in_progress');
  });

  it('ignores keys that are not timeout keys', async () => {
    const { matches, sentinel } = setup();
    const apply = jest.spyOn(matches, 'applyExpiredTimeout');

    await sentinel.handleExpiredKey('match:m-1:state');
    await sentinel.handleExpiredKey('session:abc');

    expect(apply).not.toHaveBeenCalled();
  });

  it('counts and logs failures without rejecting', async () => {
    const { matches, metrics, sentinel } = setup();
    const failures = jest.spyOn(metrics, 'recordSentinelFailure');
    jest.spyOn(matches, 'applyExpiredTimeout').mockRejectedValueOnce(new Error('store offline'));

    await expect(sentinel.handleExpiredKey(MatchKeys.timeout('m-9'))).resolves.toBeUndefined();

    expect(failures).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      'Error handling expired timeout key',
      expect.objectContaining({ matchId: 'm-9' })
    );
  });
});
