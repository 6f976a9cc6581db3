jest.mock('../../src/server/utils/logger', () =>
  jest.requireActual<typeof import('../helpers/loggerMock')>('../helpers/loggerMock').createLoggerMock()
);

import { Server as SocketIOServer } from 'socket.io';
import { MatchKeys } from '../../src/server/cache/redis';
import {
  FanoutMatchEventPublisher,
  RedisMatchEventPublisher,
  SocketIoMatchEventPublisher,
  type MatchEvent,
  type MatchEventPublisher,
} from '../../src/server/game/MatchEventPublisher';
import { TicTacToeEngine } from '../../src/shared/engine/games/TicTacToeEngine';
import { logger } from '../../src/server/utils/logger';
import { createControlledContext } from '../helpers/engineContext';
import { InMemoryKeyValueStore } from '../helpers/InMemoryKeyValueStore';

function moveEvent(): MatchEvent {
  const engine = new TicTacToeEngine(
    { matchId: 'm-1', participants: ['alice', 'bob'] },
    createControlledContext()
  );
  const state = engine.completeMove(engine.initializeState(), 'alice', { row: 1, col: 1 });
  return {
    type: 'move_made',
    matchId: 'm-1',
    participantId: 'alice',
    move: { row: 1, col: 1 },
    state,
    currentTurnIdentifier: 'bob',
  };
}

describe('RedisMatchEventPublisher', () => {
  it('publishes the event as JSON on the match channel', async () => {
    const store = new InMemoryKeyValueStore();
    const event = moveEvent();

    await new RedisMatchEventPublisher(store).publish(event);

    expect(store.published).toEqual([{ channel: MatchKeys.events('m-1'), message: JSON.stringify(event) }]);
    expect(MatchKeys.events('m-1')).toBe('match:m-1:events');
  });
});

describe('SocketIoMatchEventPublisher', () => {
  it('emits the event type to the match room', async () => {
    const io = new SocketIOServer();
    const broadcast = jest.spyOn(io.of('/').adapter, 'broadcast').mockImplementation(() => undefined);
    const event = moveEvent();

    await new SocketIoMatchEventPublisher(io).publish(event);

    expect(SocketIoMatchEventPublisher.roomFor('m-1')).toBe('match:m-1');
    expect(broadcast).toHaveBeenCalledTimes(1);
    expect(broadcast).toHaveBeenCalledWith(
      expect.objectContaining({ data: ['move_made', event] }),
      expect.objectContaining({ rooms: new Set(['match:m-1']) })
    );
  });
});

describe('FanoutMatchEventPublisher', () => {
  it('delivers to every sink and logs the ones that fail', async () => {
    const delivered: MatchEvent[] = [];
    const healthy: MatchEventPublisher = {
      publish: async (event) => {
        delivered.push(event);
      },
    };
    const broken: MatchEventPublisher = {
      publish: async () => {
        throw new Error('socket closed');
      },
    };
    const event = moveEvent();

    await expect(new FanoutMatchEventPublisher([broken, healthy]).publish(event)).resolves.toBeUndefined();

    expect(delivered).toEqual([event]);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('Failed to publish match event', {
      matchId: 'm-1',
      type: 'move_made',
      error: expect.objectContaining({ message: 'socket closed' }),
    });
  });
});
