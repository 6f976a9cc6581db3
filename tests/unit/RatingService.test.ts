jest.mock('../../src/server/utils/logger', () =>
  jest.requireActual<typeof import('../helpers/loggerMock')>('../helpers/loggerMock').createLoggerMock()
);

import { MatchKeys } from '../../src/server/cache/redis';
import { RatingService } from '../../src/server/services/RatingService';
import { logger } from '../../src/server/utils/logger';
import { InMemoryKeyValueStore } from '../helpers/InMemoryKeyValueStore';

describe('RatingService', () => {
  it('rates only registered accounts', () => {
    expect(RatingService.isRated('user:42')).toBe(true);
    expect(RatingService.isRated('user:')).toBe(false);
    expect(RatingService.isRated('guest-7')).toBe(false);
  });

  it('adds adjustments to running totals and skips guests and zero changes', async () => {
    const store = new InMemoryKeyValueStore();
    const ratings = new RatingService(store);

    const first = await ratings.applyAdjustments('m-1', { 'user:a': 1, 'user:b': -1, 'guest-1': -1 });
    const second = await ratings.applyAdjustments('m-2', { 'user:a': 1, 'user:c': 0 });

    expect(first).toEqual([
      { participantId: 'user:a', change: 1, newRating: 1 },
      { participantId: 'user:b', change: -1, newRating: -1 },
    ]);
    expect(second).toEqual([{ participantId: 'user:a', change: 1, newRating: 2 }]);
    expect(await store.hGetAll(MatchKeys.ratings())).toEqual({ 'user:a': '2', 'user:b': '-1' });
    expect(await ratings.getRating('user:a')).toBe(2);
    expect(await ratings.getRating('user:c')).toBe(0);
  });

  it('logs and swallows store failures', async () => {
    const store = new InMemoryKeyValueStore();
    jest.spyOn(store, 'hIncrBy').mockRejectedValueOnce(new Error('READONLY'));
    const ratings = new RatingService(store);

    await expect(ratings.applyAdjustments('m-1', { 'user:a': 1 })).resolves.toEqual([]);
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to update ratings',
      expect.objectContaining({ matchId: 'm-1' })
    );
  });
});
