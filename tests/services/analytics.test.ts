import { vi, describe, it, expect, beforeEach } from 'vitest';

vi.mock('../../src/jobs/queues.js', () => ({
  addJob: vi.fn().mockResolvedValue(undefined),
}));

import { analyticsService } from '../../src/services/analytics.service.js';
import { addJob } from '../../src/jobs/queues.js';

describe('analyticsService', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should enqueue item-shown events with a timestamp', async () => {
    await analyticsService.itemsShown({
      userId: 'user_1',
      sessionId: 'session_1',
      itemIds: ['a', 'b'],
      offset: 10,
      requestId: 'req_1',
    });

    expect(addJob).toHaveBeenCalledWith('feed-events', 'item-shown', {
      userId: 'user_1',
      sessionId: 'session_1',
      itemIds: ['a', 'b'],
      offset: 10,
      requestId: 'req_1',
      at: expect.any(String),
    });
  });

  it('should enqueue item-consumed events', async () => {
    await analyticsService.itemConsumed({ userId: 'user_1', sessionId: null, itemId: 'a', action: 'save' });

    expect(addJob).toHaveBeenCalledWith('feed-events', 'item-consumed', {
      userId: 'user_1',
      sessionId: null,
      itemId: 'a',
      action: 'save',
      at: expect.any(String),
    });
  });

  it('should surface enqueue failures to the caller', async () => {
    vi.mocked(addJob).mockRejectedValueOnce(new Error('Redis down'));

    await expect(
      analyticsService.itemConsumed({ userId: 'user_1', sessionId: null, itemId: 'a', action: 'play' }),
    ).rejects.toThrow('Redis down');
  });
});
