import { describe, it, expect, vi } from 'vitest';
import { UserContextHydrator, AccountSeenHydrator } from '../../src/pipeline/hydrators.js';
import { createMockCandidate, createMockContext, createMockQuery } from './types.test.js';
import { InMemoryDedupStore } from '../helpers/fakes.js';
import { DedupStoreUnavailableError } from '../../src/utils/errors.js';

describe('Pipeline Hydrators', () => {
  describe('UserContextHydrator', () => {
    it('should only run when the context is not loaded yet', () => {
      const hydrator = new UserContextHydrator({ load: vi.fn() });

      expect(hydrator.enable(createMockQuery())).toBe(false);
      expect(hydrator.enable(createMockQuery({ contextLoaded: false }))).toBe(true);
    });

    it('should load the context for the query user', async () => {
      const context = createMockContext({ genres: new Set(['drama']) });
      const load = vi.fn().mockResolvedValue(context);
      const hydrator = new UserContextHydrator({ load });

      const result = await hydrator.hydrate(createMockQuery({ contextLoaded: false }));

      expect(load).toHaveBeenCalledWith('user_1');
      expect(result).toEqual({ context, contextLoaded: true });
    });
  });

  describe('AccountSeenHydrator', () => {
    it('should flag ids from the account filter and the seen history', async () => {
      const dedup = new InMemoryDedupStore();
      dedup.accounts.set('user_1', new Set(['a']));
      const hydrator = new AccountSeenHydrator(dedup);
      const query = createMockQuery({ context: createMockContext({ seenIds: new Set(['c']) }) });

      const result = await hydrator.hydrate(query, [
        createMockCandidate({ id: 'a' }),
        createMockCandidate({ id: 'b' }),
        createMockCandidate({ id: 'c' }),
      ]);

      expect(result.map((c) => c.probablySeen)).toEqual([true, false, true]);
    });

    it('should propagate store failures', async () => {
      const dedup = new InMemoryDedupStore();
      dedup.unavailable = true;
      const hydrator = new AccountSeenHydrator(dedup);

      await expect(hydrator.hydrate(createMockQuery(), [createMockCandidate()])).rejects.toBeInstanceOf(
        DedupStoreUnavailableError,
      );
    });
  });
});
