import { describe, it, expect } from 'vitest';
import { PipelineStage } from '../../src/pipeline/types.js';
import type { PlanQuery, PlanCandidate } from '../../src/pipeline/types.js';
import { emptyContext } from '../../src/services/context.service.js';
import type { UserContext } from '../../src/types/index.js';

describe('Pipeline Types', () => {
  describe('PipelineStage enum', () => {
    it('should define all pipeline stages', () => {
      expect(PipelineStage.QueryHydrator).toBe('QueryHydrator');
      expect(PipelineStage.Source).toBe('Source');
      expect(PipelineStage.Hydrator).toBe('Hydrator');
      expect(PipelineStage.Filter).toBe('Filter');
      expect(PipelineStage.Scorer).toBe('Scorer');
      expect(PipelineStage.Selector).toBe('Selector');
      expect(PipelineStage.PostSelectionFilter).toBe('PostSelectionFilter');
      expect(PipelineStage.SideEffect).toBe('SideEffect');
    });

    it('should have 8 pipeline stages', () => {
      expect(Object.keys(PipelineStage)).toHaveLength(8);
    });
  });

  describe('mock factories', () => {
    it('should build a query with a loaded empty context', () => {
      const query = createMockQuery();

      expect(query.contextLoaded).toBe(true);
      expect(query.context.userId).toBe(query.userId);
      expect(query.targetSize).toBe(10);
    });

    it('should start candidates with the index score as final score', () => {
      const candidate = createMockCandidate({ score: 42 });

      expect(candidate.finalScore).toBe(42);
      expect(candidate.probablySeen).toBe(false);
    });
  });
});

// --- Test helpers for use in other test files ---

export function createMockContext(overrides: Partial<UserContext> = {}): UserContext {
  return { ...emptyContext('user_1'), ...overrides };
}

export function createMockQuery(overrides: Partial<PlanQuery> = {}): PlanQuery {
  return {
    requestId: 'test_req_123',
    sessionId: 'session_1',
    userId: 'user_1',
    pageSize: 5,
    variant: 'for_you',
    targetSize: 10,
    epoch: 1,
    sessionSeenIds: new Set(),
    context: createMockContext(),
    contextLoaded: true,
    ...overrides,
  };
}

export function createMockCandidate(overrides: Partial<PlanCandidate> = {}): PlanCandidate {
  const score = overrides.score ?? 50;
  return {
    id: 'item_1',
    bucket: 'trending',
    origin: 'trending',
    score,
    updatedAt: '2026-01-01T00:00:00.000Z',
    tags: [],
    probablySeen: false,
    finalScore: score,
    toppedUp: false,
    ...overrides,
  };
}
