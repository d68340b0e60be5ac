/**
 * Pipeline side effects — async operations after selection that must not
 * block the plan.
 */

import type { SideEffect } from './interfaces.js';
import type { PlanQuery, PlanCandidate } from './types.js';
import { logger } from '../utils/logger.js';

/**
 * PlanMetricsLogSideEffect — logs the bucket mix of a generated plan.
 */
export class PlanMetricsLogSideEffect implements SideEffect<PlanQuery, PlanCandidate> {
  name = 'PlanMetricsLogSideEffect';

  enable(): boolean {
    return true;
  }

  async run(query: PlanQuery, selectedCandidates: PlanCandidate[]): Promise<void> {
    const bucketBreakdown: Record<string, number> = {};
    const originBreakdown: Record<string, number> = {};
    for (const c of selectedCandidates) {
      bucketBreakdown[c.bucket] = (bucketBreakdown[c.bucket] || 0) + 1;
      originBreakdown[c.origin] = (originBreakdown[c.origin] || 0) + 1;
    }

    logger.info(
      {
        requestId: query.requestId,
        sessionId: query.sessionId,
        epoch: query.epoch,
        totalSelected: selectedCandidates.length,
        targetSize: query.targetSize,
        bucketBreakdown,
        originBreakdown,
        probablySeen: selectedCandidates.filter((c) => c.probablySeen).length,
      },
      'Pipeline: plan metrics',
    );
  }
}
