/**
 * Comparison Endpoint
 *
 * POST /api/v1/comparisons compares two distinct villages side by side.
 * Comparing a village with itself is rejected before any evaluation runs.
 *
 * @tested tests/integration/api-endpoints.integration.test.ts
 */

import { Router, type Request, type Response } from 'express';
import {
  ComparisonError,
  ComparisonRequestSchema,
  parseThresholdOverrides,
} from '@village-gap/shared';
import { compareVillages } from '@village-gap/reporting';

import type { RouteDependencies } from './route-dependencies.js';

export function createComparisonsRouter(deps: RouteDependencies): Router {
  const router = Router();

  router.post('/', (req: Request, res: Response) => {
    const { firstVillageId, secondVillageId } = ComparisonRequestSchema.parse(req.body);
    if (firstVillageId === secondVillageId) {
      throw new ComparisonError('Please select two different villages for comparison.');
    }

    const thresholds = parseThresholdOverrides(req.query);
    const first = deps.service.analyzeOne(deps.repository.getById(firstVillageId), thresholds);
    const second = deps.service.analyzeOne(deps.repository.getById(secondVillageId), thresholds);

    res.json({ thresholds, comparison: compareVillages(first, second) });
  });

  return router;
}
