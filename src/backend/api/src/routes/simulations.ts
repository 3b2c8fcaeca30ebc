/**
 * Simulation Endpoint
 *
 * POST /api/v1/simulations runs a what-if upgrade on a derived copy of one
 * village. The loaded collection is never modified.
 *
 * @tested tests/integration/api-endpoints.integration.test.ts
 */

import { Router, type Request, type Response } from 'express';
import { SimulationRequestSchema, parseThresholdOverrides } from '@village-gap/shared';

import type { RouteDependencies } from './route-dependencies.js';

export function createSimulationsRouter(deps: RouteDependencies): Router {
  const router = Router();

  router.post('/', (req: Request, res: Response) => {
    const { villageId, kind, amount } = SimulationRequestSchema.parse(req.body);
    const thresholds = parseThresholdOverrides(req.query);
    const village = deps.repository.getById(villageId);

    const result = deps.service.simulate(village, { kind, amount }, thresholds);
    res.status(200).json({ thresholds, ...result });
  });

  return router;
}
