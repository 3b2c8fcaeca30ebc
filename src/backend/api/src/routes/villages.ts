/**
 * Village Analysis Endpoints
 *
 * Threshold overrides are read from the query string and validated here;
 * the engine itself assumes valid thresholds.
 *
 * @tested tests/integration/api-endpoints.integration.test.ts
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { parseThresholdOverrides } from '@village-gap/shared';
import { buildMapMarkers, mapCenter, suggestFocusAreas } from '@village-gap/reporting';

import type { RouteDependencies } from './route-dependencies.js';

export const MAX_TOP_LIMIT = 100;

/**
 * Creates the router mounted at /api/v1/villages
 */
export function createVillagesRouter(deps: RouteDependencies): Router {
  const router = Router();
  const { repository, service } = deps;

  const TopQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(MAX_TOP_LIMIT).default(deps.topN),
  });

  const analyze = (req: Request) => {
    const thresholds = parseThresholdOverrides(req.query);
    return { thresholds, villages: service.analyzeAll(repository.list(), thresholds) };
  };

  /**
   * GET /api/v1/villages
   *
   * Every village with its gaps, score, tier and improvements
   */
  router.get('/', (req: Request, res: Response) => {
    const { thresholds, villages } = analyze(req);
    res.json({ thresholds, summary: service.summarize(villages), villages });
  });

  /**
   * GET /api/v1/villages/top
   *
   * Top-N priority villages, ties in source order
   */
  router.get('/top', (req: Request, res: Response) => {
    const { limit } = TopQuerySchema.parse({ limit: req.query.limit });
    const { thresholds, villages } = analyze(req);
    const top = service.topPriority(villages, limit);
    res.json({ thresholds, limit, villages: top, suggestions: suggestFocusAreas(top) });
  });

  /**
   * GET /api/v1/villages/gap-distribution
   *
   * Number of villages exhibiting each gap category
   */
  router.get('/gap-distribution', (req: Request, res: Response) => {
    const { thresholds, villages } = analyze(req);
    res.json({ thresholds, distribution: service.gapDistribution(villages) });
  });

  /**
   * GET /api/v1/villages/map-markers
   *
   * Marker data for villages with coordinates
   */
  router.get('/map-markers', (req: Request, res: Response) => {
    const { thresholds, villages } = analyze(req);
    const markers = buildMapMarkers(villages);
    res.json({ thresholds, center: mapCenter(markers), markers });
  });

  /**
   * GET /api/v1/villages/:villageId
   */
  router.get('/:villageId', (req: Request, res: Response) => {
    const thresholds = parseThresholdOverrides(req.query);
    const village = repository.getById(req.params.villageId);
    res.json({ thresholds, village: service.analyzeOne(village, thresholds) });
  });

  return router;
}
