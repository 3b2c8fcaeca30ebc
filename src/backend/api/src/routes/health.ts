/**
 * Health Check Endpoints
 *
 * Liveness, readiness and dependency health for container probes. The only
 * dependency is the loaded village dataset.
 *
 * @tested tests/integration/api-endpoints.integration.test.ts
 */

import { Router, type Request, type Response } from 'express';
import type { VillageRepository } from '@village-gap/data-loader';

/**
 * Health status enumeration
 */
export const HealthStatus = {
  HEALTHY: 'healthy',
  UNHEALTHY: 'unhealthy',
  DEGRADED: 'degraded',
} as const;

export type HealthStatus = (typeof HealthStatus)[keyof typeof HealthStatus];

/**
 * Dependency health check result
 */
export interface DependencyHealth {
  name: string;
  status: HealthStatus;
  message?: string;
  lastChecked: string;
}

/**
 * Overall health check response
 */
export interface HealthCheckResponse {
  status: HealthStatus;
  version: string;
  timestamp: string;
  uptime: number;
  dependencies: DependencyHealth[];
}

export interface HealthCheckConfig {
  version: string;
  startTime: Date;
  repository: VillageRepository;
}

/**
 * Checks the loaded dataset. An empty dataset still serves requests but
 * every result is empty, so it reports degraded.
 */
export function checkVillageData(repository: VillageRepository): DependencyHealth {
  const count = repository.list().length;
  return {
    name: 'village-data',
    status: count > 0 ? HealthStatus.HEALTHY : HealthStatus.DEGRADED,
    message: `${count} villages loaded`,
    lastChecked: new Date().toISOString(),
  };
}

/**
 * Creates the health router (mounted at the root, no /api prefix)
 */
export function createHealthRouter(config: HealthCheckConfig): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    const dataset = checkVillageData(config.repository);
    const response: HealthCheckResponse = {
      status: dataset.status,
      version: config.version,
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - config.startTime.getTime()) / 1000),
      dependencies: [dataset],
    };
    res.json(response);
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const dataset = checkVillageData(config.repository);
    const ready = dataset.status === HealthStatus.HEALTHY;
    res.status(ready ? 200 : 503).json({
      ready,
      timestamp: new Date().toISOString(),
      checks: { villageData: ready },
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.json({
      alive: true,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
