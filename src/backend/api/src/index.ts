/**
 * API Layer Entry Point
 *
 * Configures Express with middleware, routes and OpenAPI documentation.
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';
import { fileURLToPath } from 'node:url';
import { getLogger, type Logger } from '@village-gap/shared';
import type { VillageRepository } from '@village-gap/data-loader';
import { DEFAULT_TOP_N, VillageAnalysisService } from '@village-gap/gap-analysis-service';
import { DEFAULT_REPORT_PAGE_SIZE } from '@village-gap/reporting';

import { createHealthRouter } from './routes/health.js';
import { createVillagesRouter } from './routes/villages.js';
import { createSimulationsRouter } from './routes/simulations.js';
import { createComparisonsRouter } from './routes/comparisons.js';
import { createReportsRouter } from './routes/reports.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { requestContext } from './middleware/request-context.js';
import type { RouteDependencies } from './routes/route-dependencies.js';

export const VERSION = '1.0.0';

/**
 * API configuration
 */
export interface ApiConfig {
  enableSwagger: boolean;
  topN: number;
  reportPageSize: number;
}

/**
 * Default API configuration
 */
export const defaultApiConfig: ApiConfig = {
  enableSwagger: true,
  topN: DEFAULT_TOP_N,
  reportPageSize: DEFAULT_REPORT_PAGE_SIZE,
};

/**
 * Runtime collaborators of the app
 */
export interface AppDependencies {
  repository: VillageRepository;
  logger?: Logger;
  service?: VillageAnalysisService;
}

export const OPENAPI_SPEC_PATH = fileURLToPath(new URL('./openapi.yaml', import.meta.url));

/**
 * Creates and configures the Express application
 */
export function createApp(deps: AppDependencies, config: Partial<ApiConfig> = {}): Express {
  const fullConfig: ApiConfig = { ...defaultApiConfig, ...config };
  const logger = deps.logger ?? getLogger();
  const routeDeps: RouteDependencies = {
    repository: deps.repository,
    service: deps.service ?? new VillageAnalysisService({ logger, topN: fullConfig.topN }),
    logger,
    topN: fullConfig.topN,
    reportPageSize: fullConfig.reportPageSize,
  };

  const app = express();

  app.use(requestContext(logger));
  app.use(express.json());

  // CORS headers (configure as needed for production)
  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-Correlation-ID');
    next();
  });

  app.options('*', (_req: Request, res: Response) => {
    res.sendStatus(204);
  });

  app.use(createHealthRouter({ version: VERSION, startTime: new Date(), repository: deps.repository }));

  if (fullConfig.enableSwagger) {
    try {
      const swaggerDocument = YAML.load(OPENAPI_SPEC_PATH);
      app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerDocument));
      app.get('/api-docs.json', (_req: Request, res: Response) => {
        res.json(swaggerDocument);
      });
    } catch (error) {
      logger.warn('Failed to load OpenAPI document', {
        path: OPENAPI_SPEC_PATH,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  const apiRouter = express.Router();
  apiRouter.use('/villages', createVillagesRouter(routeDeps));
  apiRouter.use('/simulations', createSimulationsRouter(routeDeps));
  apiRouter.use('/comparisons', createComparisonsRouter(routeDeps));
  apiRouter.use('/reports', createReportsRouter(routeDeps));
  app.use('/api/v1', apiRouter);

  app.use(notFoundHandler(logger));
  app.use(errorHandler(logger));

  return app;
}

// Export routes and middleware for testing
export { createVillagesRouter } from './routes/villages.js';
export { createSimulationsRouter } from './routes/simulations.js';
export { createComparisonsRouter } from './routes/comparisons.js';
export { createReportsRouter } from './routes/reports.js';
export { createHealthRouter, checkVillageData, HealthStatus } from './routes/health.js';
export type { RouteDependencies } from './routes/route-dependencies.js';
export * from './middleware/index.js';
