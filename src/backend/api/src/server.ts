/**
 * API Server
 *
 * Loads configuration and the village dataset, then starts listening.
 * A missing or malformed dataset stops the process before it serves.
 */

import type { Server } from 'node:http';
import { fileURLToPath } from 'node:url';
import { createLogger, getLogger, loadAppConfig, setLogger } from '@village-gap/shared';
import { InMemoryVillageRepository, loadVillagesFromFile } from '@village-gap/data-loader';

import { createApp } from './index.js';

/**
 * Starts the API server
 */
export async function startServer(env: NodeJS.ProcessEnv = process.env): Promise<Server> {
  const config = loadAppConfig(env);
  const logger = createLogger({ minLevel: config.logLevel });
  setLogger(logger);

  const { villages } = await loadVillagesFromFile(config.villageDataFile, logger);
  const app = createApp(
    { repository: new InMemoryVillageRepository(villages), logger },
    { enableSwagger: config.enableSwagger, topN: config.topN, reportPageSize: config.reportPageSize }
  );

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, () => {
      logger.info('Village gap analysis API listening', {
        port: config.port,
        villageCount: villages.length,
        swagger: config.enableSwagger,
      });
      resolve(server);
    });
    server.once('error', reject);
  });
}

// Start server if run directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startServer().catch((error: unknown) => {
    getLogger().error(
      'Server failed to start',
      error instanceof Error ? error : new Error(String(error))
    );
    process.exitCode = 1;
  });
}
