/**
 * Dependencies handed to every API router
 */

import type { Logger } from '@village-gap/shared';
import type { VillageRepository } from '@village-gap/data-loader';
import type { VillageAnalysisService } from '@village-gap/gap-analysis-service';

export interface RouteDependencies {
  repository: VillageRepository;
  service: VillageAnalysisService;
  logger: Logger;
  topN: number;
  reportPageSize: number;
}
