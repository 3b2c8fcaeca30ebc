/**
 * Report Download Endpoints
 *
 * GET /api/v1/reports/spreadsheet returns the enriched table as CSV.
 * GET /api/v1/reports/document returns the paginated report as plain text,
 * or as JSON with ?format=json.
 *
 * @tested tests/integration/api-endpoints.integration.test.ts
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { parseThresholdOverrides } from '@village-gap/shared';
import {
  SPREADSHEET_FILE_NAME,
  buildPaginatedReport,
  exportSpreadsheet,
  renderReportText,
} from '@village-gap/reporting';

import type { RouteDependencies } from './route-dependencies.js';

export const DOCUMENT_FILE_NAME = 'village_gap_report.txt';

export function createReportsRouter(deps: RouteDependencies): Router {
  const router = Router();

  const DocumentQuerySchema = z.object({
    pageSize: z.coerce.number().int().min(1).max(500).default(deps.reportPageSize),
    format: z.enum(['text', 'json']).default('text'),
  });

  router.get('/spreadsheet', (req: Request, res: Response) => {
    const thresholds = parseThresholdOverrides(req.query);
    const villages = deps.service.analyzeAll(deps.repository.list(), thresholds);

    res.type('text/csv').attachment(SPREADSHEET_FILE_NAME).send(exportSpreadsheet(villages));
  });

  router.get('/document', (req: Request, res: Response) => {
    const { pageSize, format } = DocumentQuerySchema.parse({
      pageSize: req.query.pageSize,
      format: req.query.format,
    });
    const thresholds = parseThresholdOverrides(req.query);
    const report = buildPaginatedReport(
      deps.service.analyzeAll(deps.repository.list(), thresholds),
      pageSize
    );

    if (format === 'json') {
      res.json({ thresholds, report });
      return;
    }
    res.type('text/plain').attachment(DOCUMENT_FILE_NAME).send(renderReportText(report));
  });

  return router;
}
