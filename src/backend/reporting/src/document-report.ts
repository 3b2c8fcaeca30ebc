/**
 * Document Report
 *
 * Paginated gap report listing every village by priority score (highest
 * first) with its gaps and suggested improvements, plus the short "focus
 * area" suggestions shown for the top-priority villages.
 *
 * @tested tests/integration/reporting.integration.test.ts
 */

import type { EnrichedVillage } from '@village-gap/shared';
import { sortByPriority } from '@village-gap/gap-analysis-service';

export const REPORT_TITLE = 'Village Gap Report';

export const DEFAULT_REPORT_PAGE_SIZE = 20;

export interface ReportEntry {
  villageId: string;
  heading: string;
  gapsLine: string;
  improvementLine: string;
}

export interface ReportPage {
  pageNumber: number;
  entries: ReportEntry[];
}

export interface PaginatedReport {
  title: string;
  totalEntries: number;
  pages: ReportPage[];
}

export function toReportEntry(village: EnrichedVillage): ReportEntry {
  return {
    villageId: village.villageId,
    heading: `${village.villageName} (Score: ${village.priorityScore})`,
    gapsLine: `Gaps: ${village.gapsSummary}`,
    improvementLine: `Suggested Improvement: ${village.improvementsSummary}`,
  };
}

/**
 * Builds the report pages. An empty collection yields a single empty page.
 *
 * @throws RangeError when pageSize is not a positive integer
 */
export function buildPaginatedReport(
  villages: readonly EnrichedVillage[],
  pageSize: number = DEFAULT_REPORT_PAGE_SIZE
): PaginatedReport {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }

  const entries = sortByPriority(villages).map(toReportEntry);
  const pages: ReportPage[] = [];
  for (let start = 0; start < entries.length; start += pageSize) {
    pages.push({ pageNumber: pages.length + 1, entries: entries.slice(start, start + pageSize) });
  }
  if (pages.length === 0) {
    pages.push({ pageNumber: 1, entries: [] });
  }

  return { title: REPORT_TITLE, totalEntries: entries.length, pages };
}

/**
 * Renders a report as plain text. Pages are separated by a form feed.
 */
export function renderReportText(report: PaginatedReport): string {
  const totalPages = report.pages.length;

  return report.pages
    .map((page) => {
      const lines: string[] = [];
      if (page.pageNumber === 1) {
        lines.push(report.title, '');
      }
      for (const entry of page.entries) {
        lines.push(entry.heading, entry.gapsLine, entry.improvementLine, '');
      }
      lines.push(`Page ${page.pageNumber} of ${totalPages}`);
      return lines.join('\n');
    })
    .join('\n\f\n');
}

/**
 * One suggestion line per village, e.g. for the top-priority list
 */
export function suggestFocusAreas(villages: readonly EnrichedVillage[]): string[] {
  return villages.map((village) =>
    village.gaps.length > 0
      ? `${village.villageName} (Score: ${village.priorityScore}) requires: ${village.improvementsSummary}`
      : `${village.villageName} has no major gaps based on current thresholds.`
  );
}
