/**
 * Spreadsheet Export
 *
 * Serialises the full enriched table as CSV, using the source column names
 * followed by the derived columns.
 *
 * @tested tests/integration/reporting.integration.test.ts
 */

import Papa from 'papaparse';
import type { EnrichedVillage } from '@village-gap/shared';

export const SPREADSHEET_COLUMNS = [
  'village_id',
  'village_name',
  'population',
  'households',
  'schools',
  'toilets',
  'PHCs',
  'water_points',
  'electricity_hours',
  'lat',
  'lon',
  'gaps',
  'priority_score',
  'priority_color',
  'improvements',
] as const;

export const SPREADSHEET_FILE_NAME = 'village_gap_report.csv';

type SpreadsheetCell = string | number;

function toRow(village: EnrichedVillage): SpreadsheetCell[] {
  return [
    village.villageId,
    village.villageName,
    village.population,
    village.households,
    village.schools,
    village.toilets,
    village.phcs,
    village.waterPoints,
    village.electricityHours,
    village.latitude ?? '',
    village.longitude ?? '',
    village.gapsSummary,
    village.priorityScore,
    village.priorityTier,
    village.improvementsSummary,
  ];
}

/**
 * Exports enriched villages as CSV text (header row included, input order)
 *
 * Text cells starting with `=`, `+`, `-` or `@` are prefixed with a quote so
 * spreadsheet applications treat them as text.
 */
export function exportSpreadsheet(villages: readonly EnrichedVillage[]): string {
  return Papa.unparse(
    {
      fields: [...SPREADSHEET_COLUMNS],
      data: villages.map(toRow),
    },
    { newline: '\n', escapeFormulae: true }
  );
}
