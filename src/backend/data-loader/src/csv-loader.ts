/**
 * Village CSV Loader
 *
 * Parses the tabular village source into validated village records.
 * Header names are trimmed. Missing or non-numeric counts become 0, missing
 * electricity hours become 0, and coordinates that cannot be parsed are left
 * out. A missing file, an empty file or a header without the required
 * columns is fatal.
 *
 * @tested tests/integration/csv-loader.integration.test.ts
 */

import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import {
  DataSourceError,
  getLogger,
  safeValidateVillageRecord,
  type Logger,
  type VillageRecord,
} from '@village-gap/shared';

/**
 * Source column names, in file order
 */
export const VillageColumn = {
  VILLAGE_ID: 'village_id',
  VILLAGE_NAME: 'village_name',
  POPULATION: 'population',
  HOUSEHOLDS: 'households',
  SCHOOLS: 'schools',
  TOILETS: 'toilets',
  PHCS: 'PHCs',
  WATER_POINTS: 'water_points',
  ELECTRICITY_HOURS: 'electricity_hours',
  LAT: 'lat',
  LON: 'lon',
} as const;

export type VillageColumn = (typeof VillageColumn)[keyof typeof VillageColumn];

export const REQUIRED_COLUMNS: readonly VillageColumn[] = Object.values(VillageColumn);

type CsvRow = Partial<Record<string, string>>;

/**
 * Parsed villages plus a count of substituted values per column
 */
export interface VillageLoadResult {
  source: string;
  villages: VillageRecord[];
  substitutions: Partial<Record<VillageColumn, number>>;
}

/**
 * Parses a numeric cell. Returns undefined for blank or non-numeric input.
 */
export function parseNumeric(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (trimmed === '') {
    return undefined;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

class RowReader {
  constructor(
    private readonly row: CsvRow,
    private readonly substitutions: Partial<Record<VillageColumn, number>>
  ) {}

  private substitute(column: VillageColumn): void {
    this.substitutions[column] = (this.substitutions[column] ?? 0) + 1;
  }

  text(column: VillageColumn): string {
    return (this.row[column] ?? '').trim();
  }

  /** Non-negative integer; anything else counts as missing and becomes 0 */
  count(column: VillageColumn): number {
    const value = parseNumeric(this.row[column]);
    if (value === undefined || value < 0) {
      this.substitute(column);
      return 0;
    }
    return Math.trunc(value);
  }

  /** Non-negative real number; anything else becomes 0 */
  hours(column: VillageColumn): number {
    const value = parseNumeric(this.row[column]);
    if (value === undefined || value < 0) {
      this.substitute(column);
      return 0;
    }
    return value;
  }

  /** Parsed coordinate as given, otherwise absent */
  coordinate(column: VillageColumn): number | undefined {
    const value = parseNumeric(this.row[column]);
    if (value === undefined) {
      this.substitute(column);
      return undefined;
    }
    return value;
  }
}

function toVillageRecord(
  row: CsvRow,
  line: number,
  source: string,
  substitutions: Partial<Record<VillageColumn, number>>
): VillageRecord {
  const reader = new RowReader(row, substitutions);

  const villageId = reader.text(VillageColumn.VILLAGE_ID);
  if (villageId === '') {
    throw new DataSourceError(`Line ${line}: village_id is missing`, source);
  }

  const record: VillageRecord = {
    villageId,
    villageName: reader.text(VillageColumn.VILLAGE_NAME),
    population: reader.count(VillageColumn.POPULATION),
    households: reader.count(VillageColumn.HOUSEHOLDS),
    schools: reader.count(VillageColumn.SCHOOLS),
    toilets: reader.count(VillageColumn.TOILETS),
    phcs: reader.count(VillageColumn.PHCS),
    waterPoints: reader.count(VillageColumn.WATER_POINTS),
    electricityHours: reader.hours(VillageColumn.ELECTRICITY_HOURS),
  };

  const latitude = reader.coordinate(VillageColumn.LAT);
  const longitude = reader.coordinate(VillageColumn.LON);
  if (latitude !== undefined) record.latitude = latitude;
  if (longitude !== undefined) record.longitude = longitude;

  const validation = safeValidateVillageRecord(record);
  if (!validation.success) {
    const fields = validation.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new DataSourceError(`Line ${line}: invalid village record (${fields})`, source);
  }

  return validation.data;
}

/**
 * Parses CSV text into village records
 *
 * @param text - Raw CSV content with a header row
 * @param source - Name used in error messages (usually the file path)
 * @throws DataSourceError when the content is empty or malformed
 */
export function parseVillageCsv(text: string, source = 'inline'): VillageLoadResult {
  if (text.trim() === '') {
    throw new DataSourceError('Village data source is empty', source);
  }

  const parsed = Papa.parse<CsvRow>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim(),
  });

  const fatal = parsed.errors.find((error) => error.code !== 'TooFewFields');
  if (fatal) {
    const line = fatal.row === undefined ? '' : ` at line ${fatal.row + 2}`;
    throw new DataSourceError(`Malformed CSV${line}: ${fatal.message}`, source);
  }

  const fields = parsed.meta.fields ?? [];
  const missingColumns = REQUIRED_COLUMNS.filter((column) => !fields.includes(column));
  if (missingColumns.length > 0) {
    throw new DataSourceError(
      `Missing required column(s): ${missingColumns.join(', ')}`,
      source
    );
  }

  const substitutions: Partial<Record<VillageColumn, number>> = {};
  const seenIds = new Set<string>();
  const villages = parsed.data.map((row, index) => {
    const line = index + 2;
    const village = toVillageRecord(row, line, source, substitutions);
    if (seenIds.has(village.villageId)) {
      throw new DataSourceError(`Line ${line}: duplicate village_id ${village.villageId}`, source);
    }
    seenIds.add(village.villageId);
    return village;
  });

  return { source, villages, substitutions };
}

/**
 * Reads and parses a village CSV file
 *
 * @throws DataSourceError when the file cannot be read or parsed
 */
export async function loadVillagesFromFile(
  filePath: string,
  logger: Logger = getLogger()
): Promise<VillageLoadResult> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new DataSourceError(`Cannot read village data file ${filePath}`, filePath, {
      cause: error,
    });
  }

  const result = parseVillageCsv(text, filePath);

  logger.info('Village data loaded', {
    source: filePath,
    villageCount: result.villages.length,
    substitutions: result.substitutions,
  });

  return result;
}
