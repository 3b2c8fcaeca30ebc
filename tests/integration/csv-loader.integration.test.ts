/**
 * CSV Loader Integration Tests
 *
 * Loads the fixture dataset from disk and checks cleaning, substitution and
 * fatal source errors.
 *
 * @file src/backend/data-loader/src/csv-loader.ts
 * @file src/backend/data-loader/src/village-repository.ts
 */

import { fileURLToPath } from 'node:url';
import { beforeEach, describe, expect, it } from 'vitest';

import {
  InMemoryVillageRepository,
  loadVillagesFromFile,
  parseNumeric,
  parseVillageCsv,
} from '../../src/backend/data-loader/src/index.js';
import {
  DataSourceError,
  Logger,
  VillageNotFoundError,
} from '../../src/backend/shared/src/index.js';

const FIXTURE_PATH = fileURLToPath(new URL('../fixtures/villages.csv', import.meta.url));

const HEADER =
  'village_id,village_name,population,households,schools,toilets,PHCs,water_points,electricity_hours,lat,lon';

describe('CSV Loader Integration Tests', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger({ enableConsole: false });
  });

  describe('loadVillagesFromFile', () => {
    it('should load every row in source order with trimmed headers', async () => {
      const result = await loadVillagesFromFile(FIXTURE_PATH, logger);

      expect(result.source).toBe(FIXTURE_PATH);
      expect(result.villages.map((village) => village.villageId)).toEqual([
        'V001',
        'V002',
        'V003',
        'V004',
        'V005',
      ]);
      expect(result.villages[1].villageName).toBe('Bela Khurd');
    });

    it('should parse a complete row into a typed record', async () => {
      const { villages } = await loadVillagesFromFile(FIXTURE_PATH, logger);

      expect(villages[0]).toEqual({
        villageId: 'V001',
        villageName: 'Amberpur',
        population: 1000,
        households: 100,
        schools: 0,
        toilets: 0,
        phcs: 0,
        waterPoints: 0,
        electricityHours: 0,
        latitude: 25.1,
        longitude: 80.2,
      });
    });

    it('should substitute missing and non-numeric values', async () => {
      const { villages, substitutions } = await loadVillagesFromFile(FIXTURE_PATH, logger);
      const dhanora = villages[3];

      expect(dhanora.schools).toBe(0);
      expect(dhanora.electricityHours).toBe(0);
      expect(dhanora.latitude).toBe(24.9);
      expect(dhanora).not.toHaveProperty('longitude');
      expect(villages[2]).not.toHaveProperty('latitude');
      expect(villages[2].longitude).toBe(81);
      expect(substitutions).toEqual({
        schools: 1,
        electricity_hours: 1,
        lat: 1,
        lon: 1,
      });
    });

    it('should log the load with its counts', async () => {
      await loadVillagesFromFile(FIXTURE_PATH, logger);

      const [entry] = logger.getLogEntries();
      expect(entry.message).toBe('Village data loaded');
      expect(entry.metadata).toEqual({
        source: FIXTURE_PATH,
        villageCount: 5,
        substitutions: { schools: 1, electricity_hours: 1, lat: 1, lon: 1 },
      });
    });

    it('should fail with a DataSourceError when the file is missing', async () => {
      const missing = fileURLToPath(new URL('../fixtures/no-such-file.csv', import.meta.url));

      await expect(loadVillagesFromFile(missing, logger)).rejects.toThrow(DataSourceError);
      await expect(loadVillagesFromFile(missing, logger)).rejects.toThrow(
        `Cannot read village data file ${missing}`
      );
      expect(logger.getLogEntries()).toHaveLength(0);
    });
  });

  describe('parseVillageCsv', () => {
    it('should reject empty content', () => {
      expect(() => parseVillageCsv('  \n')).toThrow('Village data source is empty');
    });

    it('should name every missing required column', () => {
      expect(() => parseVillageCsv('village_id,village_name,population\nV1,A,10')).toThrow(
        'Missing required column(s): households, schools, toilets, PHCs, water_points, electricity_hours, lat, lon'
      );
    });

    it('should accept a header-only file as an empty collection', () => {
      expect(parseVillageCsv(HEADER)).toEqual({ source: 'inline', villages: [], substitutions: {} });
    });

    it('should reject duplicate village ids', () => {
      const csv = [HEADER, 'V1,A,10,2,1,2,1,1,24,,', 'V1,B,10,2,1,2,1,1,24,,'].join('\n');

      expect(() => parseVillageCsv(csv, 'dupes.csv')).toThrow('Line 3: duplicate village_id V1');
    });

    it('should reject a row without a village id', () => {
      const csv = [HEADER, ',Nameless,10,2,1,2,1,1,24,,'].join('\n');

      expect(() => parseVillageCsv(csv)).toThrow('Line 2: village_id is missing');
    });

    it('should treat negative counts as missing and truncate fractional counts', () => {
      const csv = [HEADER, 'V1,A,1000.9,-5,1,2,1,1,12.5,,x'].join('\n');

      const { villages, substitutions } = parseVillageCsv(csv);

      expect(villages[0]).toEqual({
        villageId: 'V1',
        villageName: 'A',
        population: 1000,
        households: 0,
        schools: 1,
        toilets: 2,
        phcs: 1,
        waterPoints: 1,
        electricityHours: 12.5,
      });
      expect(substitutions).toEqual({ households: 1, lat: 1, lon: 1 });
    });

    it('should pass parseable coordinates through unchanged', () => {
      const csv = [HEADER, 'V1,A,10,2,1,2,1,1,24,95,-181.5'].join('\n');

      const { villages, substitutions } = parseVillageCsv(csv);

      expect(villages[0].latitude).toBe(95);
      expect(villages[0].longitude).toBe(-181.5);
      expect(substitutions).toEqual({});
    });

    it('should load villages with long ids and names', () => {
      const villageId = `V${'9'.repeat(120)}`;
      const villageName = 'Long Village Name '.repeat(14);
      const csv = [HEADER, `${villageId},${villageName},10,2,1,2,1,1,24,25,80`].join('\n');

      const { villages } = parseVillageCsv(csv);

      expect(villages).toHaveLength(1);
      expect(villages[0].villageId).toBe(villageId);
      expect(villages[0].villageName).toBe(villageName.trim());
    });

    it('should keep quoted names containing commas', () => {
      const csv = [HEADER, 'V1,"Rampur, East",10,2,1,2,1,1,24,25,80'].join('\n');

      expect(parseVillageCsv(csv).villages[0].villageName).toBe('Rampur, East');
    });
  });

  describe('parseNumeric', () => {
    const numericCases: Array<[string | undefined, number | undefined]> = [
      ['12', 12],
      [' 7.5 ', 7.5],
      ['', undefined],
      ['abc', undefined],
      ['Infinity', undefined],
      [undefined, undefined],
    ];

    it.each(numericCases)('parses %j as %j', (input, expected) => {
      expect(parseNumeric(input)).toBe(expected);
    });
  });

  describe('InMemoryVillageRepository', () => {
    it('should look villages up by id and reject unknown ids', async () => {
      const { villages } = await loadVillagesFromFile(FIXTURE_PATH, logger);
      const repository = new InMemoryVillageRepository(villages);

      expect(repository.list()).toHaveLength(5);
      expect(repository.findById('V003')?.villageName).toBe('Chandni');
      expect(repository.findById('V999')).toBeUndefined();
      expect(() => repository.getById('V999')).toThrow(VillageNotFoundError);
      expect(() => repository.getById('V999')).toThrow('Village V999 not found');
    });

    it('should hold frozen copies of the source records', () => {
      const source = parseVillageCsv([HEADER, 'V1,A,10,2,1,2,1,1,24,,'].join('\n')).villages;
      const repository = new InMemoryVillageRepository(source);

      source[0].schools = 99;

      expect(repository.getById('V1').schools).toBe(1);
      expect(Object.isFrozen(repository.getById('V1'))).toBe(true);
      expect(Object.isFrozen(repository.list())).toBe(true);
    });
  });
});
