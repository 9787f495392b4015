import { describe, it, expect, vi } from 'vitest';
import { StationSelection, serializeRow } from '../../src/lib/station-selection.js';
import { InvalidFilterInputError, SourceUnavailableError } from '../../src/lib/errors.js';
import { createSelectionConfig } from '../../src/services/config.js';
import { loggers } from '../../src/lib/logger.js';
import type { UnitMap } from '../../src/types/station.js';
import { createTestTable, ids, station, utc } from '../helpers/stations.js';

const config = createSelectionConfig({ maxAgeSeconds: 0, cacheDir: '/tmp/wx-stations-unused' });

describe('StationSelection', () => {
  const table = createTestTable();

  describe('fromTable', () => {
    it('should select everything without filters', () => {
      const selection = StationSelection.fromTable(table, {}, config);
      expect(selection.count()).toBe(7);
    });

    it('should apply filters in order and sort by distance last', () => {
      const selection = StationSelection.fromTable(
        table,
        { country: 'DE', lat: 50.1, lon: 8.7 },
        config
      );
      const rows = selection.fetch();

      expect(ids(rows)).toEqual(['10637', '10866', '10384']);
      expect(rows.every((row) => row.distance !== undefined)).toBe(true);
    });

    it('should match uid-only filtering when wmo is also given', () => {
      const both = StationSelection.fromTable(table, { uid: '03772', wmo: '10637' }, config);
      const uidOnly = StationSelection.fromTable(table, { uid: '03772' }, config);
      expect(both.fetch()).toEqual(uidOnly.fetch());
    });

    it('should combine bounds, radius and inventory', () => {
      const selection = StationSelection.fromTable(
        table,
        {
          bounds: [60, 20, 40, -5],
          lat: 51.5,
          lon: -0.1,
          radius: 1_000_000,
          inventory: { hourly: [utc('1950-01-01'), utc('2024-06-30')] },
        },
        config
      );
      expect(ids(selection.fetch())).toEqual(['03772', '10637']);
    });

    it('should use the configured max age for inventory', () => {
      const lenient = createSelectionConfig({ maxAgeSeconds: 5 * 365 * 24 * 60 * 60 });
      const query = { inventory: { hourly: utc('2024-01-01') } };

      expect(ids(StationSelection.fromTable(table, query, config).fetch())).toEqual(['10637', '03772']);
      expect(ids(StationSelection.fromTable(table, query, lenient).fetch())).toEqual([
        '10637',
        '10384',
        '03772',
      ]);
    });

    it('should return an empty selection instead of failing', () => {
      const selection = StationSelection.fromTable(table, { country: 'FR' }, config);
      expect(selection.count()).toBe(0);
      expect(selection.fetch()).toEqual([]);
    });

    it('should reject lat without lon', () => {
      expect(() => StationSelection.fromTable(table, { lat: 50 }, config)).toThrow(
        InvalidFilterInputError
      );
    });

    it('should reject radius without a point', () => {
      expect(() => StationSelection.fromTable(table, { radius: 1000 }, config)).toThrow(/radius/);
    });

    it('should be deterministic', () => {
      const query = { lat: 48, lon: 10, radius: 2_000_000 };
      const first = StationSelection.fromTable(table, query, config).fetch();
      const second = StationSelection.fromTable(table, query, config).fetch();
      expect(first).toEqual(second);
    });
  });

  describe('chained filters', () => {
    it('should return new selections', () => {
      const all = StationSelection.fromTable(table, {}, config);
      const germany = all.byRegion({ country: 'DE' });
      const bavaria = germany.byRegion({ region: 'BY' });

      expect(all.count()).toBe(7);
      expect(germany.count()).toBe(3);
      expect(ids(bavaria.fetch())).toEqual(['10866']);
    });

    it('should chain identifier, bounds and proximity', () => {
      const selection = StationSelection.fromTable(table, {}, config)
        .byIdentifier({ icao: ['EDDF', 'EDDI', 'EGLL'] })
        .byBounds([55, 15, 45, 5])
        .byProximity({ lat: 52.5, lon: 13.4 });

      expect(ids(selection.fetch())).toEqual(['10384', '10637']);
    });

    it('should apply inventory with the selection max age', () => {
      const selection = StationSelection.fromTable(table, {}, config).byInventory({ daily: true });
      expect(ids(selection.fetch())).toEqual(['10637', '10384', '10866', '03772']);
    });
  });

  describe('fetch', () => {
    const selection = StationSelection.fromTable(table, {}, config);

    it('should return the first rows with a limit', () => {
      expect(ids(selection.fetch({ limit: 2 }))).toEqual(['10637', '10384']);
    });

    it('should sample distinct rows', () => {
      const rows = selection.fetch({ limit: 4, sample: true });
      const sampledIds = ids(rows);

      expect(rows).toHaveLength(4);
      expect(new Set(sampledIds).size).toBe(4);
      for (const id of sampledIds) {
        expect(ids(selection.fetch())).toContain(id);
      }
    });

    it('should use the provided random source', () => {
      const random = vi.fn(() => 0);
      expect(ids(selection.fetch({ limit: 3, sample: true, random }))).toEqual([
        '10637',
        '10384',
        '10866',
      ]);
      expect(random).toHaveBeenCalledTimes(3);
    });

    it('should ignore sample without limit', () => {
      expect(selection.fetch({ sample: true })).toEqual(selection.fetch());
    });

    it('should return every row when the sample is larger than the selection', () => {
      expect(selection.fetch({ limit: 100, sample: true })).toHaveLength(7);
    });

    it('should reject a non-positive limit', () => {
      expect(() => selection.fetch({ limit: 0 })).toThrow(InvalidFilterInputError);
      expect(() => selection.fetch({ limit: 1.5 })).toThrow(InvalidFilterInputError);
    });

    it('should return copies that do not affect the selection', () => {
      const rows = selection.fetch();
      rows[0].name = 'changed';
      rows[0].hourlyEnd?.setUTCFullYear(1900);
      rows.pop();

      const again = selection.fetch();
      expect(again).toHaveLength(7);
      expect(again[0].name).toBe('Frankfurt Airport');
      expect(again[0].hourlyEnd).toEqual(utc('2024-06-30'));
    });
  });

  describe('convert', () => {
    const toFeet = (meters: number | null): number | null =>
      meters === null ? null : Math.round(meters * 3.28084);

    it('should transform columns into a new selection', () => {
      const selection = StationSelection.fromTable(table, { country: 'DE' }, config);
      const converted = selection.convert({ elevation: toFeet, name: (name) => name.toUpperCase() });

      expect(converted.fetch().map((row) => row.elevation)).toEqual([364, 157, 1690]);
      expect(converted.fetch()[0].name).toBe('FRANKFURT AIRPORT');
    });

    it('should leave the original selection untouched', () => {
      const selection = StationSelection.fromTable(table, { country: 'DE' }, config);
      const before = selection.fetch();

      selection.convert({ elevation: toFeet });

      expect(selection.fetch()).toEqual(before);
    });

    it('should ignore columns outside the station schema', () => {
      const selection = StationSelection.fromTable(table, { uid: '10637', lat: 50, lon: 8 }, config);
      const units: UnitMap = Object.assign({ elevation: toFeet }, { distance: () => -1, altitude: () => 0 });
      const row = selection.convert(units).fetch()[0];

      expect(row.elevation).toBe(364);
      expect(row.distance).toBe(selection.fetch()[0].distance);
      expect(row).not.toHaveProperty('altitude');
    });
  });

  describe('load', () => {
    it('should load the table through the loader', async () => {
      const loader = { loadStationTable: vi.fn().mockResolvedValue(table) };

      const selection = await StationSelection.load(
        { country: 'GB' },
        { config, loader, resourceKey: 'stations/full.json.gz' }
      );

      expect(loader.loadStationTable).toHaveBeenCalledWith('stations/full.json.gz');
      expect(ids(selection.fetch())).toEqual(['03772']);
    });

    it('should tag logs during one load with a single request id', async () => {
      const seen: (string | undefined)[] = [];
      const loader = {
        loadStationTable: vi.fn(async () => {
          seen.push(loggers.source.getCurrentRequestId(), loggers.cache.getCurrentRequestId());
          return table;
        }),
      };

      await StationSelection.load({}, { config, loader });

      expect(seen[0]).toMatch(/^[0-9a-f-]{36}$/);
      expect(seen[1]).toBe(seen[0]);
      expect(loggers.selection.getCurrentRequestId()).toBeUndefined();
    });

    it('should release the request id when loading fails', async () => {
      const loader = { loadStationTable: vi.fn().mockRejectedValue(new Error('disk full')) };

      await expect(StationSelection.load({}, { config, loader })).rejects.toBeInstanceOf(SourceUnavailableError);
      expect(loggers.selection.getCurrentRequestId()).toBeUndefined();
    });

    it('should wrap loader failures in SourceUnavailableError', async () => {
      const cause = new Error('disk full');
      const loader = { loadStationTable: vi.fn().mockRejectedValue(cause) };

      const error = await StationSelection.load({}, { config, loader }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SourceUnavailableError);
      if (error instanceof SourceUnavailableError) {
        expect(error.code).toBe('SOURCE_UNAVAILABLE');
        expect(error.cause).toBe(cause);
        expect(error.resourceKey).toBe('stations/lite.json.gz');
      }
    });

    it('should pass through SourceUnavailableError from the loader', async () => {
      const original = new SourceUnavailableError('offline', 'stations/lite.json.gz');
      const loader = { loadStationTable: vi.fn().mockRejectedValue(original) };

      await expect(StationSelection.load({}, { config, loader })).rejects.toBe(original);
    });

    it('should surface filter errors after loading', async () => {
      const loader = { loadStationTable: vi.fn().mockResolvedValue(table) };

      await expect(StationSelection.load({ lon: 1 }, { config, loader })).rejects.toBeInstanceOf(
        InvalidFilterInputError
      );
    });
  });

  describe('serialization', () => {
    it('should render dates as YYYY-MM-DD', () => {
      const row = serializeRow(
        station({ id: 'x', hourlyStart: utc('2001-02-03'), hourlyEnd: null })
      );
      expect(row.hourlyStart).toBe('2001-02-03');
      expect(row.hourlyEnd).toBeNull();
    });

    it('should serialize the whole selection with toJSON', () => {
      const selection = StationSelection.fromTable(table, { uid: '10866' }, config);
      const [row] = JSON.parse(JSON.stringify(selection));

      expect(row.id).toBe('10866');
      expect(row.dailyStart).toBe('1879-01-01');
      expect(row.hourlyStart).toBeNull();
    });
  });
});
