import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  describeError,
  errorCode,
  formatCacheStatus,
  formatError,
  formatStationTable,
  printError,
  resolveFormat,
} from '../../src/utils/output.js';
import { InvalidFilterInputError, SourceUnavailableError } from '../../src/lib/errors.js';

describe('Output', () => {
  describe('resolveFormat', () => {
    it('should default to json', () => {
      expect(resolveFormat('table')).toBe('table');
      expect(resolveFormat('csv')).toBe('json');
      expect(resolveFormat(undefined)).toBe('json');
    });
  });

  describe('errors', () => {
    it('should read error codes', () => {
      expect(errorCode(new InvalidFilterInputError('bad', 'lat'))).toBe('INVALID_FILTER_INPUT');
      expect(errorCode(new Error('plain'))).toBe('UNKNOWN_ERROR');
      expect(errorCode('text')).toBe('UNKNOWN_ERROR');
    });

    it('should follow the cause chain', () => {
      const error = new SourceUnavailableError('無法讀取氣象站目錄', 'stations/lite.json.gz', new Error('HTTP 404'));
      expect(describeError(error)).toBe('無法讀取氣象站目錄：HTTP 404');
    });

    it('should format errors as JSON', () => {
      const error = new SourceUnavailableError('offline', 'stations/lite.json.gz');
      expect(JSON.parse(formatError(error, 'json'))).toEqual({
        success: false,
        error: { code: 'SOURCE_UNAVAILABLE', message: 'offline' },
      });
    });

    it('should format errors as text', () => {
      expect(formatError(new Error('boom'), 'table')).toBe('錯誤：boom');
    });

    describe('printError', () => {
      afterEach(() => {
        vi.restoreAllMocks();
      });

      it('should print JSON errors to stdout', () => {
        const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

        printError(new Error('boom'), 'json');

        expect(logSpy).toHaveBeenCalledWith('{"success":false,"error":{"code":"UNKNOWN_ERROR","message":"boom"}}');
        expect(errorSpy).not.toHaveBeenCalled();
      });

      it('should print text errors to stderr', () => {
        const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

        printError(new Error('boom'), 'table');

        expect(errorSpy).toHaveBeenCalledWith('錯誤：boom');
        expect(logSpy).not.toHaveBeenCalled();
      });
    });
  });

  describe('formatStationTable', () => {
    it('should report an empty result', () => {
      expect(formatStationTable([], ['id'])).toBe('沒有符合條件的站點');
    });

    it('should render rows with distance in kilometres', () => {
      const output = formatStationTable(
        [
          { id: '10637', name: 'Frankfurt Airport', elevation: 111, distance: 5559.7 },
          { id: '10866', name: 'Munich City', elevation: null, distance: 304120 },
        ],
        ['id', 'name', 'elevation', 'distance']
      );

      expect(output).toContain('Frankfurt Airport');
      expect(output).toContain('5.6 km');
      expect(output).toContain('304.1 km');
      expect(output).toContain('--');
      expect(output.endsWith('\n\n共 2 個站點')).toBe(true);
    });

    it('should round coordinates to four decimals', () => {
      const output = formatStationTable([{ id: 'x', latitude: 50.123456 }], ['id', 'latitude']);
      expect(output).toContain('50.1235');
    });
  });

  describe('formatCacheStatus', () => {
    it('should show directory, file count and size', () => {
      const output = formatCacheStatus({ cacheDir: '/tmp/wx-cache', fileCount: 2, totalSize: 2048 });

      expect(output).toContain('/tmp/wx-cache');
      expect(output).toContain('2KB');
    });
  });
});
