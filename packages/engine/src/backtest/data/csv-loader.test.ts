/**
 * CSV Loader Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { detectCSVFormat, getCSVInfo, loadBarsFromCSV, parseTimestamp } from './csv-loader.js';

describe('CSV Loader', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'candlelab-csv-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeCSV(name: string, lines: string[]): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, `${lines.join('\n')}\n`);
    return file;
  }

  // ===========================================================================
  // LOADING
  // ===========================================================================

  describe('loadBarsFromCSV', () => {
    it('should load and sort bars by timestamp', () => {
      const file = writeCSV('bars.csv', [
        'timestamp,open,high,low,close,volume',
        '1704068100,101,103,100,102,7',
        '1704067200,100,102,99,101,5',
      ]);

      expect(loadBarsFromCSV(file)).toEqual([
        { timestamp: 1704067200, open: 100, high: 102, low: 99, close: 101, volume: 5 },
        { timestamp: 1704068100, open: 101, high: 103, low: 100, close: 102, volume: 7 },
      ]);
    });

    it('should match header names case-insensitively and in any order', () => {
      const file = writeCSV('reordered.csv', [
        'Volume,Close,Low,High,Open,Timestamp',
        '5,101,99,102,100,1704067200',
      ]);

      expect(loadBarsFromCSV(file)).toEqual([
        { timestamp: 1704067200, open: 100, high: 102, low: 99, close: 101, volume: 5 },
      ]);
    });

    it('should read columns by index without a header', () => {
      const file = writeCSV('noheader.csv', ['1704067200;100;102;99;101;5']);

      const bars = loadBarsFromCSV(file, {
        hasHeader: false,
        delimiter: ';',
        timestampColumn: 0,
        openColumn: 1,
        highColumn: 2,
        lowColumn: 3,
        closeColumn: 4,
        volumeColumn: 5,
      });

      expect(bars).toHaveLength(1);
      expect(bars[0]?.close).toBe(101);
    });

    it('should convert millisecond and ISO timestamps to seconds', () => {
      const ms = writeCSV('ms.csv', ['timestamp,open,high,low,close,volume', '1704067200500,100,102,99,101,5']);
      const iso = writeCSV('iso.csv', [
        'timestamp,open,high,low,close,volume',
        '2024-01-01T00:15:00Z,100,102,99,101,5',
      ]);

      expect(loadBarsFromCSV(ms, { timestampFormat: 'unix_ms' })[0]?.timestamp).toBe(1704067200);
      expect(loadBarsFromCSV(iso, { timestampFormat: 'iso' })[0]?.timestamp).toBe(1704068100);
    });

    it('should load zoneless ISO timestamps as UTC', () => {
      const file = writeCSV('iso-local.csv', [
        'timestamp,open,high,low,close,volume',
        '2024-01-01 00:15:00,100,102,99,101,5',
      ]);

      expect(loadBarsFromCSV(file, { timestampFormat: 'iso' })[0]?.timestamp).toBe(1704068100);
    });

    it('should skip rows that fail validation by default', () => {
      const file = writeCSV('dirty.csv', [
        'timestamp,open,high,low,close,volume',
        '1704067200,100,102,99,101,5',
        '1704068100,abc,102,99,101,5',
        '1704069000,100,98,99,101,5',
        '1704069900,100,102,99,101,-1',
        '1704070800,100,102,99,101,5',
      ]);

      expect(loadBarsFromCSV(file).map((b) => b.timestamp)).toEqual([1704067200, 1704070800]);
    });

    it('should throw on invalid rows when skipping is off', () => {
      const file = writeCSV('strict.csv', ['timestamp,open,high,low,close,volume', '1704067200,100,98,99,101,5']);

      expect(() => loadBarsFromCSV(file, { skipInvalid: false })).toThrow('Invalid row on line 2');
    });

    it('should report missing files and columns', () => {
      const file = writeCSV('novolume.csv', ['timestamp,open,high,low,close', '1704067200,100,102,99,101']);

      expect(() => loadBarsFromCSV(path.join(dir, 'missing.csv'))).toThrow('CSV file not found');
      expect(() => loadBarsFromCSV(file)).toThrow('Column "volume" not found');
    });

    it('should reject an empty file', () => {
      const file = path.join(dir, 'empty.csv');
      fs.writeFileSync(file, '\n');

      expect(() => loadBarsFromCSV(file)).toThrow('CSV file is empty');
    });
  });

  // ===========================================================================
  // DETECTION
  // ===========================================================================

  describe('detectCSVFormat', () => {
    it('should detect columns and a millisecond timestamp', () => {
      const file = writeCSV('detect.csv', ['time,o,h,l,c,vol', '1704067200000,100,102,99,101,5']);

      expect(detectCSVFormat(file)).toEqual({
        timestampColumn: 'time',
        openColumn: 'o',
        highColumn: 'h',
        lowColumn: 'l',
        closeColumn: 'c',
        volumeColumn: 'vol',
        timestampFormat: 'unix_ms',
      });
    });

    it('should detect ISO dates', () => {
      const file = writeCSV('dates.csv', ['date,open,high,low,close,volume', '2024-01-01,100,102,99,101,5']);
      expect(detectCSVFormat(file).timestampFormat).toBe('iso');
    });

    it('should describe the file', () => {
      const file = writeCSV('info.csv', ['timestamp,open,high,low,close,volume', '1,2,3,1,2,4', '2,2,3,1,2,4']);

      expect(getCSVInfo(file)).toEqual({
        rowCount: 2,
        headers: ['timestamp', 'open', 'high', 'low', 'close', 'volume'],
        sampleRow: ['1', '2', '3', '1', '2', '4'],
      });
    });
  });

  describe('parseTimestamp', () => {
    it('should return NaN for unparseable values', () => {
      expect(parseTimestamp('', 'unix_s')).toBeNaN();
      expect(parseTimestamp('not-a-date', 'iso')).toBeNaN();
    });

    it('should read ISO values without a zone as UTC', () => {
      expect(parseTimestamp('2024-01-01 00:15:00', 'iso')).toBe(1704068100);
      expect(parseTimestamp('2024-01-01T00:15:00', 'iso')).toBe(1704068100);
      expect(parseTimestamp('2024-01-01 00:15', 'iso')).toBe(1704068100);
      expect(parseTimestamp('2024-01-01', 'iso')).toBe(1704067200);
    });

    it('should honor an explicit offset', () => {
      expect(parseTimestamp('2024-01-01T01:15:00+01:00', 'iso')).toBe(1704068100);
      expect(parseTimestamp('2024-01-01T00:15:00.000Z', 'iso')).toBe(1704068100);
    });
  });
});
