/**
 * CSV Loader
 *
 * Reads OHLCV bars from CSV files. Columns are found by header name or
 * by index, timestamps may be unix seconds, unix milliseconds or ISO
 * strings, and every row is validated against BarSchema.
 */

import * as fs from 'fs';
import * as path from 'path';
import { BarSchema, createSilentLogger, type Bar, type Logger } from '@candlelab/shared';

export type TimestampFormat = 'unix_s' | 'unix_ms' | 'iso';

/**
 * CSV parsing options
 */
export interface CSVLoadOptions {
  /** Column name or index for timestamp (default: 'timestamp') */
  timestampColumn?: string | number;
  openColumn?: string | number;
  highColumn?: string | number;
  lowColumn?: string | number;
  closeColumn?: string | number;
  volumeColumn?: string | number;
  /** Delimiter (default: ',') */
  delimiter?: string;
  /** Has header row (default: true) */
  hasHeader?: boolean;
  /** Timestamp format (default: 'unix_s') */
  timestampFormat?: TimestampFormat;
  /** Skip rows with invalid data instead of throwing (default: true) */
  skipInvalid?: boolean;
  logger?: Logger;
}

type ResolvedOptions = Required<Omit<CSVLoadOptions, 'logger'>>;

const DEFAULT_OPTIONS: ResolvedOptions = {
  timestampColumn: 'timestamp',
  openColumn: 'open',
  highColumn: 'high',
  lowColumn: 'low',
  closeColumn: 'close',
  volumeColumn: 'volume',
  delimiter: ',',
  hasHeader: true,
  timestampFormat: 'unix_s',
  skipInvalid: true,
};

/**
 * Parse a CSV line handling quoted values
 */
function parseCSVLine(line: string, delimiter: string): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === delimiter && !inQuotes) {
      result.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  result.push(current.trim());
  return result;
}

/**
 * Get column index from header or use numeric index
 */
function getColumnIndex(column: string | number, headers: readonly string[]): number {
  if (typeof column === 'number') {
    if (column < 0 || column >= headers.length) {
      throw new Error(`Column index ${column} out of range (${headers.length} columns)`);
    }
    return column;
  }

  const index = headers.findIndex((h) => h.toLowerCase() === column.toLowerCase());
  if (index === -1) {
    throw new Error(`Column "${column}" not found in headers: ${headers.join(', ')}`);
  }
  return index;
}

/** Date and time with no zone designator */
const ZONELESS_ISO = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

/**
 * Parse a timestamp into unix seconds. NaN when unparseable.
 * ISO values without a zone are read as UTC.
 */
export function parseTimestamp(value: string, format: TimestampFormat): number {
  switch (format) {
    case 'unix_s':
      return value.length > 0 ? Math.floor(Number(value)) : NaN;
    case 'unix_ms':
      return value.length > 0 ? Math.floor(Number(value) / 1000) : NaN;
    case 'iso': {
      const zoneless = ZONELESS_ISO.exec(value);
      const normalized = zoneless ? `${zoneless[1]}T${zoneless[2]}Z` : value;
      return Math.floor(new Date(normalized).getTime() / 1000);
    }
  }
}

function resolvePath(filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);
}

function readLines(absolutePath: string): string[] {
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`CSV file not found: ${absolutePath}`);
  }
  const content = fs.readFileSync(absolutePath, 'utf-8');
  return content.split(/\r?\n/).filter((line) => line.trim().length > 0);
}

function parseNumber(value: string | undefined): number {
  return value === undefined || value.length === 0 ? NaN : Number(value);
}

/**
 * Load bars from a CSV file, sorted by timestamp
 */
export function loadBarsFromCSV(filePath: string, options: CSVLoadOptions = {}): Bar[] {
  const { logger = createSilentLogger('csv-loader'), ...rest } = options;
  const opts: ResolvedOptions = { ...DEFAULT_OPTIONS, ...rest };

  const absolutePath = resolvePath(filePath);
  const lines = readLines(absolutePath);
  const [firstLine] = lines;
  if (firstLine === undefined) {
    throw new Error(`CSV file is empty: ${absolutePath}`);
  }

  const firstRow = parseCSVLine(firstLine, opts.delimiter);
  const headers = opts.hasHeader ? firstRow : firstRow.map((_, i) => i.toString());
  const dataStartIndex = opts.hasHeader ? 1 : 0;

  const tsIdx = getColumnIndex(opts.timestampColumn, headers);
  const openIdx = getColumnIndex(opts.openColumn, headers);
  const highIdx = getColumnIndex(opts.highColumn, headers);
  const lowIdx = getColumnIndex(opts.lowColumn, headers);
  const closeIdx = getColumnIndex(opts.closeColumn, headers);
  const volumeIdx = getColumnIndex(opts.volumeColumn, headers);

  const bars: Bar[] = [];
  let skipped = 0;

  for (let i = dataStartIndex; i < lines.length; i++) {
    const values = parseCSVLine(lines[i] ?? '', opts.delimiter);
    const tsValue = values[tsIdx] ?? '';

    const parsed = BarSchema.safeParse({
      timestamp: parseTimestamp(tsValue, opts.timestampFormat),
      open: parseNumber(values[openIdx]),
      high: parseNumber(values[highIdx]),
      low: parseNumber(values[lowIdx]),
      close: parseNumber(values[closeIdx]),
      volume: parseNumber(values[volumeIdx]),
    });

    if (!parsed.success) {
      if (opts.skipInvalid) {
        skipped++;
        continue;
      }
      const issue = parsed.error.issues[0];
      throw new Error(`Invalid row on line ${i + 1}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown'}`);
    }

    bars.push(parsed.data);
  }

  if (skipped > 0) {
    logger.warn('Skipped invalid rows while loading CSV', { file: absolutePath, skipped });
  }

  bars.sort((a, b) => a.timestamp - b.timestamp);
  logger.debug('Loaded bars from CSV', { file: absolutePath, bars: bars.length });

  return bars;
}

/**
 * Header and row count of a CSV file without parsing the rows
 */
export function getCSVInfo(
  filePath: string,
  options: Pick<CSVLoadOptions, 'delimiter' | 'hasHeader'> = {}
): { rowCount: number; headers: string[]; sampleRow: string[] } {
  const delimiter = options.delimiter ?? ',';
  const hasHeader = options.hasHeader ?? true;
  const lines = readLines(resolvePath(filePath));

  const [first, second] = lines;
  const headers = hasHeader && first !== undefined ? parseCSVLine(first, delimiter) : [];
  const sampleLine = hasHeader ? second : first;

  return {
    rowCount: hasHeader ? Math.max(lines.length - 1, 0) : lines.length,
    headers,
    sampleRow: sampleLine === undefined ? [] : parseCSVLine(sampleLine, delimiter),
  };
}

/**
 * Guess column names and timestamp format from the header and first row
 */
export function detectCSVFormat(filePath: string): CSVLoadOptions {
  const info = getCSVInfo(filePath);
  const lowerHeaders = info.headers.map((h) => h.toLowerCase());
  const options: CSVLoadOptions = {};

  const find = (variants: readonly string[]): string | undefined => {
    for (const variant of variants) {
      const idx = lowerHeaders.indexOf(variant);
      if (idx !== -1) return info.headers[idx];
    }
    return undefined;
  };

  const timestampColumn = find(['timestamp', 'time', 'date', 'datetime', 'epoch']);
  if (timestampColumn !== undefined) options.timestampColumn = timestampColumn;

  const openColumn = find(['open', 'o', 'open_price']);
  if (openColumn !== undefined) options.openColumn = openColumn;
  const highColumn = find(['high', 'h', 'high_price']);
  if (highColumn !== undefined) options.highColumn = highColumn;
  const lowColumn = find(['low', 'l', 'low_price']);
  if (lowColumn !== undefined) options.lowColumn = lowColumn;
  const closeColumn = find(['close', 'c', 'close_price']);
  if (closeColumn !== undefined) options.closeColumn = closeColumn;
  const volumeColumn = find(['volume', 'v', 'vol']);
  if (volumeColumn !== undefined) options.volumeColumn = volumeColumn;

  const tsIdx = timestampColumn === undefined ? 0 : info.headers.indexOf(timestampColumn);
  const tsValue = info.sampleRow[tsIdx];
  if (tsValue) {
    if (tsValue.includes('T') || tsValue.includes('-')) {
      options.timestampFormat = 'iso';
    } else if (tsValue.length > 10) {
      options.timestampFormat = 'unix_ms';
    } else {
      options.timestampFormat = 'unix_s';
    }
  }

  return options;
}

/**
 * Load with auto-detected columns and timestamp format
 */
export function quickLoadCSV(filePath: string, logger?: Logger): Bar[] {
  const detected = detectCSVFormat(filePath);
  return loadBarsFromCSV(filePath, logger ? { ...detected, logger } : detected);
}
