/**
 * Data loading
 */

export {
  loadBarsFromCSV,
  getCSVInfo,
  detectCSVFormat,
  quickLoadCSV,
  parseTimestamp,
  type CSVLoadOptions,
  type TimestampFormat,
} from './csv-loader.js';
