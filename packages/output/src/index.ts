/**
 * Output module - serializes canonical transaction records as CSV, JSON or Excel.
 */

export { collectColumns, groupRecords, DEFAULT_GROUP, type RecordGroup } from './grouping.js';

export {
  exportCsv,
  exportCsvByGroup,
  type CsvExportOptions,
  type GroupedCsvOptions,
  type GroupedCsvResult,
} from './csv-exporter.js';

export { exportJson } from './json-exporter.js';

export {
  buildWorkbook,
  exportXlsx,
  sheetName,
  DEFAULT_SHEET,
  type XlsxExportOptions,
} from './xlsx-exporter.js';
