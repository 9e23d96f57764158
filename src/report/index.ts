/**
 * Report model: schema, flags, records, collection and loading
 */

export { Flag, FLAG_NAMES, isFlagName, parseFlagNames, type FlagName } from './flag';
export {
  defineReportSchema,
  columnIndex,
  REPORT_SCHEMA,
  REPORT_COLUMNS,
  REPORT_INT_COLUMNS,
  REPORT_FLOAT_COLUMNS,
  REPORT_VARIANT_COLUMNS,
  type ReportSchema,
  type ReportSchemaDefinition,
  type ReportSchemaKeys,
} from './schema';
export { ReportRecord, parseReportLine, formatReportLine, formatValue, type ReportValue } from './record';
export { ReportCollection, type ReportGroup } from './collection';
export { parseReport, loadReport, readReportText } from './load';
