export { FinancialElement, FinancialInfo, FinancialReport } from './core/model.js';
export {
  ExtractionError,
  MetadataParsingError,
  SectionNotFoundError,
  StatementParseError,
  UnsupportedDocumentError,
} from './core/errors.js';
export type {
  Diagnostic,
  DiagnosticLevel,
  DiagnosticSink,
  ExtractionOptions,
  ReportFormat,
  StatementKind,
} from './core/types.js';
export { loadConfig, getConfig, type AppConfig, type LogLevel } from './core/config.js';
export { createConsoleSink, formatDiagnostic } from './core/diagnostics.js';
export {
  detectReportFormat,
  getFinancialReport,
  getFinancialReportFromStatements,
  getLegacyFinancialReport,
  getModernFinancialReport,
  processLegacyFinancialInfo,
  processModernFinancialInfo,
  type ReportOptions,
} from './processing/financial-report.js';
export { parseDefinitionReference } from './processing/definition-reference.js';
export { normalizeValue } from './processing/value-normalizer.js';
export {
  BALANCE_SHEET_RULES,
  CASH_FLOW_RULES,
  INCOME_STATEMENT_RULES,
  STATEMENT_RULES,
  type StatementRules,
} from './processing/statement-rules.js';
export { serializeReport } from './output/serialization.js';
export { renderJson } from './output/json-renderer.js';
export { renderCsv } from './output/csv-renderer.js';
export { renderTable } from './output/table-renderer.js';
