import { getConfig } from '../core/config.js';
import { UnsupportedDocumentError } from '../core/errors.js';
import { FinancialReport, type FinancialInfo } from '../core/model.js';
import type { ExtractionOptions, ReportFormat } from '../core/types.js';
import { extractBalanceSheet, extractCashFlow, extractIncomeStatement } from './legacy-statements.js';
import { hasReportTable, readReportTable } from './report-table.js';
import { findDeclaredMonths } from './statement-dates.js';
import { extractStatementBody } from './table-body.js';
import { extractStatementMetadata } from './table-metadata.js';
import { renderLegacyText, segmentStatements } from './text-segmenter.js';

/**
 * Pipeline entry points: filing markup in, FinancialReport out.
 *
 * Modern filings carry a tagged report table (one statement per page);
 * older filings are free text holding all three statements. Every call
 * builds a fresh report and fails as a whole on a fatal parsing error,
 * so the caller either gets every period or none.
 */

export interface ReportOptions extends ExtractionOptions {
  /** Legacy period length when the cash-flow statement declares none */
  defaultMonths?: number;
}

export function detectReportFormat(markup: string): ReportFormat {
  return hasReportTable(markup) ? 'modern' : 'legacy';
}

export function processModernFinancialInfo(markup: string, options: ExtractionOptions = {}): FinancialInfo[] {
  const rows = readReportTable(markup);
  if (!rows) throw new UnsupportedDocumentError('no report table found');
  const metadata = extractStatementMetadata(rows);
  return extractStatementBody(rows, metadata, options);
}

/** Balance sheet, statement of operations, statement of cash flows, in that order */
export function processLegacyFinancialInfo(markup: string, options: ReportOptions = {}): FinancialInfo[] {
  const sections = segmentStatements(renderLegacyText(markup));
  const months = findDeclaredMonths(sections.cashFlow) ?? options.defaultMonths ?? getConfig().defaultMonths;

  return [
    extractBalanceSheet(sections.balanceSheet, options),
    extractIncomeStatement(sections.incomeStatement, months, options),
    extractCashFlow(sections.cashFlow, months, options),
  ];
}

/**
 * Returns a FinancialReport from the markup of a filing.
 *
 * @param company - identifier of the filer (a ticker or CIK, for example)
 * @param dateFiled - acceptance date of the filing
 * @param markup - the statement page (modern) or the whole filing document (legacy)
 */
export function getFinancialReport(
  company: string,
  dateFiled: Date,
  markup: string,
  options: ReportOptions = {}
): FinancialReport {
  if (markup.trim() === '') throw new UnsupportedDocumentError('document is empty');

  const periods = detectReportFormat(markup) === 'modern'
    ? processModernFinancialInfo(markup, options)
    : processLegacyFinancialInfo(markup, options);

  return new FinancialReport(company, dateFiled, periods);
}

export function getModernFinancialReport(
  company: string,
  dateFiled: Date,
  markup: string,
  options: ExtractionOptions = {}
): FinancialReport {
  return new FinancialReport(company, dateFiled, processModernFinancialInfo(markup, options));
}

export function getLegacyFinancialReport(
  company: string,
  dateFiled: Date,
  markup: string,
  options: ReportOptions = {}
): FinancialReport {
  return new FinancialReport(company, dateFiled, processLegacyFinancialInfo(markup, options));
}

/**
 * One report from several statement pages of the same filing (a modern
 * filing splits its statements across pages). Periods are appended in
 * page order.
 */
export function getFinancialReportFromStatements(
  company: string,
  dateFiled: Date,
  documents: string[],
  options: ReportOptions = {}
): FinancialReport {
  const report = new FinancialReport(company, dateFiled);
  for (const markup of documents) {
    for (const info of getFinancialReport(company, dateFiled, markup, options).periods) {
      report.addFinancialInfo(info);
    }
  }
  return report;
}
