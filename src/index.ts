#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'node:fs';
import { ExtractionError } from './core/errors.js';
import type { FinancialReport } from './core/model.js';
import {
  getFinancialReport,
  getFinancialReportFromStatements,
  getLegacyFinancialReport,
  getModernFinancialReport,
} from './processing/financial-report.js';
import { renderCsv } from './output/csv-renderer.js';
import { renderJson } from './output/json-renderer.js';
import { renderTable } from './output/table-renderer.js';

interface ExtractOptions {
  company: string;
  filed?: string;
  json?: boolean;
  csv?: boolean;
  legacy?: boolean;
  modern?: boolean;
}

function parseFiledDate(value: string | undefined): Date {
  if (!value) {
    const now = new Date();
    return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
  }
  const date = new Date(`${value}T00:00:00Z`);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || isNaN(date.getTime())) {
    throw new Error(`Invalid filing date "${value}" (expected YYYY-MM-DD)`);
  }
  return date;
}

function extract(files: string[], options: ExtractOptions): FinancialReport {
  const dateFiled = parseFiledDate(options.filed);
  const documents = files.map(f => readFileSync(f, 'utf8'));

  if (options.legacy) {
    return getLegacyFinancialReport(options.company, dateFiled, documents.join('\n'));
  }
  if (options.modern) {
    const report = getModernFinancialReport(options.company, dateFiled, documents[0]);
    for (const markup of documents.slice(1)) {
      for (const info of getModernFinancialReport(options.company, dateFiled, markup).periods) {
        report.addFinancialInfo(info);
      }
    }
    return report;
  }
  return documents.length === 1
    ? getFinancialReport(options.company, dateFiled, documents[0])
    : getFinancialReportFromStatements(options.company, dateFiled, documents);
}

const program = new Command();

program
  .name('filing-statements')
  .description('Extract balance sheet, income statement and cash flow data from filing documents')
  .version('0.1.0');

program
  .command('extract')
  .alias('x')
  .description('Extract financial statements from one filing (one file per statement page for tagged filings)')
  .argument('<files...>', 'Filing document(s): a tagged statement page (R file) or a full legacy filing')
  .requiredOption('-c, --company <id>', 'Company identifier (ticker, CIK...)')
  .option('-f, --filed <date>', 'Filing date, YYYY-MM-DD (default: today)')
  .option('-j, --json', 'Output as JSON instead of table')
  .option('--csv', 'Output as CSV')
  .option('--legacy', 'Force the free-text extraction path')
  .option('--modern', 'Force the report-table extraction path')
  .action((files: string[], options: ExtractOptions) => {
    try {
      const report = extract(files, options);

      if (report.periods.length === 0) {
        console.error(chalk.yellow('No periods with data were found.'));
      }

      if (options.json) {
        console.log(renderJson(report));
      } else if (options.csv) {
        console.log(renderCsv(report));
      } else {
        console.log('');
        console.log(renderTable(report));
        console.log('');
      }
    } catch (err) {
      const prefix = err instanceof ExtractionError ? `${err.name}: ` : 'Error: ';
      console.error(chalk.red(`${prefix}${err instanceof Error ? err.message : String(err)}`));
      process.exit(1);
    }
  });

program.parse();
