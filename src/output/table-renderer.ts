import chalk from 'chalk';
import type { FinancialInfo, FinancialReport } from '../core/model.js';
import { formatDate, formatPeriod, padRight } from './format-utils.js';

/**
 * Renders a report as terminal tables, one per period, in report order.
 */

export function renderTable(report: FinancialReport): string {
  const lines: string[] = [];

  const header = `${report.company} — filed ${formatDate(report.date_filed)} (${report.periods.length} periods)`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));

  for (const info of report.periods) {
    lines.push('');
    lines.push(...renderPeriod(info));
  }

  return lines.join('\n');
}

function renderPeriod(info: FinancialInfo): string[] {
  const lines: string[] = [];
  const entries = Object.entries(info.elements);

  lines.push(chalk.bold(`  ${formatDate(info.date)} (${formatPeriod(info.months)})`));
  if (entries.length === 0) {
    lines.push(chalk.dim('  No elements'));
    return lines;
  }

  const conceptWidth = Math.max(10, ...entries.map(([concept]) => concept.length + 2));
  lines.push(`  ${chalk.underline(padRight('Concept', conceptWidth))}${chalk.underline('Value')}`);

  for (const [concept, element] of entries) {
    const value = element.value === null ? chalk.dim('n/a') : formatValue(concept, element.value);
    lines.push(`  ${padRight(concept, conceptWidth)}${value}`);
    if (element.label !== concept) {
      lines.push(chalk.dim(`  ${padRight('', conceptWidth)}${element.label}`));
    }
  }

  return lines;
}

/** Per-share amounts as plain decimals, share counts without "$" */
export function formatValue(concept: string, value: number): string {
  if (concept.includes('PerShare')) return value.toFixed(2);
  if (concept.includes('Shares')) return formatShareCount(value);
  return formatCurrency(value);
}

export function formatShareCount(value: number): string {
  const abs = Math.abs(value);
  const sign = value < 0 ? '-' : '';
  if (abs >= 1e9) return `${sign}${(abs / 1e9).toFixed(2)}B`;
  if (abs >= 1e6) return `${sign}${(abs / 1e6).toFixed(2)}M`;
  if (abs >= 1e3) return `${sign}${(abs / 1e3).toFixed(1)}K`;
  return `${sign}${abs.toLocaleString('en-US')}`;
}

export function formatCurrency(value: number): string {
  const abs = Math.abs(value);
  const sign = value < 0 ? '-' : '';

  if (abs >= 1e12) return `${sign}$${(abs / 1e12).toFixed(2)}T`;
  if (abs >= 1e9) return `${sign}$${(abs / 1e9).toFixed(2)}B`;
  if (abs >= 1e6) return `${sign}$${(abs / 1e6).toFixed(2)}M`;
  if (abs >= 1e3) return `${sign}$${(abs / 1e3).toFixed(2)}K`;
  return `${sign}$${abs.toFixed(0)}`;
}
