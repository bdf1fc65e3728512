/**
 * Renders a report as CSV for spreadsheet import: one line per element.
 */

import type { FinancialReport } from '../core/model.js';
import { csvEscape, formatDate } from './format-utils.js';

export function renderCsv(report: FinancialReport): string {
  const lines: string[] = ['Company,Date_Filed,Period_Date,Months,Concept,Label,Value'];

  for (const info of report.periods) {
    for (const [concept, element] of Object.entries(info.elements)) {
      lines.push([
        csvEscape(report.company),
        formatDate(report.date_filed),
        formatDate(info.date),
        info.months === null ? '' : String(info.months),
        csvEscape(concept),
        csvEscape(element.label),
        element.value === null ? '' : String(element.value),
      ].join(','));
    }
  }

  return lines.join('\n');
}
