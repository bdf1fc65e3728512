import { debug, resolveSink, warn } from '../core/diagnostics.js';
import { FinancialElement, FinancialInfo } from '../core/model.js';
import type { ExtractionOptions, StatementMetadata, TableCell, TableRow } from '../core/types.js';
import { parseDefinitionReference } from './definition-reference.js';
import { normalizeValue } from './value-normalizer.js';

/**
 * Walks the data rows of a report table and fills one FinancialInfo per
 * column.
 *
 * Cell classes:
 * - "pl": the row label; its anchor carries the concept reference
 * - "nump" / "num": numeric cells
 * - "text": numeric only after a numeric cell in the same row, which is how
 *   sparsely reported facts show up
 *
 * Cells without a class attribute are separators and are skipped.
 */

function hasAnyClass(cell: TableCell, names: string[]): boolean {
  const classes = cell.classes;
  return classes !== null && names.some(n => classes.includes(n));
}

export function extractStatementBody(
  rows: TableRow[],
  metadata: StatementMetadata,
  options: ExtractionOptions = {}
): FinancialInfo[] {
  const sink = resolveSink(options);
  const periods = metadata.dates.map((date, i) => new FinancialInfo(date, metadata.months[i]));

  for (const [rowNum, row] of rows.entries()) {
    const dataCells = row.cells.filter(c => c.tag === 'td');

    let concept: string | null = null;
    let label = '';
    let numericDataAvailable = false;

    for (const [index, cell] of dataCells.entries()) {
      if (cell.classes === null) continue;

      let isValueCell = false;
      if (hasAnyClass(cell, ['pl'])) {
        concept = parseDefinitionReference(cell.onclick);
        label = cell.text;
      } else if (hasAnyClass(cell, ['nump', 'num'])) {
        numericDataAvailable = true;
        isValueCell = true;
      } else if (hasAnyClass(cell, ['text'])) {
        isValueCell = numericDataAvailable;
      }

      if (!isValueCell || cell.text === '') continue;

      if (concept === null) {
        debug(sink, 'Value in a row without a concept reference, ignoring', { row: rowNum, label, text: cell.text });
        continue;
      }

      // Column 0 holds the label
      const period = periods[index - 1];
      if (!period) {
        warn(sink, 'Value column has no matching period, ignoring', { row: rowNum, column: index, concept, text: cell.text });
        continue;
      }

      const value = normalizeValue(cell.text, concept, metadata.unitText, sink);
      // First seen wins: later rows for the same concept are adjustment details
      period.setIfAbsent(concept, new FinancialElement(label, value));
    }
  }

  // Colspans can leave phantom columns that never receive a value
  return periods.filter(p => p.size > 0);
}
