import { MetadataParsingError } from '../core/errors.js';
import type { StatementMetadata, TableCell, TableRow } from '../core/types.js';
import { parsePeriodMonths, parseStatementDate } from './statement-dates.js';

/**
 * Reads dates, period lengths and the unit hint from the first two rows
 * of a report table.
 *
 * Row 1: title cell (class "tl") holding "title|unit hint", then one
 * header cell per column: "12 Months Ended" for period statements, the
 * date itself for snapshot statements (balance sheets).
 * Row 2: per-column dates (period statements).
 *
 * A title cell spanning more than one column visually swallows part of the
 * first data column, so its excess span is added to the first header of
 * each row.
 */

interface HeaderEntry {
  text: string;
  repeat: number;
}

const SNAPSHOT_TITLES = [/balance/i, /statements?\s+of\s+financial\s+position/i];

export function isSnapshotTitle(title: string): boolean {
  return SNAPSHOT_TITLES.some(pattern => pattern.test(title));
}

/** Extra columns a title cell covers beyond its own */
export function titleRepeatOf(colspan: number): number {
  return colspan > 1 ? colspan - 1 : 0;
}

function hasClass(cell: TableCell, name: string): boolean {
  return cell.classes !== null && cell.classes.includes(name);
}

function headerCells(row: TableRow | undefined): TableCell[] {
  return row ? row.cells.filter(c => c.tag === 'th') : [];
}

function expand<T>(entries: HeaderEntry[], map: (text: string) => T): T[] {
  const out: T[] = [];
  for (const entry of entries) {
    for (let i = 0; i < entry.repeat; i++) out.push(map(entry.text));
  }
  return out;
}

export function extractStatementMetadata(rows: TableRow[]): StatementMetadata {
  let title = '';
  let unitText: string | null = null;
  let isSnapshot = false;
  let titleRepeat = 0;

  const columnHeaders: HeaderEntry[] = [];
  const dateHeaders: HeaderEntry[] = [];

  for (const [index, cell] of headerCells(rows[0]).entries()) {
    if (hasClass(cell, 'tl')) {
      titleRepeat = titleRepeatOf(cell.colspan);
      // e.g. ["CONSOLIDATED STATEMENTS OF INCOME - USD ($)", "shares in Thousands, $ in Millions"]
      unitText = cell.segments[1] ?? null;
      title = (unitText ? cell.text.replace(unitText, '') : cell.text).trim();
      isSnapshot = isSnapshotTitle(title);
    } else if (hasClass(cell, 'th')) {
      // index 1: the first header after the title
      const repeat = cell.colspan + (index === 1 ? titleRepeat : 0);
      columnHeaders.push({ text: cell.text, repeat });
    }
  }

  for (const [index, cell] of headerCells(rows[1]).entries()) {
    if (!hasClass(cell, 'th')) continue;
    // index 0: the title cell spans both rows, so the first date comes first here
    const repeat = cell.colspan + (index === 0 ? titleRepeat : 0);
    dateHeaders.push({ text: cell.text, repeat });
  }

  let months: Array<number | null>;
  let dateTexts: string[];

  if (isSnapshot) {
    months = expand(columnHeaders, () => null);
    const datesInFirstRow = columnHeaders.some(h => h.text !== '');
    dateTexts = expand(datesInFirstRow ? columnHeaders : dateHeaders, t => t);
  } else {
    months = expand(columnHeaders, text => {
      const parsed = parsePeriodMonths(text);
      if (parsed === null) {
        throw new MetadataParsingError(`Could not read a period length from "${text}"`);
      }
      return parsed;
    });
    dateTexts = expand(dateHeaders, t => t);
  }

  if (dateTexts.length !== months.length) {
    throw new MetadataParsingError(
      `Potential parsing bug: ${dateTexts.length} dates != ${months.length} period lengths`,
      dateTexts,
      months
    );
  }

  const dates = dateTexts.map(text => {
    const date = parseStatementDate(text);
    if (!date) {
      throw new MetadataParsingError(`Could not parse column date "${text}"`, dateTexts, months);
    }
    return date;
  });

  return { title, unitText, isSnapshot, dates, months };
}
