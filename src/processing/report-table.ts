import * as cheerio from 'cheerio';
import type { TableCell, TableRow } from '../core/types.js';

/**
 * Reads the tagged report table (`<table class="report">`) of a filing
 * page into plain rows and cells, so the metadata and body extractors
 * work on data rather than on the DOM.
 */

const REPORT_TABLE = 'table.report';

export function hasReportTable(markup: string): boolean {
  return cheerio.load(markup)(REPORT_TABLE).length > 0;
}

/**
 * Split an HTML fragment into its text segments: one segment per text
 * run between tags, whitespace-stripped, empty runs dropped.
 */
export function textSegments(html: string): string[] {
  const piped = html.replace(/<[^>]*>/g, '|');
  const text = cheerio.load(piped, null, false).root().text();
  return text
    .split('|')
    .map(s => s.replace(/\u00a0/g, ' ').trim())
    .filter(s => s !== '');
}

function parseColspan(raw: string | undefined): number {
  if (raw === undefined) return 1;
  const n = parseInt(raw, 10);
  return Number.isFinite(n) && n > 0 ? n : 1;
}

/** Rows of the first report table in the markup, or null when there is none */
export function readReportTable(markup: string): TableRow[] | null {
  const $ = cheerio.load(markup);
  const table = $(REPORT_TABLE).first();
  if (table.length === 0) return null;

  const rows: TableRow[] = [];
  table.find('tr').each((_, tr) => {
    const cells: TableCell[] = [];

    $(tr).find('th, td').each((_, el) => {
      const $cell = $(el);
      const classAttr = $cell.attr('class');
      const $div = $cell.find('div').first();
      const segmentSource = ($div.length > 0 ? $div.html() : $cell.html()) ?? '';

      cells.push({
        tag: el.tagName.toLowerCase() === 'th' ? 'th' : 'td',
        classes: classAttr === undefined ? null : classAttr.split(/\s+/).filter(Boolean),
        colspan: parseColspan($cell.attr('colspan')),
        text: $cell.text().replace(/\u00a0/g, ' ').trim(),
        segments: textSegments(segmentSource),
        onclick: $cell.find('a').first().attr('onclick') ?? null,
      });
    });

    rows.push({ cells });
  });

  return rows;
}
