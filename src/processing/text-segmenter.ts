import * as cheerio from 'cheerio';
import { SectionNotFoundError } from '../core/errors.js';
import type { LegacySections } from '../core/types.js';
import { isAmountToken } from './value-normalizer.js';

/**
 * Legacy filings: flatten the markup to text and cut out the three
 * statement sections.
 *
 * Anchors are matched case- and whitespace-insensitively. An all-caps
 * occurrence (the statement heading) is preferred over an earlier mixed-case
 * one, which is usually a table of contents or a cross-reference.
 */

const BLOCK_ELEMENTS = 'p, div, tr, td, th, li, h1, h2, h3, h4, h5, h6, table, pre';

export const SECTION_ANCHORS: Record<keyof LegacySections, RegExp> = {
  balanceSheet: /balance\s+sheets?/gi,
  incomeStatement: /statements?\s+of\s+operations/gi,
  cashFlow: /statements?\s+of\s+cash\s+flows?/gi,
};

const SECTION_KEYS: Array<keyof LegacySections> = ['balanceSheet', 'incomeStatement', 'cashFlow'];

const SECTION_NAMES: Record<keyof LegacySections, string> = {
  balanceSheet: 'balance sheet',
  incomeStatement: 'statement of operations',
  cashFlow: 'statement of cash flows',
};

const NOTES_BOUNDARY = /see\s+(?:the\s+)?(?:accompanying\s+)?notes/i;
/** A page number on its own line, then a line opening with an all-caps word */
const PAGE_BREAK = /\n\d+\n(?=[A-Z]{2,}\b)/;

/**
 * Flatten markup (or plain text) into one trimmed line per logical line:
 * non-breaking spaces become spaces, runs of spaces collapse, a wrapped
 * closing parenthesis rejoins its number, and a line that starts in
 * lowercase rejoins the label it continues.
 */
export function renderLegacyText(markup: string): string {
  const $ = cheerio.load(markup);
  $('script, style, head').remove();
  $('br').replaceWith('\n');
  $(BLOCK_ELEMENTS).each((_, el) => {
    $(el).append('\n');
  });
  return normalizeLegacyText($.root().text());
}

export function normalizeLegacyText(text: string): string {
  const lines = text
    .replace(/\u00a0/g, ' ')
    .replace(/[\u2018\u2019]/g, "'")
    .replace(/[\u201c\u201d]/g, '"')
    .split(/\r?\n/)
    .map(line => line.replace(/[ \t]+/g, ' ').trim())
    .filter(line => line !== '');

  const joined: string[] = [];
  for (const line of lines) {
    const prev = joined.length > 0 ? joined[joined.length - 1] : null;
    if (prev !== null && line === ')') {
      joined[joined.length - 1] = prev + ')';
    } else if (prev !== null && /^[a-z]/.test(line) && !isAmountToken(prev) && prev !== '$') {
      joined[joined.length - 1] = `${prev} ${line}`;
    } else {
      joined.push(line);
    }
  }
  return joined.join('\n');
}

function locateAnchor(text: string, pattern: RegExp): RegExpMatchArray | null {
  let first: RegExpMatchArray | null = null;
  for (const match of text.matchAll(pattern)) {
    if (match[0] === match[0].toUpperCase()) return match;
    if (!first) first = match;
  }
  return first;
}

function sectionEnd(rest: string, allowPageBreak: boolean): number {
  const notes = rest.search(NOTES_BOUNDARY);
  if (notes !== -1) return notes;
  if (allowPageBreak) {
    const pageBreak = rest.search(PAGE_BREAK);
    if (pageBreak !== -1) return pageBreak;
  }
  return rest.length;
}

/**
 * Cut the balance sheet, statement of operations and statement of cash
 * flows out of flattened filing text. Each section starts at its heading
 * and stops before the "See accompanying Notes" line.
 */
export function segmentStatements(text: string): LegacySections {
  const sections: Partial<LegacySections> = {};
  const missing: string[] = [];

  for (const key of SECTION_KEYS) {
    const anchor = locateAnchor(text, SECTION_ANCHORS[key]);
    if (!anchor || anchor.index === undefined) {
      missing.push(SECTION_NAMES[key]);
      continue;
    }

    const bodyStart = anchor.index + anchor[0].length;
    const rest = text.slice(bodyStart);
    const body = rest.slice(0, sectionEnd(rest, key === 'cashFlow'));

    if (body.trim() === '') {
      missing.push(SECTION_NAMES[key]);
      continue;
    }
    sections[key] = text.slice(anchor.index, bodyStart) + body;
  }

  if (missing.length > 0 || !sections.balanceSheet || !sections.incomeStatement || !sections.cashFlow) {
    throw new SectionNotFoundError(missing);
  }

  return {
    balanceSheet: sections.balanceSheet,
    incomeStatement: sections.incomeStatement,
    cashFlow: sections.cashFlow,
  };
}
