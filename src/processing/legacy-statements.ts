import { debug, resolveSink, warn } from '../core/diagnostics.js';
import { StatementParseError } from '../core/errors.js';
import { FinancialElement, FinancialInfo } from '../core/model.js';
import type { DiagnosticSink, ExtractionOptions, LineToken } from '../core/types.js';
import { LineCursor, looksLikeLabel, tokenizeSection } from './line-tokens.js';
import { findStatementDates } from './statement-dates.js';
import {
  BALANCE_SHEET_RULES,
  CASH_FLOW_RULES,
  INCOME_STATEMENT_RULES,
  canonicalKey,
  cleanLabel,
  closesParent,
  isExcluded,
  isRelevant,
  isSectionHeader,
  scaleOverrideFor,
  type StatementRules,
} from './statement-rules.js';
import { SCALE_MULTIPLIERS, parseLegacyAmount, parseScale, type Scale } from './value-normalizer.js';

/**
 * Legacy statement extraction: a cursor walk over the classified lines of
 * one statement section, driven by that statement's rule table.
 *
 * Layout assumed (one line each): the label, then one value per reporting
 * date. Per-share disclosures come as a "Label:" line followed by
 * "Basic" and "Diluted" sub-lines, each with its own values.
 */

const UNIT_PATTERN = /\bIn\s+([A-Za-z]+)/;
const END_MARKER = /^See\s+(?:accompanying\s+)?Notes?\b/i;

interface ScanState {
  /** Sub-section currently open, null once a sub-section total closed it */
  currentParent: string | null;
  /** Most recent sub-section header, kept after it closes */
  lastParent: string | null;
}

/**
 * Key under which a cash-flow item is stored.
 *
 * The parent is only prefixed while no sub-section is open, i.e. for items
 * that follow a sub-section total. This reproduces the behaviour the
 * statement keys were first published with; whether it was meant the other
 * way round is an open question (DESIGN.md), so it is kept exactly.
 */
export function keyForItem(rules: StatementRules, key: string, state: ScanState): string {
  if (!rules.compose_with_parent) return key;
  if (state.currentParent === null && state.lastParent !== null) {
    return `${state.lastParent} - ${key}`;
  }
  return key;
}

interface SectionLayout {
  tokens: LineToken[];
  start: number;
  end: number;
  dates: Date[];
  scale: Scale;
}

function layoutSection(section: string, rules: StatementRules): SectionLayout {
  const tokens = tokenizeSection(section);

  const start = tokens.findIndex(t => t.kind !== 'value' && t.text.startsWith(rules.first_item));
  if (start === -1) {
    throw new StatementParseError(
      `Could not find the first line item "${rules.first_item}"`,
      rules.display_name
    );
  }

  const endOffset = tokens.slice(start + 1).findIndex(t => t.kind !== 'value' && END_MARKER.test(t.text));
  const end = endOffset === -1 ? tokens.length : start + 1 + endOffset;

  const header = tokens.slice(0, start).map(t => t.text).join('\n');
  const dates = findStatementDates(header);
  if (dates.length === 0) {
    throw new StatementParseError('No reporting date found in the statement header', rules.display_name);
  }

  return { tokens, start, end, dates, scale: parseScale(section.match(UNIT_PATTERN)?.[1]) };
}

function storeValue(
  info: FinancialInfo,
  key: string,
  label: string,
  raw: string,
  scale: Scale,
  sink: DiagnosticSink
): void {
  const value = parseLegacyAmount(raw, SCALE_MULTIPLIERS[scale]);
  if (value === null) {
    warn(sink, 'Value is not numeric, ignoring', { label, text: raw });
  }
  info.setIfAbsent(key, new FinancialElement(label, value));
}

/**
 * Extract one statement section into a FinancialInfo for its primary
 * (first listed) date.
 */
export function extractLegacyStatement(
  section: string,
  rules: StatementRules,
  months: number | null,
  options: ExtractionOptions = {}
): FinancialInfo {
  const sink = resolveSink(options);
  const layout = layoutSection(section, rules);
  const columns = layout.dates.length;
  const info = new FinancialInfo(layout.dates[0], months);
  const cursor = new LineCursor(layout.tokens, layout.start, layout.end);
  const state: ScanState = { currentParent: null, lastParent: null };

  const readItem = (token: LineToken): void => {
    const label = cleanLabel(token.text);

    if (rules.per_share_blocks && cursor.acceptLabel('Basic')) {
      const basic = cursor.takeValues(columns);
      const diluted = cursor.acceptLabel('Diluted') ? cursor.takeValues(columns) : [];
      const scale = scaleOverrideFor(rules, label, true) ?? layout.scale;
      if (basic.length > 0) storeValue(info, label, token.text, basic[0], scale, sink);
      if (diluted.length > 0) storeValue(info, `${label} Diluted`, token.text, diluted[0], scale, sink);
      return;
    }

    const values = cursor.takeValues(columns);
    if (values.length === 0) {
      debug(sink, 'Line item has no values beneath it, skipping', { statement: rules.kind, label: token.text });
      return;
    }
    if (values.length < columns) {
      debug(sink, 'Line item has fewer values than reporting dates', {
        statement: rules.kind,
        label: token.text,
        expected: columns,
        found: values.length,
      });
    }

    const key = keyForItem(rules, canonicalKey(rules, label), state);
    const scale = scaleOverrideFor(rules, label, false) ?? layout.scale;
    storeValue(info, key, token.text, values[0], scale, sink);
  };

  for (let token = cursor.next(); token; token = cursor.next()) {
    // Values not claimed by a relevant label belong to lines we skip
    if (token.kind === 'value') continue;

    if (token.kind === 'header') {
      if (!isSectionHeader(rules, token.text)) continue;
      state.currentParent = cleanLabel(token.text);
      state.lastParent = state.currentParent;
      if (isRelevant(rules, token.text)) readItem(token);
      continue;
    }

    if (!looksLikeLabel(token.text) || isExcluded(rules, token.text)) continue;
    if (isRelevant(rules, token.text)) readItem(token);
    if (closesParent(rules, token.text)) state.currentParent = null;
  }

  for (const [key, value] of Object.entries(rules.defaults)) {
    info.setIfAbsent(key, new FinancialElement(key, value));
  }

  for (const derivation of rules.derivations) {
    const value = derivation.compute(key => info.valueFor(key));
    if (value !== null) info.setIfAbsent(derivation.key, new FinancialElement(derivation.key, value));
  }

  return info;
}

export function extractBalanceSheet(section: string, options: ExtractionOptions = {}): FinancialInfo {
  // Snapshot statement: no period length
  return extractLegacyStatement(section, BALANCE_SHEET_RULES, null, options);
}

export function extractIncomeStatement(section: string, months: number, options: ExtractionOptions = {}): FinancialInfo {
  return extractLegacyStatement(section, INCOME_STATEMENT_RULES, months, options);
}

export function extractCashFlow(section: string, months: number, options: ExtractionOptions = {}): FinancialInfo {
  return extractLegacyStatement(section, CASH_FLOW_RULES, months, options);
}
