import { describe, it, expect } from 'vitest';
import {
  CASH_FLOW_RULES,
  INCOME_STATEMENT_RULES,
  STATEMENT_RULES,
  canonicalKey,
  cleanLabel,
  closesParent,
  isRelevant,
  isSectionHeader,
  scaleOverrideFor,
} from '../src/processing/statement-rules.js';

describe('statement rule tables', () => {
  it('covers the three statements in order', () => {
    expect(STATEMENT_RULES.map(r => r.kind)).toEqual(['balance_sheet', 'income_statement', 'cash_flow']);
  });

  it('section headers end with a colon', () => {
    for (const rules of STATEMENT_RULES) {
      for (const header of rules.section_headers) {
        expect(header.endsWith(':')).toBe(true);
      }
    }
  });
});

describe('label lookups', () => {
  it('cleans footnote markers and trailing colons', () => {
    expect(cleanLabel('Net income (1)')).toBe('Net income');
    expect(cleanLabel('Earnings per share:')).toBe('Earnings per share');
  });

  it('matches relevant items by prefix', () => {
    expect(isRelevant(CASH_FLOW_RULES, 'Cash and cash equivalents, beginning of the year')).toBe(true);
    expect(isRelevant(CASH_FLOW_RULES, 'Net income')).toBe(false);
    expect(isRelevant(CASH_FLOW_RULES, 'Cash used in financing activities')).toBe(true);
    expect(isRelevant(CASH_FLOW_RULES, 'Cash generated by (used in) financing activities')).toBe(true);
  });

  it('matches section headers regardless of case', () => {
    expect(isSectionHeader(CASH_FLOW_RULES, 'OPERATING ACTIVITIES:')).toBe(true);
    expect(isSectionHeader(CASH_FLOW_RULES, 'Adjustments to reconcile net income:')).toBe(false);
  });

  it('closes a sub-section at its total', () => {
    expect(closesParent(CASH_FLOW_RULES, 'Cash used in investing activities')).toBe(true);
    expect(closesParent(CASH_FLOW_RULES, 'Cash used for repurchase of common stock')).toBe(false);
  });

  it('resolves aliases to canonical keys', () => {
    expect(canonicalKey(CASH_FLOW_RULES, 'Share-based compensation expense')).toBe('Stock-based compensation expense');
    expect(canonicalKey(CASH_FLOW_RULES, 'Depreciation and amortization')).toBe('Depreciation and amortization');
  });

  it('applies dividend overrides before per-share block overrides', () => {
    expect(scaleOverrideFor(INCOME_STATEMENT_RULES, 'Cash dividends declared per common share', true)).toBe('none');
    expect(scaleOverrideFor(INCOME_STATEMENT_RULES, 'Earnings per share', true)).toBe('thousands');
    expect(scaleOverrideFor(INCOME_STATEMENT_RULES, 'Earnings per share', false)).toBeNull();
  });
});
