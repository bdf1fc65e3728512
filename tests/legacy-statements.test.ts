import { describe, it, expect } from 'vitest';
import {
  extractBalanceSheet,
  extractCashFlow,
  extractIncomeStatement,
  keyForItem,
} from '../src/processing/legacy-statements.js';
import { BALANCE_SHEET_RULES, CASH_FLOW_RULES } from '../src/processing/statement-rules.js';
import { StatementParseError } from '../src/core/errors.js';

const quiet = { onDiagnostic: () => {} };

describe('extractIncomeStatement', () => {
  const section = [
    'STATEMENTS OF OPERATIONS',
    '(In millions, except per share amounts)',
    'September 29, 2018',
    'Net sales',
    '100',
    'Earnings per common share:',
    'Basic',
    '2.30',
    'Diluted',
    '2.26',
  ].join('\n');
  const info = extractIncomeStatement(section, 12, quiet);

  it('dates the period from the header', () => {
    expect(info.date.toISOString()).toBe('2018-09-29T00:00:00.000Z');
    expect(info.months).toBe(12);
  });

  it('scales line items by the section unit', () => {
    expect(info.valueFor('Net sales')).toBe(100_000_000);
  });

  it('expands a Basic/Diluted block into two thousands-scaled keys', () => {
    expect(info.valueFor('Earnings per common share')).toBe(2300);
    expect(info.valueFor('Earnings per common share Diluted')).toBe(2260);
    expect(info.get('Earnings per common share')?.label).toBe('Earnings per common share:');
  });

  it('fills defaults and skips derivations it cannot compute', () => {
    expect(info.valueFor('Preferred dividends')).toBe(0);
    expect(info.has('Weighted Average Shs Out')).toBe(false);
    expect(info.size).toBe(4);
  });
});

describe('extractBalanceSheet', () => {
  const section = [
    'BALANCE SHEETS',
    '(In thousands)',
    'December 31, 2019',
    'Current assets:',
    'Cash and cash equivalents',
    '$',
    '1,000',
    'Short-term investments',
    '500',
    'Accounts receivable, net',
    '—',
    'Total current assets',
    '1,500',
    'Goodwill',
    '250',
    'Total assets',
    '4,000',
    'Commitments and contingencies',
    "Shareholders' equity:",
    'Common stock, 1,000 shares issued',
    '12,000',
    'See Notes to the financial statements',
    'Total liabilities',
    '9,999',
  ].join('\n');
  const info = extractBalanceSheet(section, quiet);

  it('is a snapshot', () => {
    expect(info.months).toBeNull();
    expect(info.date.toISOString()).toBe('2019-12-31T00:00:00.000Z');
  });

  it('maps aliased labels to their canonical key', () => {
    expect(info.valueFor('Accounts receivable')).toBe(0);
    expect(info.get('Accounts receivable')?.label).toBe('Accounts receivable, net');
  });

  it('does not scale share counts', () => {
    expect(info.valueFor('Common stock')).toBe(12_000);
  });

  it('keeps reported values over defaults', () => {
    expect(info.valueFor('Goodwill')).toBe(250_000);
    expect(info.valueFor('Acquired intangible assets, net')).toBe(0);
  });

  it('adds derived elements', () => {
    expect(info.valueFor('Cash and short-term investments')).toBe(1_500_000);
    expect(info.valueFor('Goodwill and Intangible Assets')).toBe(250_000);
    expect(info.valueFor('Total non-current assets')).toBe(2_500_000);
  });

  it('stops at the notes marker', () => {
    expect(info.has('Total liabilities')).toBe(false);
  });

  it('fails without the first line item', () => {
    expect(() => extractBalanceSheet('BALANCE SHEETS\nDecember 31, 2019\nCash\n1', quiet))
      .toThrow(StatementParseError);
    expect(() => extractBalanceSheet('BALANCE SHEETS\nDecember 31, 2019\nCash\n1', quiet))
      .toThrow('Could not find the first line item "Current assets:"');
  });

  it('fails without a reporting date', () => {
    expect(() => extractBalanceSheet('BALANCE SHEETS\nCurrent assets:\nCash and cash equivalents\n1', quiet))
      .toThrow('No reporting date found in the statement header');
  });
});

describe('extractCashFlow', () => {
  const section = [
    'STATEMENTS OF CASH FLOWS',
    '(In millions)',
    'December 31, 2019',
    'Cash and cash equivalents, beginning of the year',
    '10',
    'Operating activities:',
    'Share-based compensation expense',
    '3',
    'Cash generated by operating activities',
    '20',
    'Increase in cash and cash equivalents',
    '5',
    'Cash and cash equivalents, end of the year',
    '15',
  ].join('\n');
  const info = extractCashFlow(section, 3, quiet);

  it('keys items inside an open sub-section by label', () => {
    expect(info.valueFor('Cash and cash equivalents, beginning of the year')).toBe(10_000_000);
    expect(info.valueFor('Cash generated by operating activities')).toBe(20_000_000);
  });

  it('renames share-based compensation', () => {
    expect(info.valueFor('Stock-based compensation expense')).toBe(3_000_000);
    expect(info.get('Stock-based compensation expense')?.label).toBe('Share-based compensation expense');
  });

  it('prefixes items that follow a closed sub-section with its header', () => {
    expect(info.valueFor('Operating activities - Increase in cash and cash equivalents')).toBe(5_000_000);
    expect(info.valueFor('Operating activities - Cash and cash equivalents, end of the year')).toBe(15_000_000);
    expect(info.has('Increase in cash and cash equivalents')).toBe(false);
  });

  it('carries the period length it was given', () => {
    expect(info.months).toBe(3);
  });

  it('reads a parenthesized amount after a currency sign as negative', () => {
    const withSign = extractCashFlow([
      'STATEMENTS OF CASH FLOWS',
      '(In millions)',
      'December 31, 2019',
      'Cash and cash equivalents, beginning of the year',
      '10',
      'Financing activities:',
      'Repurchases of common stock',
      '$ (3)',
      'Cash used in financing activities',
      '$(4)',
    ].join('\n'), 12, quiet);
    expect(withSign.valueFor('Repurchases of common stock')).toBe(-3_000_000);
    expect(withSign.valueFor('Cash used in financing activities')).toBe(-4_000_000);
  });
});

describe('keyForItem', () => {
  it('prefixes only when no sub-section is open', () => {
    expect(keyForItem(CASH_FLOW_RULES, 'Net change', { currentParent: null, lastParent: 'Financing activities' }))
      .toBe('Financing activities - Net change');
    expect(keyForItem(CASH_FLOW_RULES, 'Net change', { currentParent: 'Investing activities', lastParent: 'Investing activities' }))
      .toBe('Net change');
    expect(keyForItem(CASH_FLOW_RULES, 'Net change', { currentParent: null, lastParent: null }))
      .toBe('Net change');
  });

  it('never prefixes statements that do not compose keys', () => {
    expect(keyForItem(BALANCE_SHEET_RULES, 'Goodwill', { currentParent: null, lastParent: 'Current assets' }))
      .toBe('Goodwill');
  });
});
