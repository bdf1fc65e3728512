import type { StatementKind } from '../core/types.js';
import type { Scale } from './value-normalizer.js';

/**
 * Rule tables for the legacy (free-text) statement extractors.
 *
 * Each statement is described by data only: where its line items start,
 * which sub-section headers it knows, which labels it keeps and under what
 * key, and which labels override the section's unit scale. The positional
 * scan in legacy-statements.ts applies these tables and nothing else.
 *
 * Label matching is by prefix, on text with curly quotes already folded
 * to straight ones.
 */

export interface LabelAlias {
  prefix: string;
  key: string;
}

export interface ScaleOverride {
  pattern: RegExp;
  scale: Scale;
  /** Only for Basic/Diluted blocks */
  blocksOnly?: boolean;
}

/** Reads a stored value by key; null when missing or unparsed */
export type ValueLookup = (key: string) => number | null;

export interface Derivation {
  key: string;
  compute: (value: ValueLookup) => number | null;
}

export interface StatementRules {
  kind: StatementKind;
  display_name: string;
  /** Prefix of the line where line items begin */
  first_item: string;
  /** Sub-section headers (ending in ":") that become the current parent */
  section_headers: string[];
  /** Label prefixes that close the current sub-section */
  parent_closers: string[];
  relevant_items: string[];
  aliases: LabelAlias[];
  scale_overrides: ScaleOverride[];
  exclusions: string[];
  /** Filled in when the statement never reports them */
  defaults: Record<string, number>;
  derivations: Derivation[];
  /** Key items as "<parent> - <label>" (see keyForItem) */
  compose_with_parent: boolean;
  /** Expand "Label:" / Basic / Diluted blocks into two keys */
  per_share_blocks: boolean;
}

function sum(...values: Array<number | null>): number | null {
  let total = 0;
  for (const v of values) {
    if (v === null) return null;
    total += v;
  }
  return total;
}

export const BALANCE_SHEET_RULES: StatementRules = {
  kind: 'balance_sheet',
  display_name: 'Balance Sheet',
  first_item: 'Current assets:',
  section_headers: [
    'Current assets:',
    'Current liabilities:',
    "Shareholders' equity:",
    "Stockholders' equity:",
  ],
  parent_closers: [],
  relevant_items: [
    'Cash and cash equivalents',
    'Short-term marketable securities',
    'Short-term investments',
    'Accounts receivable',
    'Inventories',
    'Deferred tax assets',
    'Other current assets',
    'Total current assets',
    'Long-term marketable securities',
    'Property, plant, and equipment, net',
    'Goodwill',
    'Acquired intangible assets, net',
    'Other assets',
    'Total assets',
    'Accounts payable',
    'Accrued expenses',
    'Total current liabilities',
    'Non-current liabilities',
    'Total liabilities',
    'Common stock',
    'Retained earnings',
    'Accumulated other comprehensive income',
    "Total shareholders' equity",
    "Total liabilities and shareholders' equity",
  ],
  aliases: [
    { prefix: 'Accounts receivable', key: 'Accounts receivable' },
    { prefix: 'Common stock', key: 'Common stock' },
  ],
  scale_overrides: [
    // Share counts, not currency
    { pattern: /^Common stock/, scale: 'none' },
  ],
  exclusions: ['Commitments and contingencies'],
  defaults: {
    'Goodwill': 0,
    'Acquired intangible assets, net': 0,
  },
  derivations: [
    {
      key: 'Cash and short-term investments',
      compute: v => sum(v('Cash and cash equivalents'), v('Short-term investments')),
    },
    {
      key: 'Goodwill and Intangible Assets',
      compute: v => sum(v('Goodwill'), v('Acquired intangible assets, net')),
    },
    {
      key: 'Total non-current assets',
      compute: v => {
        const total = v('Total assets');
        const current = v('Total current assets');
        return total !== null && current !== null ? total - current : null;
      },
    },
  ],
  compose_with_parent: false,
  per_share_blocks: false,
};

function weightedShares(epsKey: string): Derivation['compute'] {
  return v => {
    const netIncome = v('Net income');
    const preferred = v('Preferred dividends') ?? 0;
    const eps = v(epsKey);
    if (netIncome === null || eps === null || eps === 0) return null;
    return (netIncome - preferred) / eps;
  };
}

export const INCOME_STATEMENT_RULES: StatementRules = {
  kind: 'income_statement',
  display_name: 'Statement of Operations',
  first_item: 'Net sales',
  section_headers: [
    'Operating expenses:',
    'Earnings per common share:',
    'Earnings per share:',
    'Shares used in computing earnings per share:',
  ],
  parent_closers: [],
  relevant_items: [
    'Net sales',
    'Cost of sales',
    'Gross margin',
    'Research and development',
    'Selling, general and administrative',
    'Total operating expenses',
    'Operating income',
    'Other income and expense',
    'Total other income and expense',
    'Income before provision for income taxes',
    'Provision for income taxes',
    'Net income',
    'Earnings per common share:',
    'Earnings per share:',
    'Shares used in computing earnings per share:',
    'Cash dividends declared per common share',
    'Preferred dividends',
  ],
  aliases: [],
  scale_overrides: [
    { pattern: /dividends/i, scale: 'none' },
    { pattern: /per\s+(?:common\s+)?share/i, scale: 'thousands', blocksOnly: true },
  ],
  exclusions: [],
  defaults: {
    'Preferred dividends': 0,
  },
  derivations: [
    { key: 'Weighted Average Shs Out', compute: weightedShares('Earnings per common share') },
    { key: 'Weighted Average Shs Out (Dil)', compute: weightedShares('Earnings per common share Diluted') },
  ],
  compose_with_parent: false,
  per_share_blocks: true,
};

export const CASH_FLOW_RULES: StatementRules = {
  kind: 'cash_flow',
  display_name: 'Statement of Cash Flows',
  first_item: 'Cash and cash equivalents, beginning',
  section_headers: [
    'Operating activities:',
    'Investing activities:',
    'Financing activities:',
    'Supplemental cash flow disclosure:',
  ],
  parent_closers: [
    'Cash generated by',
    'Cash used in',
  ],
  relevant_items: [
    'Cash and cash equivalents, beginning of the year',
    'Depreciation and amortization',
    'Stock-based compensation expense',
    'Share-based compensation expense',
    'Cash generated by operating activities',
    'Payment for acquisition of property, plant and equipment',
    'Payment for acquisition of intangible assets',
    'Cash used in investing activities',
    'Cash generated by (used for) investing activities',
    'Cash generated by (used in) investing activities',
    'Proceeds from issuance of common stock',
    'Excess tax benefits from stock-based compensation',
    'Cash used to net share settle equity awards',
    'Dividends and dividend equivalent rights paid',
    'Repurchases of common stock',
    'Cash used for repurchase of common stock',
    'Cash generated by financing activities',
    'Cash used in financing activities',
    'Cash generated by (used in) financing activities',
    '(Decrease)/increase in cash and cash equivalents',
    'Increase (decrease) in cash and cash equivalents',
    'Increase in cash and cash equivalents',
    'Cash and cash equivalents, end of the year',
    'Cash paid for income taxes, net',
  ],
  aliases: [
    { prefix: 'Share-based compensation expense', key: 'Stock-based compensation expense' },
  ],
  scale_overrides: [],
  exclusions: [],
  defaults: {},
  derivations: [],
  compose_with_parent: true,
  per_share_blocks: false,
};

export const STATEMENT_RULES: StatementRules[] = [
  BALANCE_SHEET_RULES,
  INCOME_STATEMENT_RULES,
  CASH_FLOW_RULES,
];

// ── Lookups ───────────────────────────────────────────────────────────

const FOOTNOTE_MARKER = /\s+\(\d+\)$/;

/** "Net income (1)" → "Net income"; "Earnings per share:" → "Earnings per share" */
export function cleanLabel(label: string): string {
  return label.replace(FOOTNOTE_MARKER, '').replace(/:$/, '').trim();
}

export function isRelevant(rules: StatementRules, label: string): boolean {
  return rules.relevant_items.some(item => label.startsWith(item));
}

export function isExcluded(rules: StatementRules, label: string): boolean {
  return rules.exclusions.some(item => label.startsWith(item));
}

export function isSectionHeader(rules: StatementRules, text: string): boolean {
  const lower = text.toLowerCase();
  return rules.section_headers.some(h => h.toLowerCase() === lower);
}

export function closesParent(rules: StatementRules, label: string): boolean {
  return rules.parent_closers.some(prefix => label.startsWith(prefix));
}

export function canonicalKey(rules: StatementRules, label: string): string {
  const alias = rules.aliases.find(a => label.startsWith(a.prefix));
  return alias ? alias.key : label;
}

export function scaleOverrideFor(rules: StatementRules, label: string, inBlock: boolean): Scale | null {
  const override = rules.scale_overrides.find(o => (inBlock || !o.blocksOnly) && o.pattern.test(label));
  return override ? override.scale : null;
}
