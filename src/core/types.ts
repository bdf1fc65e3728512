/**
 * Shared types for the extraction pipeline.
 *
 * The output records themselves (FinancialElement, FinancialInfo,
 * FinancialReport) are classes in model.ts; this file holds the
 * intermediate shapes passed between extraction stages.
 */

export type StatementKind = 'balance_sheet' | 'income_statement' | 'cash_flow';

export type ReportFormat = 'modern' | 'legacy';

// ── Diagnostics ───────────────────────────────────────────────────────

export type DiagnosticLevel = 'warn' | 'debug';

export interface Diagnostic {
  level: DiagnosticLevel;
  message: string;
  /** Free-form key/value context (concept, raw token, column index...) */
  context: Record<string, string | number | null>;
}

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

export interface ExtractionOptions {
  onDiagnostic?: DiagnosticSink;
}

// ── Modern report tables ──────────────────────────────────────────────

/** One `<th>` or `<td>` cell, read out of the markup */
export interface TableCell {
  tag: 'th' | 'td';
  /** null when the cell has no class attribute at all */
  classes: string[] | null;
  colspan: number;
  text: string;
  /** Text segments split at element boundaries, whitespace-stripped, empties dropped */
  segments: string[];
  /** onclick of the first anchor inside the cell */
  onclick: string | null;
}

export interface TableRow {
  cells: TableCell[];
}

export interface StatementMetadata {
  title: string;
  unitText: string | null;
  isSnapshot: boolean;
  dates: Date[];
  /** Parallel to dates; null for snapshot statements */
  months: Array<number | null>;
}

// ── Legacy text ───────────────────────────────────────────────────────

export interface LegacySections {
  balanceSheet: string;
  incomeStatement: string;
  cashFlow: string;
}

export type LineTokenKind = 'value' | 'header' | 'label';

export interface LineToken {
  kind: LineTokenKind;
  text: string;
  /** Position in the token sequence */
  index: number;
}
