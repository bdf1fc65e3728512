import { warn } from '../core/diagnostics.js';
import type { DiagnosticSink } from '../core/types.js';

/**
 * Turns the numeric-looking text of a statement cell into a signed,
 * unit-scaled number.
 *
 * Two flavours:
 * - normalizeValue: report-table cells, scaled from the table's unit hint
 *   ("shares in Thousands, $ in Millions") and the row's concept identifier
 * - parseLegacyAmount: free-text tokens, scaled by a multiplier the caller
 *   picked from the section header; dashes mean zero
 */

export type Scale = 'none' | 'thousands' | 'millions' | 'billions';

export const SCALE_MULTIPLIERS: Record<Scale, number> = {
  none: 1,
  thousands: 1_000,
  millions: 1_000_000,
  billions: 1_000_000_000,
};

/** Largest first, so "billions" is never shadowed */
const HINT_SCALES: Array<Exclude<Scale, 'none'>> = ['billions', 'millions', 'thousands'];

const PLAIN_DECIMAL = /^(?:\d+\.?\d*|\.\d+)$/;
const DASH_ONLY = /^[—–-]+$/;

/** Parse "thousands" / "Millions" / "billion" into a Scale; anything else is unscaled */
export function parseScale(word: string | null | undefined): Scale {
  if (!word) return 'none';
  const lower = word.toLowerCase();
  for (const scale of HINT_SCALES) {
    if (lower === scale || lower === scale.slice(0, -1)) return scale;
  }
  return 'none';
}

/**
 * Scale that applies to a concept under a unit hint.
 * Per-share concepts are never scaled; share counts follow the
 * "shares in X" clause, everything else the "$ in X" clause.
 */
export function scaleForConcept(concept: string, unitText: string | null): Scale {
  if (concept.includes('PerShare') || !unitText) return 'none';
  const hint = unitText.toLowerCase();
  const subject = concept.includes('Shares') ? 'shares' : '$';
  for (const scale of HINT_SCALES) {
    if (hint.includes(`${subject} in ${scale}`)) return scale;
  }
  return 'none';
}

/**
 * Normalize a report-table cell. Returns null (and warns) when the text
 * has no parseable number once everything but digits and '.' is stripped.
 */
export function normalizeValue(
  text: string,
  concept: string,
  unitText: string | null,
  sink?: DiagnosticSink
): number | null {
  const isNegative = text.includes('(');
  const amountText = text.replace(/[^0-9.]/g, '');

  if (!PLAIN_DECIMAL.test(amountText)) {
    if (sink) {
      warn(sink, 'Value is not numeric after removing special characters, ignoring', {
        text,
        concept,
        cleaned: amountText,
      });
    }
    return null;
  }

  const amount = parseFloat(amountText);
  const value = isNegative ? -amount : amount;
  return value * SCALE_MULTIPLIERS[scaleForConcept(concept, unitText)];
}

/** True for tokens the legacy scanner should read as a value line */
export function isAmountToken(token: string): boolean {
  const bare = token.replace(/[$()\s]/g, '');
  if (bare === '') return false;
  if (DASH_ONLY.test(bare)) return true;
  return /^(?:\d{1,3}(?:,\d{3})+|\d+)?(?:\.\d+)?$/.test(bare) && /\d/.test(bare);
}

/**
 * Parse a legacy statement token: "(1,234)" → -1234 × multiplier,
 * "—" → 0. A token with a decimal point keeps its fraction, rounded to
 * its own precision after scaling; otherwise the result is an integer.
 */
export function parseLegacyAmount(raw: string, multiplier: number): number | null {
  const token = raw.trim();
  const bare = token.replace(/[$()\s]/g, '');
  if (DASH_ONLY.test(bare)) return 0;

  const digits = bare.replace(/,/g, '');
  if (!PLAIN_DECIMAL.test(digits)) return null;

  // "$ (195)" and "$(195)" are as negative as "(195)"
  const unsigned = token.replace(/[$\s]/g, '');
  const sign = unsigned.startsWith('(') && unsigned.endsWith(')') ? -1 : 1;
  const dot = digits.indexOf('.');
  if (dot === -1) {
    return sign * parseInt(digits, 10) * multiplier;
  }
  const fractionDigits = digits.length - dot - 1;
  const scaled = parseFloat(digits) * multiplier;
  return sign * Number(scaled.toFixed(fractionDigits));
}
