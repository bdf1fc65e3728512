/**
 * Serialization contract for downstream renderers.
 *
 * Dates render as extended ISO-8601 date/time strings; every other object
 * renders as a flat mapping of its own public attributes, recursively.
 * Methods and getters live on prototypes and are not serialized.
 */

import type { FinancialReport } from '../core/model.js';

export type Serialized =
  | string
  | number
  | boolean
  | null
  | Serialized[]
  | { [key: string]: Serialized };

export function serializeDate(date: Date): string {
  return date.toISOString();
}

export function toSerializable(value: unknown): Serialized {
  if (value instanceof Date) return serializeDate(value);
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  // NaN and Infinity have no JSON form
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map(toSerializable);

  if (typeof value === 'object') {
    const out: { [key: string]: Serialized } = {};
    for (const [key, field] of Object.entries(value)) {
      if (typeof field === 'function') continue;
      out[key] = toSerializable(field);
    }
    return out;
  }

  return null;
}

export function serializeReport(report: FinancialReport): Serialized {
  return toSerializable(report);
}
