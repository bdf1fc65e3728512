import type { FinancialReport } from '../core/model.js';
import { serializeReport } from './serialization.js';

/**
 * Renders a report as structured JSON for programmatic use.
 */

export function renderJson(report: FinancialReport): string {
  return JSON.stringify(serializeReport(report), null, 2);
}
