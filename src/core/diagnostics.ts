import chalk from 'chalk';
import { getConfig, type LogLevel } from './config.js';
import type { Diagnostic, DiagnosticSink, ExtractionOptions } from './types.js';

/**
 * Diagnostics for recoverable problems (unparseable cells, skipped rows).
 * The extractors never print; they hand a Diagnostic to a sink. The default
 * sink writes to stderr, coloured the way the CLI colours its output.
 */

const LEVEL_RANK: Record<LogLevel, number> = { silent: 0, warn: 1, debug: 2 };

export function formatDiagnostic(d: Diagnostic): string {
  const ctx = Object.entries(d.context)
    .map(([k, v]) => `${k}=${v === null ? 'null' : JSON.stringify(v)}`)
    .join(' ');
  return ctx ? `${d.message} (${ctx})` : d.message;
}

export function createConsoleSink(level: LogLevel = getConfig().logLevel): DiagnosticSink {
  const threshold = LEVEL_RANK[level];
  return (d) => {
    if (LEVEL_RANK[d.level] > threshold) return;
    const line = formatDiagnostic(d);
    console.error(d.level === 'warn' ? chalk.yellow(`Warning: ${line}`) : chalk.dim(line));
  };
}

/** Resolve the sink for one extraction call */
export function resolveSink(options: ExtractionOptions = {}): DiagnosticSink {
  return options.onDiagnostic ?? createConsoleSink();
}

export function warn(sink: DiagnosticSink, message: string, context: Diagnostic['context'] = {}): void {
  sink({ level: 'warn', message, context });
}

export function debug(sink: DiagnosticSink, message: string, context: Diagnostic['context'] = {}): void {
  sink({ level: 'debug', message, context });
}
