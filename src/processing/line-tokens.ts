import type { LineToken, LineTokenKind } from '../core/types.js';
import { isAmountToken } from './value-normalizer.js';

/**
 * Legacy statement text as a sequence of classified lines, plus a cursor
 * that walks it. Reading a label's values means consuming the value
 * tokens that follow it, so positions never have to be searched for again.
 */

export function classifyLine(text: string): LineTokenKind {
  if (isAmountToken(text)) return 'value';
  if (text.endsWith(':')) return 'header';
  return 'label';
}

/** Trimmed, non-empty lines; lines holding only a currency symbol are dropped */
export function tokenizeSection(section: string): LineToken[] {
  return section
    .split('\n')
    .map(line => line.trim())
    .filter(line => line !== '' && line !== '$')
    .map((text, index) => ({ kind: classifyLine(text), text, index }));
}

/**
 * Label-like: opens with an uppercase letter (after an optional opening
 * parenthesis, as in "(Decrease)/increase in cash") and is not a shouted heading.
 */
export function looksLikeLabel(text: string): boolean {
  return /^\(?[A-Z]/.test(text) && text !== text.toUpperCase();
}

export class LineCursor {
  private pos: number;

  constructor(
    private readonly tokens: LineToken[],
    start: number = 0,
    private readonly end: number = tokens.length
  ) {
    this.pos = start;
  }

  get done(): boolean {
    return this.pos >= this.end;
  }

  peek(offset: number = 0): LineToken | undefined {
    const at = this.pos + offset;
    return at < this.end ? this.tokens[at] : undefined;
  }

  next(): LineToken | undefined {
    const token = this.peek();
    if (token) this.pos++;
    return token;
  }

  /** Consume the next token if it is a label with exactly this text */
  acceptLabel(text: string): boolean {
    const token = this.peek();
    if (!token || token.kind === 'value' || token.text !== text) return false;
    this.pos++;
    return true;
  }

  /** Consume up to n consecutive value tokens */
  takeValues(n: number): string[] {
    const values: string[] = [];
    while (values.length < n) {
      const token = this.peek();
      if (!token || token.kind !== 'value') break;
      values.push(token.text);
      this.pos++;
    }
    return values;
  }
}
