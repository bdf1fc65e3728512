/**
 * Micro-parser for the definition reference attached to a report-table
 * label cell, e.g.
 *
 *   top.Show.showAR( this, 'defref_us-gaap_CostOfGoodsSold', window );
 *
 * Grammar:
 *   reference := "top.Show.showAR(" ws "this" ws "," ws "'defref_" payload "'" ws "," ws "window" ws ")" ws [";"] ws
 *   payload   := one or more characters other than "'"
 *
 * The payload keeps its namespace prefix ("us-gaap_", or a filer's own
 * extension prefix) so the concept stays unambiguous.
 */

const CALL_PREFIX = 'top.Show.showAR(';
const PAYLOAD_PREFIX = "'defref_";
const QUOTE = "'";

class Scanner {
  private pos = 0;

  constructor(private readonly source: string) {}

  skipWhitespace(): void {
    while (this.pos < this.source.length && /\s/.test(this.source[this.pos])) this.pos++;
  }

  /** Consume a literal; false (and no movement) when it is not next */
  accept(literal: string): boolean {
    if (!this.source.startsWith(literal, this.pos)) return false;
    this.pos += literal.length;
    return true;
  }

  /** Consume up to (not including) the next occurrence of stop */
  takeUntil(stop: string): string | null {
    const end = this.source.indexOf(stop, this.pos);
    if (end === -1) return null;
    const taken = this.source.slice(this.pos, end);
    this.pos = end;
    return taken;
  }

  atEnd(): boolean {
    return this.pos >= this.source.length;
  }
}

/**
 * Returns the concept identifier inside a definition reference, or null
 * when the string does not follow the grammar (abstract or separator rows
 * carry no reference at all).
 */
export function parseDefinitionReference(source: string | null | undefined): string | null {
  if (!source) return null;
  const s = new Scanner(source);

  s.skipWhitespace();
  if (!s.accept(CALL_PREFIX)) return null;
  s.skipWhitespace();
  if (!s.accept('this')) return null;
  s.skipWhitespace();
  if (!s.accept(',')) return null;
  s.skipWhitespace();
  if (!s.accept(PAYLOAD_PREFIX)) return null;

  const payload = s.takeUntil(QUOTE);
  if (!payload) return null;
  s.accept(QUOTE);

  s.skipWhitespace();
  if (!s.accept(',')) return null;
  s.skipWhitespace();
  if (!s.accept('window')) return null;
  s.skipWhitespace();
  if (!s.accept(')')) return null;
  s.skipWhitespace();
  s.accept(';');
  s.skipWhitespace();

  return s.atEnd() ? payload : null;
}
