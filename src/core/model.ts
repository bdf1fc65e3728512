/**
 * Output records.
 *
 * Design principles:
 * - Elements are immutable once built
 * - A FinancialInfo covers exactly one date; snapshot statements carry months = null
 * - A FinancialReport only grows, through addFinancialInfo
 */

export class FinancialElement {
  constructor(
    public readonly label: string,
    public readonly value: number | null
  ) {
    Object.freeze(this);
  }
}

export class FinancialInfo {
  /**
   * @param date - period end, or the snapshot date of a balance sheet
   * @param months - length of the covered period; null for snapshots
   * @param elements - concept identifier → element
   */
  constructor(
    public readonly date: Date,
    public readonly months: number | null,
    public readonly elements: Record<string, FinancialElement> = {}
  ) {}

  has(concept: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.elements, concept);
  }

  get(concept: string): FinancialElement | undefined {
    return this.has(concept) ? this.elements[concept] : undefined;
  }

  /** Numeric value of a concept, or null when it is missing or unparsed */
  valueFor(concept: string): number | null {
    return this.get(concept)?.value ?? null;
  }

  /** Stores an element unless the concept already has one. Returns whether it was stored. */
  setIfAbsent(concept: string, element: FinancialElement): boolean {
    if (this.has(concept)) return false;
    this.elements[concept] = element;
    return true;
  }

  get size(): number {
    return Object.keys(this.elements).length;
  }
}

export class FinancialReport {
  /**
   * @param company - identifier for the filer; not necessarily a ticker,
   *   since not every filer is publicly traded
   * @param date_filed - acceptance date of the filing
   */
  constructor(
    public readonly company: string,
    public readonly date_filed: Date,
    public readonly periods: FinancialInfo[] = []
  ) {}

  addFinancialInfo(info: FinancialInfo): void {
    this.periods.push(info);
  }
}
