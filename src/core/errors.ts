/**
 * Custom error types for statement extraction.
 * Every fatal, per-document failure extends ExtractionError so callers can
 * skip the filing with a single catch.
 */

export class ExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExtractionError';
  }
}

/** The header rows of a report table could not be decoded */
export class MetadataParsingError extends ExtractionError {
  constructor(
    message: string,
    public readonly dates: string[] = [],
    public readonly months: Array<number | null> = []
  ) {
    super(message);
    this.name = 'MetadataParsingError';
  }
}

export class SectionNotFoundError extends ExtractionError {
  constructor(public readonly sections: string[]) {
    super(
      sections.length === 1
        ? `Could not locate the ${sections[0]} section in the filing text.`
        : `Could not locate the ${sections.join(', ')} sections in the filing text.`
    );
    this.name = 'SectionNotFoundError';
  }
}

/** A located legacy section lacked something its extractor requires */
export class StatementParseError extends ExtractionError {
  constructor(message: string, public readonly statement: string) {
    super(message);
    this.name = 'StatementParseError';
  }
}

/** The markup has neither a report table nor readable statement text */
export class UnsupportedDocumentError extends ExtractionError {
  constructor(detail: string = '') {
    super(`Unsupported filing document${detail ? `: ${detail}` : ''}`);
    this.name = 'UnsupportedDocumentError';
  }
}
