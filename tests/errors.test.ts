import { describe, it, expect } from 'vitest';
import {
  ExtractionError,
  MetadataParsingError,
  SectionNotFoundError,
  StatementParseError,
  UnsupportedDocumentError,
} from '../src/core/errors.js';

describe('Custom Error Types', () => {
  it('ExtractionError is a named Error', () => {
    const err = new ExtractionError('boom');
    expect(err.name).toBe('ExtractionError');
    expect(err.message).toBe('boom');
    expect(err instanceof Error).toBe(true);
  });

  it('MetadataParsingError carries the decoded headers', () => {
    const err = new MetadataParsingError('mismatch', ['Sep. 29, 2018'], [12, 12]);
    expect(err.name).toBe('MetadataParsingError');
    expect(err.dates).toEqual(['Sep. 29, 2018']);
    expect(err.months).toEqual([12, 12]);
    expect(err instanceof ExtractionError).toBe(true);
  });

  it('SectionNotFoundError names a single missing section', () => {
    const err = new SectionNotFoundError(['balance sheet']);
    expect(err.message).toBe('Could not locate the balance sheet section in the filing text.');
    expect(err.sections).toEqual(['balance sheet']);
  });

  it('SectionNotFoundError lists several missing sections', () => {
    const err = new SectionNotFoundError(['balance sheet', 'statement of cash flows']);
    expect(err.message).toBe(
      'Could not locate the balance sheet, statement of cash flows sections in the filing text.'
    );
    expect(err instanceof ExtractionError).toBe(true);
  });

  it('StatementParseError names the statement', () => {
    const err = new StatementParseError('no dates', 'Balance Sheet');
    expect(err.statement).toBe('Balance Sheet');
    expect(err.name).toBe('StatementParseError');
  });

  it('UnsupportedDocumentError formats its detail', () => {
    expect(new UnsupportedDocumentError('document is empty').message).toBe(
      'Unsupported filing document: document is empty'
    );
    expect(new UnsupportedDocumentError().message).toBe('Unsupported filing document');
  });
});
