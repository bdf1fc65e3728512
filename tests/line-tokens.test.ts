import { describe, it, expect } from 'vitest';
import { LineCursor, classifyLine, looksLikeLabel, tokenizeSection } from '../src/processing/line-tokens.js';

describe('classifyLine', () => {
  it('classifies values, headers and labels', () => {
    expect(classifyLine('(1,234)')).toBe('value');
    expect(classifyLine('Operating activities:')).toBe('header');
    expect(classifyLine('Net income')).toBe('label');
  });
});

describe('tokenizeSection', () => {
  it('drops blank and currency-only lines', () => {
    expect(tokenizeSection('Net sales\n$\n1,234\n\nOperating expenses:\n')).toEqual([
      { kind: 'label', text: 'Net sales', index: 0 },
      { kind: 'value', text: '1,234', index: 1 },
      { kind: 'header', text: 'Operating expenses:', index: 2 },
    ]);
  });
});

describe('looksLikeLabel', () => {
  it('accepts capitalized text, including a leading parenthesis', () => {
    expect(looksLikeLabel('Net income')).toBe(true);
    expect(looksLikeLabel('(Decrease)/increase in cash')).toBe(true);
  });

  it('rejects shouted headings and lowercase text', () => {
    expect(looksLikeLabel('ASSETS')).toBe(false);
    expect(looksLikeLabel('net of tax')).toBe(false);
  });
});

describe('LineCursor', () => {
  const tokens = tokenizeSection('Net income\n10\n20\n30\nBasic\n1.00');

  it('takes at most the requested number of values', () => {
    const cursor = new LineCursor(tokens, 1);
    expect(cursor.takeValues(2)).toEqual(['10', '20']);
    expect(cursor.takeValues(5)).toEqual(['30']);
    expect(cursor.peek()?.text).toBe('Basic');
  });

  it('accepts an exact label only', () => {
    const cursor = new LineCursor(tokens, 4);
    expect(cursor.acceptLabel('Diluted')).toBe(false);
    expect(cursor.acceptLabel('Basic')).toBe(true);
    expect(cursor.takeValues(1)).toEqual(['1.00']);
    expect(cursor.done).toBe(true);
  });

  it('stops at its end bound', () => {
    const cursor = new LineCursor(tokens, 0, 2);
    expect(cursor.next()?.text).toBe('Net income');
    expect(cursor.takeValues(3)).toEqual(['10']);
    expect(cursor.next()).toBeUndefined();
  });
});
