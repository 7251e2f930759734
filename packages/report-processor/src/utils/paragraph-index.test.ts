import type { ReportDocument, ReportParagraph } from '@reportsmith/model';

import { describe, expect, test } from 'vitest';

import { createPageBreakParagraph } from './document-utils';
import { ParagraphIndex } from './paragraph-index';

const paragraph = (...texts: string[]): ReportParagraph => ({
  kind: 'paragraph',
  runs: texts.map((text) => ({ kind: 'text', text, font: {} })),
});

const createDocument = (): ReportDocument => ({
  name: 'index-test',
  sections: [{ margins: {} }],
  body: [
    paragraph('Ti', 'tle'),
    {
      kind: 'table',
      rows: [{ cells: [{ paragraphs: [paragraph('Cell')] }] }],
      properties: {},
    },
    paragraph(),
    paragraph('Next'),
  ],
  styles: {},
});

describe('ParagraphIndex', () => {
  test('should index top-level paragraphs with offsets and block positions', () => {
    const index = new ParagraphIndex(createDocument());

    expect(
      index.entries.map(({ ordinal, blockIndex, offset, text }) => ({
        ordinal,
        blockIndex,
        offset,
        text,
      })),
    ).toEqual([
      { ordinal: 0, blockIndex: 0, offset: 0, text: 'Title' },
      { ordinal: 1, blockIndex: 2, offset: 6, text: '' },
      { ordinal: 2, blockIndex: 3, offset: 7, text: 'Next' },
    ]);
  });

  test('should join paragraph texts with newlines, leaving table text out', () => {
    const index = new ParagraphIndex(createDocument());

    expect(index.plainText).toBe('Title\n\nNext');
  });

  test('should keep offsets consistent with the plain text', () => {
    const index = new ParagraphIndex(createDocument());

    for (const entry of index.entries) {
      expect(
        index.plainText.slice(entry.offset, entry.offset + entry.text.length),
      ).toBe(entry.text);
    }
  });

  test('should reference the paragraph objects of the document', () => {
    const doc = createDocument();
    const index = new ParagraphIndex(doc);

    expect(index.entries[2].paragraph).toBe(doc.body[3]);
  });

  test('should reflect inserted blocks after rebuild', () => {
    const doc = createDocument();
    const index = new ParagraphIndex(doc);

    doc.body.splice(3, 0, createPageBreakParagraph());
    expect(index.entries[2].blockIndex).toBe(3);

    index.rebuild();
    expect(index.entries.map((entry) => entry.blockIndex)).toEqual([
      0, 2, 3, 4,
    ]);
    expect(index.plainText).toBe('Title\n\n\nNext');
  });

  test('should handle an empty body', () => {
    const index = new ParagraphIndex({
      name: 'empty',
      sections: [{ margins: {} }],
      body: [],
      styles: {},
    });

    expect(index.entries).toEqual([]);
    expect(index.plainText).toBe('');
  });
});
