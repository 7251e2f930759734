import type { ReportDocument, ReportParagraph } from '@reportsmith/model';

import { PARAGRAPH_SEPARATOR } from '../config/constants';
import { getParagraphText, paragraphsOf } from './document-utils';

export interface ParagraphIndexEntry {
  /**
   * Ordinal among top-level paragraphs
   */
  ordinal: number;

  /**
   * Position of the paragraph in `doc.body`
   */
  blockIndex: number;

  /**
   * Offset of the paragraph's first character in the document text
   */
  offset: number;

  text: string;
  paragraph: ReportParagraph;
}

/**
 * ParagraphIndex
 *
 * Positional index of the top-level paragraphs of a document. The document
 * text is the paragraph texts joined by a line separator, so each paragraph
 * gets a stable offset that TOC intervals can be compared against.
 *
 * The index is a snapshot: after inserting or removing blocks, call
 * `rebuild()` before using it again.
 */
export class ParagraphIndex {
  private entryList: ParagraphIndexEntry[] = [];
  private text = '';

  constructor(private readonly doc: ReportDocument) {
    this.rebuild();
  }

  get entries(): readonly ParagraphIndexEntry[] {
    return this.entryList;
  }

  get plainText(): string {
    return this.text;
  }

  /**
   * Recompute offsets and block positions from the current document body
   */
  rebuild(): void {
    const entries: ParagraphIndexEntry[] = [];
    const texts: string[] = [];
    let offset = 0;

    paragraphsOf(this.doc).forEach(({ blockIndex, paragraph }, ordinal) => {
      const text = getParagraphText(paragraph);
      entries.push({ ordinal, blockIndex, offset, text, paragraph });
      texts.push(text);
      offset += text.length + PARAGRAPH_SEPARATOR.length;
    });

    this.entryList = entries;
    this.text = texts.join(PARAGRAPH_SEPARATOR);
  }
}
