import type {
  InlineImage,
  ReportDocument,
  ReportParagraph,
  ReportTable,
} from '@reportsmith/model';

/**
 * Plain-text value of a paragraph (concatenation of its text runs)
 */
export function getParagraphText(paragraph: ReportParagraph): string {
  let text = '';
  for (const run of paragraph.runs) {
    if (run.kind === 'text') {
      text += run.text;
    }
  }
  return text;
}

/**
 * Plain-text value of a table cell (paragraph texts joined by newlines)
 */
export function getCellText(cell: { paragraphs: ReportParagraph[] }): string {
  return cell.paragraphs.map(getParagraphText).join('\n');
}

/**
 * Top-level paragraphs with their position in `doc.body`
 */
export function paragraphsOf(
  doc: ReportDocument,
): Array<{ blockIndex: number; paragraph: ReportParagraph }> {
  const result: Array<{ blockIndex: number; paragraph: ReportParagraph }> = [];
  doc.body.forEach((block, blockIndex) => {
    if (block.kind === 'paragraph') {
      result.push({ blockIndex, paragraph: block });
    }
  });
  return result;
}

/**
 * Tables in document order
 */
export function tablesOf(doc: ReportDocument): ReportTable[] {
  const tables: ReportTable[] = [];
  for (const block of doc.body) {
    if (block.kind === 'table') {
      tables.push(block);
    }
  }
  return tables;
}

/**
 * Empty paragraph holding a single page break
 */
export function createPageBreakParagraph(): ReportParagraph {
  return {
    kind: 'paragraph',
    runs: [{ kind: 'break', breakType: 'page' }],
  };
}

/**
 * Check whether a paragraph consists of exactly one page break
 */
export function isPageBreakParagraph(paragraph: ReportParagraph): boolean {
  const [first] = paragraph.runs;
  return (
    paragraph.runs.length === 1 &&
    first.kind === 'break' &&
    first.breakType === 'page'
  );
}

function collectFromParagraph(
  paragraph: ReportParagraph,
  images: InlineImage[],
): void {
  for (const run of paragraph.runs) {
    if (run.kind === 'image') {
      images.push(run.image);
    }
  }
}

/**
 * Every inline image of the document, in document order, including images
 * inside table cells
 */
export function collectInlineImages(doc: ReportDocument): InlineImage[] {
  const images: InlineImage[] = [];
  for (const block of doc.body) {
    if (block.kind === 'paragraph') {
      collectFromParagraph(block, images);
      continue;
    }
    for (const row of block.rows) {
      for (const cell of row.cells) {
        for (const paragraph of cell.paragraphs) {
          collectFromParagraph(paragraph, images);
        }
      }
    }
  }
  return images;
}
