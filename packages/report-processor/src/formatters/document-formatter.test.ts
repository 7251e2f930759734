import type { LoggerMethods } from '@reportsmith/logger';
import type { ReportDocument, TextRun } from '@reportsmith/model';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import {
  DocumentFormatter,
  REPORT_HEADING_STYLES,
} from './document-formatter';

const createDocument = (): ReportDocument => ({
  name: 'formatting',
  sections: [{ margins: { top: 500 } }, { margins: {} }],
  body: [
    {
      kind: 'paragraph',
      style: 'Heading 1',
      runs: [
        { kind: 'text', text: '1. Azure', font: { bold: true } },
        { kind: 'break', breakType: 'line' },
      ],
    },
    {
      kind: 'table',
      rows: [
        {
          cells: [
            {
              paragraphs: [
                {
                  kind: 'paragraph',
                  runs: [
                    {
                      kind: 'text',
                      text: 'cell',
                      font: { name: 'Open Sans', size: 10 },
                    },
                  ],
                },
              ],
            },
          ],
        },
      ],
      properties: { widthPercent: 50, autofit: true },
    },
  ],
  styles: {
    Normal: { font: { name: 'Calibri', size: 11 } },
    'Heading 1': { font: { name: 'Calibri', size: 20 } },
  },
});

const headingRun = (doc: ReportDocument): TextRun => {
  const [block] = doc.body;
  if (block.kind !== 'paragraph') {
    throw new Error('unexpected fixture');
  }
  const [run] = block.runs;
  if (run.kind !== 'text') {
    throw new Error('unexpected fixture');
  }
  return run;
};

describe('DocumentFormatter', () => {
  let mockLogger: LoggerMethods;
  let formatter: DocumentFormatter;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    formatter = new DocumentFormatter(mockLogger);
  });

  describe('applyBodyFont', () => {
    test('should set the default font on top-level text runs', () => {
      const doc = createDocument();

      formatter.applyBodyFont(doc);

      expect(headingRun(doc).font).toEqual({
        name: 'Open Sans',
        size: 10,
        bold: true,
      });
      expect(mockLogger.info).toHaveBeenCalledWith(
        '[DocumentFormatter] Body font set to Open Sans 10pt on 1 runs',
      );
    });

    test('should apply a custom font', () => {
      const doc = createDocument();

      formatter.applyBodyFont(doc, { name: 'Arial', size: 12 });

      expect(headingRun(doc).font).toMatchObject({ name: 'Arial', size: 12 });
    });

    test('should leave table cell runs to the table styler', () => {
      const doc = createDocument();

      formatter.applyBodyFont(doc, { name: 'Arial', size: 12 });

      const table = doc.body[1];
      if (table.kind !== 'table') {
        throw new Error('unexpected fixture');
      }
      expect(table.rows[0].cells[0].paragraphs[0].runs[0]).toEqual({
        kind: 'text',
        text: 'cell',
        font: { name: 'Open Sans', size: 10 },
      });
    });
  });

  describe('applyHeadingStyles', () => {
    test('should create and overwrite the heading styles', () => {
      const doc = createDocument();

      formatter.applyHeadingStyles(doc);

      expect(doc.styles['Heading 1']).toEqual({
        font: { name: 'Arial', size: 16, bold: true, color: '0000FF' },
        alignment: 'left',
      });
      expect(doc.styles['Heading 2']).toEqual({
        font: { name: 'Times New Roman', size: 14, bold: true, color: '0005FF' },
        alignment: 'left',
      });
      expect(doc.styles['Block Text']).toEqual(doc.styles['Heading 2']);
      expect(doc.styles.Normal).toEqual({
        font: { name: 'Calibri', size: 11 },
      });
    });

    test('should copy style definitions into the document', () => {
      const doc = createDocument();

      formatter.applyHeadingStyles(doc);
      doc.styles['Heading 1'].font.size = 99;

      expect(REPORT_HEADING_STYLES['Heading 1'].font.size).toBe(16);
    });

    test('should apply custom styles', () => {
      const doc = createDocument();

      formatter.applyHeadingStyles(doc, {
        Title: { font: { name: 'Arial', size: 24 } },
      });

      expect(doc.styles.Title).toEqual({
        font: { name: 'Arial', size: 24 },
        alignment: undefined,
      });
      expect(mockLogger.info).toHaveBeenCalledWith(
        '[DocumentFormatter] Applied styles: Title',
      );
    });
  });

  describe('applyTableLayout', () => {
    test('should stretch and center every table with fixed layout', () => {
      const doc = createDocument();

      formatter.applyTableLayout(doc);

      const table = doc.body[1];
      expect(table.kind === 'table' && table.properties).toEqual({
        widthPercent: 100,
        alignment: 'center',
        autofit: false,
      });
    });
  });

  describe('applyPageMargins', () => {
    test('should set the margins of every section', () => {
      const doc = createDocument();
      const margins = { top: 360000, bottom: 360000, left: 360000, right: 360000 };

      formatter.applyPageMargins(doc, margins);

      expect(doc.sections.map((section) => section.margins)).toEqual([
        margins,
        margins,
      ]);
      expect(doc.sections[0].margins).not.toBe(doc.sections[1].margins);
    });
  });
});
