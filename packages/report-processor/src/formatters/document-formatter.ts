import type { LoggerMethods } from '@reportsmith/logger';
import type {
  PageMargins,
  ParagraphStyleDefinition,
  ReportDocument,
} from '@reportsmith/model';

import { REPORT_FONT } from '../config/constants';
import { paragraphsOf, tablesOf } from '../utils/document-utils';

/**
 * Named paragraph styles enforced on every report
 */
export const REPORT_HEADING_STYLES: Readonly<
  Record<string, ParagraphStyleDefinition>
> = {
  'Heading 1': {
    font: { name: 'Arial', size: 16, bold: true, color: '0000FF' },
    alignment: 'left',
  },
  'Heading 2': {
    font: { name: 'Times New Roman', size: 14, bold: true, color: '0005FF' },
    alignment: 'left',
  },
  'Block Text': {
    font: { name: 'Times New Roman', size: 14, bold: true, color: '0005FF' },
    alignment: 'left',
  },
};

export interface BodyFont {
  name: string;
  size: number;
}

/**
 * DocumentFormatter
 *
 * Document-wide formatting outside tables and images: body font, heading
 * styles, table layout and page margins.
 */
export class DocumentFormatter {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Set font name and size on every text run of the top-level paragraphs
   */
  applyBodyFont(
    doc: ReportDocument,
    font: BodyFont = { name: REPORT_FONT.NAME, size: REPORT_FONT.SIZE_PT },
  ): void {
    let runCount = 0;
    for (const { paragraph } of paragraphsOf(doc)) {
      for (const run of paragraph.runs) {
        if (run.kind === 'text') {
          run.font.name = font.name;
          run.font.size = font.size;
          runCount++;
        }
      }
    }
    this.logger.info(
      `[DocumentFormatter] Body font set to ${font.name} ${font.size}pt on ${runCount} runs`,
    );
  }

  /**
   * Create or overwrite the report heading styles
   */
  applyHeadingStyles(
    doc: ReportDocument,
    styles: Readonly<
      Record<string, ParagraphStyleDefinition>
    > = REPORT_HEADING_STYLES,
  ): void {
    for (const [name, definition] of Object.entries(styles)) {
      doc.styles[name] = {
        font: { ...definition.font },
        alignment: definition.alignment,
      };
    }
    this.logger.info(
      `[DocumentFormatter] Applied styles: ${Object.keys(styles).join(', ')}`,
    );
  }

  /**
   * Stretch every table to the full content width and center it
   */
  applyTableLayout(doc: ReportDocument): void {
    const tables = tablesOf(doc);
    for (const table of tables) {
      table.properties = {
        ...table.properties,
        autofit: false,
        widthPercent: 100,
        alignment: 'center',
      };
    }
    this.logger.info(
      `[DocumentFormatter] Table layout applied to ${tables.length} tables`,
    );
  }

  /**
   * Set the margins of every section
   */
  applyPageMargins(doc: ReportDocument, margins: Required<PageMargins>): void {
    for (const section of doc.sections) {
      section.margins = { ...margins };
    }
    this.logger.info(
      `[DocumentFormatter] Margins set to top: ${margins.top}, bottom: ${margins.bottom}, left: ${margins.left}, right: ${margins.right} on ${doc.sections.length} sections`,
    );
  }
}
