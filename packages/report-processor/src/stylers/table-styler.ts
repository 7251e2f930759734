import type {
  ReportParagraph,
  ReportTable,
  ReportTableCell,
} from '@reportsmith/model';

import type { CategoryStyle } from '../config/category-registry';

import { CELL_BORDER, REPORT_FONT } from '../config/constants';

/**
 * TableStyler
 *
 * Applies category colors, borders, fonts, centering and column widths to a
 * table. Every attribute is assigned outright, so applying the same style
 * twice yields the same tree.
 */
export class TableStyler {
  /**
   * Style a table in place
   *
   * @param usableWidth - Usable content width of the governing section (EMU)
   */
  static apply(
    table: ReportTable,
    style: Readonly<CategoryStyle>,
    usableWidth: number,
  ): void {
    table.rows.forEach((row, rowIndex) => {
      const isHeader = rowIndex === 0;
      const fill = isHeader
        ? style.headerFill
        : TableStyler.contentFill(style, rowIndex);
      const fontColor = isHeader ? style.headerFont : style.contentFont;
      const cellWidth = TableStyler.cellWidth(usableWidth, row.cells.length);

      for (const cell of row.cells) {
        TableStyler.styleCell(cell, fill, fontColor, isHeader, cellWidth);
      }
    });
  }

  /**
   * Alternating content fill keyed by `(rowIndex - 1) mod 2`
   */
  static contentFill(style: Readonly<CategoryStyle>, rowIndex: number): string {
    return (rowIndex - 1) % 2 === 0 ? style.contentFill1 : style.contentFill2;
  }

  /**
   * Equal share of the usable width, rounded down so a row never overflows
   */
  static cellWidth(usableWidth: number, cellCount: number): number {
    return Math.floor(usableWidth / cellCount);
  }

  private static styleCell(
    cell: ReportTableCell,
    fill: string,
    fontColor: string,
    bold: boolean,
    width: number,
  ): void {
    cell.shading = { fill };
    cell.borders = {
      top: { ...CELL_BORDER },
      left: { ...CELL_BORDER },
      bottom: { ...CELL_BORDER },
      right: { ...CELL_BORDER },
    };
    cell.width = width;
    cell.verticalAlignment = 'center';

    for (const paragraph of cell.paragraphs) {
      TableStyler.styleParagraph(paragraph, fontColor, bold);
    }
  }

  private static styleParagraph(
    paragraph: ReportParagraph,
    fontColor: string,
    bold: boolean,
  ): void {
    paragraph.alignment = 'center';
    for (const run of paragraph.runs) {
      if (run.kind !== 'text') {
        continue;
      }
      run.font.name = REPORT_FONT.NAME;
      run.font.size = REPORT_FONT.SIZE_PT;
      run.font.color = fontColor;
      // Header text is always bold; content keeps its own emphasis
      if (bold) {
        run.font.bold = true;
      }
    }
  }
}
