// All lengths are EMU (English Metric Units) unless stated otherwise.
// Colors are six-digit hex strings without '#' (e.g. "5B9BD5"), or "auto".

// Character formatting of a text run
export interface RunFont {
  name?: string;
  size?: number; // Points
  bold?: boolean;
  color?: string;
}

export interface TextRun {
  kind: 'text';
  text: string;
  font: RunFont;
}

// Explicit break inside a paragraph
export interface BreakRun {
  kind: 'break';
  breakType: 'page' | 'line';
}

// Inline picture anchored in a paragraph
export interface InlineImage {
  source: string;
  // Intrinsic size of the original asset; aspect ratio is derived from these
  readonly pixelWidth: number;
  readonly pixelHeight: number;
  // Rendered size
  width: number;
  height: number;
}

export interface ImageRun {
  kind: 'image';
  image: InlineImage;
}

export type ReportRun = TextRun | BreakRun | ImageRun;

export type HorizontalAlignment = 'left' | 'center' | 'right' | 'justify';

export interface ReportParagraph {
  kind: 'paragraph';
  style?: string; // Named style, e.g. "Heading 1"
  alignment?: HorizontalAlignment;
  runs: ReportRun[];
}

export interface BorderSpec {
  style: 'single' | 'double' | 'dashed' | 'dotted' | 'none';
  size: number; // Eighths of a point
  space: number;
  color: string;
}

export interface CellBorders {
  top?: BorderSpec;
  left?: BorderSpec;
  bottom?: BorderSpec;
  right?: BorderSpec;
}

export interface CellShading {
  fill: string;
}

export interface ReportTableCell {
  paragraphs: ReportParagraph[];
  shading?: CellShading;
  borders?: CellBorders;
  width?: number;
  verticalAlignment?: 'top' | 'center' | 'bottom';
}

export interface ReportTableRow {
  cells: ReportTableCell[];
}

export interface TableProperties {
  widthPercent?: number;
  alignment?: 'left' | 'center' | 'right';
  autofit?: boolean;
}

// Row 0 is the header row
export interface ReportTable {
  kind: 'table';
  rows: ReportTableRow[];
  properties: TableProperties;
}

export type ReportBlock = ReportParagraph | ReportTable;

export interface PageMargins {
  top?: number;
  bottom?: number;
  left?: number;
  right?: number;
}

// Page geometry; unset values fall back to the processor defaults
export interface ReportSection {
  pageWidth?: number;
  pageHeight?: number;
  margins: PageMargins;
}

export interface ParagraphStyleDefinition {
  font: RunFont;
  alignment?: HorizontalAlignment;
}

export interface ReportDocument {
  name: string;
  // Only the first section governs layout computations
  sections: ReportSection[];
  // Top-level paragraphs and tables in document order
  body: ReportBlock[];
  styles: Record<string, ParagraphStyleDefinition>;
}
