export type {
  BorderSpec,
  BreakRun,
  CellBorders,
  CellShading,
  HorizontalAlignment,
  ImageRun,
  InlineImage,
  PageMargins,
  ParagraphStyleDefinition,
  ReportBlock,
  ReportDocument,
  ReportParagraph,
  ReportRun,
  ReportSection,
  ReportTable,
  ReportTableCell,
  ReportTableRow,
  RunFont,
  TableProperties,
  TextRun,
} from './report-document';
