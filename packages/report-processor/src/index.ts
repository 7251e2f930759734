/**
 * @reportsmith/report-processor
 *
 * Post-processing pipeline that turns a generated report document into its
 * final, consistently formatted form.
 *
 * ## Key Features
 *
 * - TOC boundary location
 * - Header-based table classification and category styling
 * - Page breaks before section titles (outside the TOC)
 * - Inline image autofit to the page width
 * - Body font, heading styles, table layout and page margins
 * - Batch processing of a document directory
 * - Markdown cleanup of exported sources
 *
 * @packageDocumentation
 */

export { ReportProcessor } from './report-processor';
export type {
  ReportProcessorOptions,
  ReportProcessResult,
  ReportTransformResult,
} from './report-processor';
export { ReportBatchRunner } from './report-batch-runner';
export type { BatchItemResult, BatchRunResult } from './report-batch-runner';
export { TocBoundaryLocator } from './extractors/toc-boundary-locator';
export type { TocBoundaryLocatorOptions } from './extractors/toc-boundary-locator';
export { TableClassifier } from './classifiers/table-classifier';
export {
  CategoryRegistry,
  DEFAULT_CATEGORY_DEFINITIONS,
  createHeaderPredicate,
} from './config/category-registry';
export type {
  CategoryDefinition,
  CategoryRegistryEntry,
  CategoryStyle,
  HeaderPredicate,
  MatchSpec,
  ShapeSpec,
} from './config/category-registry';
export {
  CategoryRegistryConfigSchema,
  loadCategoryRegistryConfig,
  parseCategoryRegistryConfig,
} from './config/category-registry-config';
export type { CategoryRegistryConfig } from './config/category-registry-config';
export {
  CELL_BORDER,
  DEFAULT_PAGE_GEOMETRY,
  DEFAULT_PAGE_MARGINS,
  DEFAULT_SECTION_PREFIXES,
  MARKDOWN_TOC_MARKERS,
  PRIMARY_SECTION_PREFIXES,
  REPORT_FONT,
  TOC_MARKERS,
  UNITS,
} from './config/constants';
export { TableStyler } from './stylers/table-styler';
export { SectionBreakInserter } from './formatters/section-break-inserter';
export type {
  BreakRule,
  SectionBreakResult,
} from './formatters/section-break-inserter';
export { ImageAutofitScaler } from './formatters/image-autofit-scaler';
export type { ImageAutofitResult } from './formatters/image-autofit-scaler';
export {
  DocumentFormatter,
  REPORT_HEADING_STYLES,
} from './formatters/document-formatter';
export type { BodyFont } from './formatters/document-formatter';
export { DocumentStore } from './store/document-store';
export { ReportDocumentSchema } from './store/report-document-schema';
export type { ReportDocumentInput } from './store/report-document-schema';
export { MarkdownCleaner } from './cleaners/markdown-cleaner';
export type { MarkdownCleanerOptions } from './cleaners/markdown-cleaner';
export { ParagraphIndex } from './utils/paragraph-index';
export type { ParagraphIndexEntry } from './utils/paragraph-index';
export { getDocumentUsableWidth, getUsableWidth } from './utils/page-geometry';
export {
  ReportProcessingError,
  DocumentLoadError,
  DocumentSaveError,
  InvalidPageGeometryError,
  StageError,
} from './errors/report-processing-error';
export { TABLE_CATEGORIES } from './types';
export type {
  HeaderSignature,
  PipelineStage,
  PrefixMatchMode,
  StageReport,
  StyledCategory,
  TableCategory,
  TocInterval,
} from './types';
