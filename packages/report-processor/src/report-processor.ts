import type { LoggerMethods } from '@reportsmith/logger';
import type { PageMargins, ReportDocument } from '@reportsmith/model';

import type { BodyFont } from './formatters/document-formatter';
import type {
  PipelineStage,
  PrefixMatchMode,
  StageReport,
  TableCategory,
  TocInterval,
} from './types';

import { TableClassifier } from './classifiers/table-classifier';
import { CategoryRegistry } from './config/category-registry';
import {
  DEFAULT_PAGE_MARGINS,
  DEFAULT_SECTION_PREFIXES,
  REPORT_FONT,
} from './config/constants';
import {
  ReportProcessingError,
  StageError,
} from './errors/report-processing-error';
import { TocBoundaryLocator } from './extractors/toc-boundary-locator';
import { DocumentFormatter } from './formatters/document-formatter';
import { ImageAutofitScaler } from './formatters/image-autofit-scaler';
import { SectionBreakInserter } from './formatters/section-break-inserter';
import { DocumentStore } from './store/document-store';
import { TableStyler } from './stylers/table-styler';
import { tablesOf } from './utils/document-utils';
import { getDocumentUsableWidth } from './utils/page-geometry';
import { ParagraphIndex } from './utils/paragraph-index';

/**
 * ReportProcessor Options
 */
export interface ReportProcessorOptions {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Table categories and their styles (default: compiled-in registry)
   */
  registry?: CategoryRegistry;

  /**
   * Section-title prefixes that start a new page (default: DEFAULT_SECTION_PREFIXES)
   */
  sectionPrefixes?: readonly string[];

  /**
   * How section-title prefixes are matched (default: 'startsWith')
   */
  prefixMatchMode?: PrefixMatchMode;

  /**
   * Margins applied to every section on load (default: 1 cm on all sides).
   * Set to null to keep the document's own margins.
   */
  pageMargins?: Required<PageMargins> | null;

  /**
   * Font applied to body text (default: Open Sans 10pt)
   */
  bodyFont?: BodyFont;

  /**
   * Document persistence (default: JSON DocumentStore)
   */
  store?: DocumentStore;
}

/**
 * Result of processing one document
 */
export interface ReportProcessResult {
  documentName: string;
  path: string;
  tocInterval: TocInterval;

  /**
   * Category assigned to each table, in document order
   */
  categories: TableCategory[];

  breaksInserted: number;
  imagesResized: number;
  stages: StageReport[];
}

/**
 * Outcome of the in-memory stages
 */
export type ReportTransformResult = Omit<
  ReportProcessResult,
  'documentName' | 'path'
>;

/**
 * ReportProcessor
 *
 * Runs the post-processing pipeline over one report document:
 *
 * 1. Load (and normalize page margins)
 * 2. Classify tables and apply category styles
 * 3. Insert section page breaks (outside the TOC)
 * 4. Autofit inline images to the page width
 * 5. Document formatting (body font, heading styles, table layout)
 * 6. Save
 *
 * Stages 2-5 are isolated: a failure is logged with the document, stage and
 * item involved, and the next stage still runs. Load and save failures are
 * fatal. Every run is independent; nothing is carried between documents.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger } from '@reportsmith/logger';
 * import { ReportProcessor } from '@reportsmith/report-processor';
 *
 * const processor = new ReportProcessor({
 *   logger: createConsoleLogger(),
 *   sectionPrefixes: ['1. Azure', '2. AWS'],
 * });
 *
 * const result = processor.process('output/monthly-report.json');
 * ```
 */
export class ReportProcessor {
  private readonly logger: LoggerMethods;
  private readonly registry: CategoryRegistry;
  private readonly sectionPrefixes: readonly string[];
  private readonly prefixMatchMode: PrefixMatchMode;
  private readonly pageMargins: Required<PageMargins> | null;
  private readonly bodyFont: BodyFont;
  private readonly store: DocumentStore;
  private readonly tocLocator: TocBoundaryLocator;
  private readonly classifier: TableClassifier;
  private readonly breakInserter: SectionBreakInserter;
  private readonly imageScaler: ImageAutofitScaler;
  private readonly formatter: DocumentFormatter;

  constructor(options: ReportProcessorOptions) {
    this.logger = options.logger;
    this.registry = options.registry ?? CategoryRegistry.createDefault();
    this.sectionPrefixes = options.sectionPrefixes ?? DEFAULT_SECTION_PREFIXES;
    this.prefixMatchMode = options.prefixMatchMode ?? 'startsWith';
    this.pageMargins =
      options.pageMargins === undefined
        ? { ...DEFAULT_PAGE_MARGINS }
        : options.pageMargins;
    this.bodyFont = options.bodyFont ?? {
      name: REPORT_FONT.NAME,
      size: REPORT_FONT.SIZE_PT,
    };
    this.store = options.store ?? new DocumentStore(this.logger);

    this.tocLocator = new TocBoundaryLocator(this.logger);
    this.classifier = new TableClassifier(this.logger, this.registry);
    this.breakInserter = new SectionBreakInserter(this.logger);
    this.imageScaler = new ImageAutofitScaler(this.logger);
    this.formatter = new DocumentFormatter(this.logger);
  }

  /**
   * Load, transform and save the document at `path`.
   * The result overwrites the same file unless `outputPath` is given.
   *
   * @throws {DocumentLoadError} When the document cannot be loaded
   * @throws {DocumentSaveError} When the result cannot be saved
   */
  process(path: string, outputPath: string = path): ReportProcessResult {
    this.logger.info(`[ReportProcessor] Processing ${path}...`);

    const loadStart = Date.now();
    let doc: ReportDocument;
    try {
      doc = this.store.load(path);
      if (this.pageMargins) {
        this.formatter.applyPageMargins(doc, this.pageMargins);
      }
    } catch (error) {
      this.logger.error(
        `[ReportProcessor] Load failed for ${path}: ${ReportProcessingError.getErrorMessage(error)}`,
      );
      throw error;
    }
    const loadReport = this.completed('load', loadStart);

    const transformed = this.transform(doc);

    const saveStart = Date.now();
    try {
      this.store.save(doc, outputPath);
    } catch (error) {
      this.logger.error(
        `[ReportProcessor] Save failed for "${doc.name}": ${ReportProcessingError.getErrorMessage(error)}`,
      );
      throw error;
    }
    const saveReport = this.completed('save', saveStart);

    const stages = [loadReport, ...transformed.stages, saveReport];
    const failed = stages.filter((stage) => stage.status === 'failed');
    this.logger.info(
      `[ReportProcessor] Finished "${doc.name}" with ${failed.length} failed stages`,
    );

    return {
      ...transformed,
      documentName: doc.name,
      path: outputPath,
      stages,
    };
  }

  /**
   * Run the in-memory stages (classify+style, section breaks, image autofit,
   * formatting) on an already loaded document
   */
  transform(doc: ReportDocument): ReportTransformResult {
    const stages: StageReport[] = [];
    const categories: TableCategory[] = [];
    let breaksInserted = 0;
    let imagesResized = 0;

    // Located once, before any stage inserts paragraphs
    const tocInterval = this.tocLocator.locate(
      new ParagraphIndex(doc).plainText,
    );

    stages.push(
      this.runStage('classify-style', doc.name, () => {
        this.classifyAndStyleTables(doc, categories);
      }),
    );

    stages.push(
      this.runStage('section-breaks', doc.name, () => {
        breaksInserted = this.breakInserter.insert(
          doc,
          tocInterval,
          this.sectionPrefixes,
          this.prefixMatchMode,
        ).inserted;
      }),
    );

    stages.push(
      this.runStage('image-autofit', doc.name, () => {
        imagesResized = this.imageScaler.autofit(doc).resized;
      }),
    );

    stages.push(
      this.runStage('formatting', doc.name, () => {
        this.formatter.applyBodyFont(doc, this.bodyFont);
        this.formatter.applyHeadingStyles(doc);
        this.formatter.applyTableLayout(doc);
      }),
    );

    return { tocInterval, categories, breaksInserted, imagesResized, stages };
  }

  /**
   * Classify every table and style the ones with a known category.
   * Categories are appended as tables are classified.
   */
  private classifyAndStyleTables(
    doc: ReportDocument,
    categories: TableCategory[],
  ): void {
    const usableWidth = getDocumentUsableWidth(doc);

    tablesOf(doc).forEach((table, tableIndex) => {
      try {
        const category = this.classifier.classify(table);
        categories.push(category);
        if (category === 'none') {
          this.logger.debug(
            `[ReportProcessor] Table ${tableIndex} is unclassified, left unstyled`,
          );
          return;
        }

        const style = this.registry.getStyle(category);
        if (!style) {
          throw new ReportProcessingError(
            `No style registered for category "${category}"`,
          );
        }
        TableStyler.apply(table, style, usableWidth);
      } catch (error) {
        throw StageError.wrap('classify-style', `table ${tableIndex}`, error);
      }
    });

    const styled = categories.filter((category) => category !== 'none');
    this.logger.info(
      `[ReportProcessor] Styled ${styled.length} of ${categories.length} tables`,
    );
  }

  private runStage(
    stage: PipelineStage,
    documentName: string,
    fn: () => void,
  ): StageReport {
    const startTime = Date.now();
    try {
      fn();
    } catch (error) {
      const message = ReportProcessingError.getErrorMessage(error);
      this.logger.error(
        `[ReportProcessor] Stage "${stage}" failed for "${documentName}": ${message}`,
        error,
      );
      return {
        stage,
        status: 'failed',
        durationMs: Date.now() - startTime,
        error: message,
      };
    }
    return this.completed(stage, startTime);
  }

  private completed(stage: PipelineStage, startTime: number): StageReport {
    const durationMs = Date.now() - startTime;
    this.logger.info(`[ReportProcessor] Stage "${stage}" took ${durationMs}ms`);
    return { stage, status: 'completed', durationMs };
  }
}
