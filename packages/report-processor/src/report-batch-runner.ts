import type { LoggerMethods } from '@reportsmith/logger';

import type { ReportProcessResult, ReportProcessor } from './report-processor';

import { readdirSync } from 'node:fs';
import { join } from 'node:path';

import { ReportProcessingError } from './errors/report-processing-error';

export type BatchItemResult =
  | { path: string; status: 'processed'; result: ReportProcessResult }
  | { path: string; status: 'failed'; error: string };

export interface BatchRunResult {
  items: BatchItemResult[];
  processed: number;
  failed: number;
}

/**
 * ReportBatchRunner
 *
 * Processes every `*.json` document of a directory, in name order, one at a
 * time. A document that fails to load or save is logged and recorded; the
 * batch moves on to the next file.
 */
export class ReportBatchRunner {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly processor: ReportProcessor,
  ) {}

  run(inputDir: string): BatchRunResult {
    const files = ReportBatchRunner.listDocuments(inputDir);
    if (files.length === 0) {
      this.logger.warn(`[ReportBatchRunner] No documents found in ${inputDir}`);
      return { items: [], processed: 0, failed: 0 };
    }

    this.logger.info(
      `[ReportBatchRunner] Processing ${files.length} documents from ${inputDir}`,
    );

    const items: BatchItemResult[] = [];
    for (const file of files) {
      const path = join(inputDir, file);
      try {
        items.push({
          path,
          status: 'processed',
          result: this.processor.process(path),
        });
      } catch (error) {
        const message = ReportProcessingError.getErrorMessage(error);
        this.logger.error(`[ReportBatchRunner] Skipping ${path}: ${message}`);
        items.push({ path, status: 'failed', error: message });
      }
    }

    const failed = items.filter((item) => item.status === 'failed').length;
    this.logger.info(
      `[ReportBatchRunner] Batch finished: ${items.length - failed} processed, ${failed} failed`,
    );
    return { items, processed: items.length - failed, failed };
  }

  /**
   * JSON file names in `dir`, sorted
   */
  static listDocuments(dir: string): string[] {
    return readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
      .map((entry) => entry.name)
      .sort();
  }
}
