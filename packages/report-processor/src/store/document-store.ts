import type { LoggerMethods } from '@reportsmith/logger';
import type { ReportDocument } from '@reportsmith/model';

import { writeFileAtomic } from '@reportsmith/shared';
import { readFileSync } from 'node:fs';

import {
  DocumentLoadError,
  DocumentSaveError,
  ReportProcessingError,
} from '../errors/report-processing-error';
import { ReportDocumentSchema } from './report-document-schema';

/**
 * DocumentStore
 *
 * Reads and writes report documents as JSON files. Loaded content is
 * validated against the content model; saves replace the file atomically.
 */
export class DocumentStore {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * @throws {DocumentLoadError} When the file is unreadable, not JSON, or not a report document
   */
  load(path: string): ReportDocument {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new DocumentLoadError(
        path,
        ReportProcessingError.getErrorMessage(error),
        { cause: error },
      );
    }

    const result = ReportDocumentSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new DocumentLoadError(path, issues, { cause: result.error });
    }

    const doc: ReportDocument = result.data;
    this.logger.info(
      `[DocumentStore] Loaded "${doc.name}" from ${path} (${doc.body.length} blocks, ${doc.sections.length} sections)`,
    );
    return doc;
  }

  /**
   * @throws {DocumentSaveError} When the file cannot be written; the previous content is kept
   */
  save(doc: ReportDocument, path: string): void {
    try {
      writeFileAtomic(path, `${JSON.stringify(doc, null, 2)}\n`);
    } catch (error) {
      throw new DocumentSaveError(
        path,
        ReportProcessingError.getErrorMessage(error),
        { cause: error },
      );
    }
    this.logger.info(`[DocumentStore] Saved "${doc.name}" to ${path}`);
  }
}
