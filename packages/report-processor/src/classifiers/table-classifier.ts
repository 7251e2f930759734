import type { LoggerMethods } from '@reportsmith/logger';
import type { ReportTable } from '@reportsmith/model';

import type { CategoryRegistry } from '../config/category-registry';
import type { HeaderSignature, TableCategory } from '../types';

import { getCellText } from '../utils/document-utils';

/**
 * TableClassifier
 *
 * Fingerprints a table from its header row and matches the fingerprint
 * against the registry. Evaluation follows registry order and stops at the
 * first matching category; tables that match nothing (or are malformed) are
 * classified as 'none'.
 */
export class TableClassifier {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly registry: CategoryRegistry,
  ) {}

  /**
   * Extract the header signature of a table
   *
   * @returns null when the table has no rows, rows of different lengths, or a
   * header row without any text
   */
  static extractSignature(table: ReportTable): HeaderSignature | null {
    const [header] = table.rows;
    if (!header || header.cells.length === 0) {
      return null;
    }

    const width = header.cells.length;
    if (table.rows.some((row) => row.cells.length !== width)) {
      return null;
    }

    const cells = header.cells.map((cell) => getCellText(cell).trim());
    const texts = cells.filter((text) => text !== '');
    if (texts.length === 0) {
      return null;
    }

    return { texts, cells };
  }

  /**
   * Classify a table by its header signature
   */
  classify(table: ReportTable): TableCategory {
    const signature = TableClassifier.extractSignature(table);
    if (!signature) {
      this.logger.debug(
        '[TableClassifier] Malformed or empty header, classified as none',
      );
      return 'none';
    }
    return this.classifySignature(signature);
  }

  /**
   * Classify an already extracted signature
   */
  classifySignature(signature: HeaderSignature): TableCategory {
    for (const entry of this.registry.entries) {
      if (this.safeMatch(entry.category, entry.matches, signature)) {
        return entry.category;
      }
    }
    return 'none';
  }

  private safeMatch(
    category: string,
    predicate: (signature: HeaderSignature) => boolean,
    signature: HeaderSignature,
  ): boolean {
    try {
      return predicate(signature);
    } catch (error) {
      this.logger.warn(
        `[TableClassifier] Predicate for "${category}" failed, treating as no match:`,
        error,
      );
      return false;
    }
  }
}
