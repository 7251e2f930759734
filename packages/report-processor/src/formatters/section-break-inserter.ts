import type { LoggerMethods } from '@reportsmith/logger';
import type { ReportDocument } from '@reportsmith/model';

import type { PrefixMatchMode, TocInterval } from '../types';
import type { ParagraphIndexEntry } from '../utils/paragraph-index';

import { PRIMARY_SECTION_PREFIXES } from '../config/constants';
import { StageError } from '../errors/report-processing-error';
import { TocBoundaryLocator } from '../extractors/toc-boundary-locator';
import {
  createPageBreakParagraph,
  isPageBreakParagraph,
} from '../utils/document-utils';
import { ParagraphIndex } from '../utils/paragraph-index';

export interface BreakRule {
  prefixes: readonly string[];
  mode: PrefixMatchMode;
}

export interface SectionBreakResult {
  /**
   * Number of page-break paragraphs inserted
   */
  inserted: number;

  /**
   * Matching paragraphs skipped because they lie in the TOC region
   */
  skippedInToc: number;

  /**
   * Matching paragraphs already preceded by a page break
   */
  alreadyBroken: number;
}

/**
 * SectionBreakInserter
 *
 * Forces section titles onto a new page by inserting an empty paragraph that
 * holds a page break directly before each matching top-level paragraph.
 *
 * Rules, in order (first matching prefix wins, one break per paragraph):
 * 1. PRIMARY_SECTION_PREFIXES, matched with startsWith
 * 2. Configured prefixes, matched with the configured mode
 *
 * Paragraphs inside the TOC interval are skipped, as is any repeat of a
 * paragraph text that already received a break in the same pass. Paragraphs
 * already preceded by a page break are left alone, so running the inserter
 * again adds nothing.
 *
 * @throws {StageError} Naming the paragraph whose processing failed
 */
export class SectionBreakInserter {
  constructor(private readonly logger: LoggerMethods) {}

  insert(
    doc: ReportDocument,
    tocInterval: TocInterval,
    prefixes: readonly string[],
    mode: PrefixMatchMode = 'startsWith',
  ): SectionBreakResult {
    const rules: BreakRule[] = [
      { prefixes: PRIMARY_SECTION_PREFIXES, mode: 'startsWith' },
      { prefixes, mode },
    ];

    const index = new ParagraphIndex(doc);
    const brokenTexts = new Set<string>();
    const targets: ParagraphIndexEntry[] = [];
    const result: SectionBreakResult = {
      inserted: 0,
      skippedInToc: 0,
      alreadyBroken: 0,
    };

    for (const entry of index.entries) {
      try {
        const text = entry.text.trim();
        const prefix = SectionBreakInserter.findMatchingPrefix(text, rules);
        if (prefix === null) {
          continue;
        }

        if (TocBoundaryLocator.contains(tocInterval, entry.offset)) {
          result.skippedInToc++;
          continue;
        }

        if (brokenTexts.has(text)) {
          this.logger.debug(
            `[SectionBreakInserter] Paragraph ${entry.ordinal} repeats "${text}", skipped`,
          );
          continue;
        }
        brokenTexts.add(text);

        const previous = doc.body[entry.blockIndex - 1];
        if (previous?.kind === 'paragraph' && isPageBreakParagraph(previous)) {
          result.alreadyBroken++;
          continue;
        }

        this.logger.debug(
          `[SectionBreakInserter] Paragraph ${entry.ordinal} matches "${prefix}"`,
        );
        targets.push(entry);
      } catch (error) {
        throw StageError.wrap(
          'section-breaks',
          `paragraph ${entry.ordinal}`,
          error,
        );
      }
    }

    // Insert from the end so pending block positions stay valid
    for (const entry of targets.reverse()) {
      try {
        doc.body.splice(entry.blockIndex, 0, createPageBreakParagraph());
        result.inserted++;
      } catch (error) {
        throw StageError.wrap(
          'section-breaks',
          `paragraph ${entry.ordinal}`,
          error,
        );
      }
    }

    this.logger.info(
      `[SectionBreakInserter] Inserted ${result.inserted} page breaks (${result.skippedInToc} in TOC, ${result.alreadyBroken} already broken)`,
    );
    return result;
  }

  /**
   * First prefix of the first rule matching the trimmed paragraph text
   */
  static findMatchingPrefix(
    text: string,
    rules: readonly BreakRule[],
  ): string | null {
    if (text === '') {
      return null;
    }
    for (const rule of rules) {
      for (const prefix of rule.prefixes) {
        if (prefix === '') {
          continue;
        }
        const matched =
          rule.mode === 'contains'
            ? text.includes(prefix)
            : text.startsWith(prefix);
        if (matched) {
          return prefix;
        }
      }
    }
    return null;
  }
}
