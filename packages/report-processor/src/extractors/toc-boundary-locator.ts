import type { LoggerMethods } from '@reportsmith/logger';

import type { TocInterval } from '../types';

import { TOC_MARKERS } from '../config/constants';

/**
 * TocBoundaryLocator options
 */
export interface TocBoundaryLocatorOptions {
  /**
   * Pattern of the TOC heading (default: optional whitespace + "Table of Contents")
   */
  startMarker?: RegExp;

  /**
   * Pattern closing the TOC, searched after the heading
   * (default: blank line followed by a horizontal rule)
   */
  endMarker?: RegExp;
}

/**
 * TocBoundaryLocator
 *
 * Finds the table-of-contents region in document text using two textual
 * markers. The first start marker in document order wins; the end marker is
 * searched only in the text following it.
 *
 * A missing marker is a normal outcome and yields `{ found: false }`.
 */
export class TocBoundaryLocator {
  private readonly startMarker: RegExp;
  private readonly endMarker: RegExp;

  constructor(
    private readonly logger: LoggerMethods,
    options?: TocBoundaryLocatorOptions,
  ) {
    this.startMarker = TocBoundaryLocator.nonGlobal(
      options?.startMarker ?? TOC_MARKERS.START,
    );
    this.endMarker = TocBoundaryLocator.nonGlobal(
      options?.endMarker ?? TOC_MARKERS.END,
    );
  }

  /**
   * Locate the TOC interval `[start, end)` in the given text
   */
  locate(text: string): TocInterval {
    const startMatch = this.startMarker.exec(text);
    if (!startMatch) {
      this.logger.info('[TocBoundaryLocator] No TOC start marker found');
      return { found: false };
    }

    const startEnd = startMatch.index + startMatch[0].length;
    const endMatch = this.endMarker.exec(text.slice(startEnd));
    if (!endMatch) {
      this.logger.info(
        `[TocBoundaryLocator] TOC start marker at ${startMatch.index} has no end marker`,
      );
      return { found: false };
    }

    const interval: TocInterval = {
      found: true,
      start: startMatch.index,
      end: startEnd + endMatch.index + endMatch[0].length,
    };
    this.logger.info(
      `[TocBoundaryLocator] Found TOC at [${interval.start}, ${interval.end})`,
    );
    return interval;
  }

  /**
   * Check whether a text offset falls inside the interval.
   * Always false when no TOC was found.
   */
  static contains(interval: TocInterval, offset: number): boolean {
    return interval.found && offset >= interval.start && offset < interval.end;
  }

  /**
   * Global or sticky patterns keep `lastIndex` between calls; strip those flags
   */
  private static nonGlobal(pattern: RegExp): RegExp {
    const flags = pattern.flags.replace(/[gy]/g, '');
    return new RegExp(pattern.source, flags);
  }
}
