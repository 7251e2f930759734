import type { LoggerMethods } from '@reportsmith/logger';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { TocBoundaryLocator } from './toc-boundary-locator';

describe('TocBoundaryLocator', () => {
  let mockLogger: LoggerMethods;
  let locator: TocBoundaryLocator;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    locator = new TocBoundaryLocator(mockLogger);
  });

  describe('locate', () => {
    test('should return the interval from the start marker to the end of the end marker', () => {
      const text = 'Intro\nTable of Contents\n1. Azure\n2. AWS\n\n---\nBody';

      expect(locator.locate(text)).toEqual({ found: true, start: 5, end: 44 });
      expect(mockLogger.info).toHaveBeenCalledWith(
        '[TocBoundaryLocator] Found TOC at [5, 44)',
      );
    });

    test('should include leading whitespace in the start offset', () => {
      const text = '  Table of Contents\n\n---';

      expect(locator.locate(text)).toEqual({ found: true, start: 0, end: 24 });
    });

    test('should report not found without a start marker', () => {
      expect(locator.locate('Intro\n\n---\nBody')).toEqual({ found: false });
      expect(mockLogger.info).toHaveBeenCalledWith(
        '[TocBoundaryLocator] No TOC start marker found',
      );
    });

    test('should report not found without an end marker after the start', () => {
      const text = 'Intro\n\n---\nTable of Contents\n1. Azure';

      expect(locator.locate(text)).toEqual({ found: false });
    });

    test('should use the first start marker in document order', () => {
      const text =
        'Table of Contents\nA\n\n---\nTable of Contents\nB\n\n---';

      expect(locator.locate(text)).toEqual({ found: true, start: 0, end: 24 });
    });

    test('should accept custom markers', () => {
      const custom = new TocBoundaryLocator(mockLogger, {
        startMarker: /Contents:/,
        endMarker: /=+/,
      });

      expect(custom.locate('xx Contents: a b ===== rest')).toEqual({
        found: true,
        start: 3,
        end: 22,
      });
    });

    test('should give the same result on repeated calls with a global marker', () => {
      const custom = new TocBoundaryLocator(mockLogger, {
        startMarker: /Table of Contents/g,
        endMarker: /\n\n---/g,
      });
      const text = 'Table of Contents\nA\n\n---';

      expect(custom.locate(text)).toEqual({ found: true, start: 0, end: 24 });
      expect(custom.locate(text)).toEqual({ found: true, start: 0, end: 24 });
    });
  });

  describe('contains', () => {
    const interval = { found: true, start: 120, end: 540 } as const;

    test('should treat the interval as half-open', () => {
      expect(TocBoundaryLocator.contains(interval, 119)).toBe(false);
      expect(TocBoundaryLocator.contains(interval, 120)).toBe(true);
      expect(TocBoundaryLocator.contains(interval, 300)).toBe(true);
      expect(TocBoundaryLocator.contains(interval, 539)).toBe(true);
      expect(TocBoundaryLocator.contains(interval, 540)).toBe(false);
      expect(TocBoundaryLocator.contains(interval, 900)).toBe(false);
    });

    test('should never contain an offset when no TOC was found', () => {
      expect(TocBoundaryLocator.contains({ found: false }, 0)).toBe(false);
    });
  });
});
