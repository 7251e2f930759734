import type { LoggerMethods } from '@reportsmith/logger';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { MarkdownCleaner } from './markdown-cleaner';

describe('MarkdownCleaner', () => {
  let mockLogger: LoggerMethods;
  let cleaner: MarkdownCleaner;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    cleaner = new MarkdownCleaner(mockLogger);
  });

  describe('stripTocLinks', () => {
    test('should drop link targets inside the TOC only', () => {
      const markdown = [
        '# Monthly Report',
        '# Table of Contents',
        '[1. Azure](#1-azure)',
        '[2. AWS](#2-aws)',
        '',
        '---',
        'See [the portal](https://portal.example.com).',
      ].join('\n');

      expect(cleaner.stripTocLinks(markdown)).toBe(
        [
          '# Monthly Report',
          '# Table of Contents',
          '[1. Azure]',
          '[2. AWS]',
          '',
          '---',
          'See [the portal](https://portal.example.com).',
        ].join('\n'),
      );
    });

    test('should leave the text alone without a TOC', () => {
      const markdown = '# Report\n[1. Azure](#1-azure)\n\n---';

      expect(cleaner.stripTocLinks(markdown)).toBe(markdown);
    });

    test('should not treat a plain "Table of Contents" line as the TOC heading', () => {
      const markdown = 'Table of Contents\n[A](#a)\n\n---';

      expect(cleaner.stripTocLinks(markdown)).toBe(markdown);
    });
  });

  describe('clean', () => {
    test('should rewrite exported image folders to the image directory', () => {
      expect(
        cleaner.clean(
          '![chart](Template%20a1b2c3/chart.png)\n![logo](Template/logo.png)',
        ),
      ).toBe('![chart](Images/chart.png)\n![logo](Images/logo.png)');
    });

    test('should normalize untitled image names and labels', () => {
      expect(
        cleaner.clean('![Untitled](Template%20a1b2c3/Untitled%201.png)'),
      ).toBe('![](Images/Untitled1.png)');
    });

    test('should clean the TOC and the images in one pass', () => {
      const markdown = [
        '# Table of Contents',
        '[Executive Summary](#executive-summary)',
        '',
        '---',
        '# Executive Summary',
        '![Untitled](Template/Untitled%2012.png)',
      ].join('\n');

      expect(cleaner.clean(markdown)).toBe(
        [
          '# Table of Contents',
          '[Executive Summary]',
          '',
          '---',
          '# Executive Summary',
          '![](Images/Untitled12.png)',
        ].join('\n'),
      );
    });

    test('should use the configured export folder and image directory', () => {
      const custom = new MarkdownCleaner(mockLogger, {
        exportFolder: 'Export.v1',
        imageDir: 'assets/$1/',
      });

      expect(
        custom.clean('![a](Export.v1%20x/a.png) ![b](Exportxv1/b.png)'),
      ).toBe('![a](assets/$1/a.png) ![b](Exportxv1/b.png)');
    });

    test('should not change markdown without exported images', () => {
      const markdown = '# Report\n\nAll systems nominal.';

      expect(cleaner.clean(markdown)).toBe(markdown);
    });
  });
});
