import type { LoggerMethods } from '@reportsmith/logger';

import { escapeRegExp } from 'es-toolkit';

import { MARKDOWN_TOC_MARKERS } from '../config/constants';
import { TocBoundaryLocator } from '../extractors/toc-boundary-locator';

/**
 * MarkdownCleaner options
 */
export interface MarkdownCleanerOptions {
  /**
   * Folder name the exporter writes images under (default: 'Template').
   * Exported paths look like `Template%20abc123/image.png` or `Template/image.png`.
   */
  exportFolder?: string;

  /**
   * Directory prefix that replaces the export folder in image paths,
   * including the trailing slash (default: 'Images/')
   */
  imageDir?: string;
}

const TOC_LINK_PATTERN = /\[.*?\]\(.*?\)/g;
const UNTITLED_ENCODED_PATTERN = /Untitled%20(\d+)/g;
const UNTITLED_LABEL_PATTERN = /\[Untitled\]/g;

/**
 * MarkdownCleaner
 *
 * Prepares exported markdown before conversion into a report document:
 *
 * - links inside the TOC region lose their targets (`[label](#x)` → `[label]`)
 * - exported image folders are rewritten to the image directory
 * - `Untitled%20N` image names become `UntitledN`; `[Untitled]` labels become `[]`
 *
 * Plain string processing; the markdown is never parsed.
 */
export class MarkdownCleaner {
  private readonly tocLocator: TocBoundaryLocator;
  private readonly encodedFolderPattern: RegExp;
  private readonly folderPattern: RegExp;
  private readonly exportFolder: string;
  private readonly imageDir: string;

  constructor(
    private readonly logger: LoggerMethods,
    options?: MarkdownCleanerOptions,
  ) {
    this.exportFolder = options?.exportFolder ?? 'Template';
    this.imageDir = options?.imageDir ?? 'Images/';

    const folder = escapeRegExp(this.exportFolder);
    this.encodedFolderPattern = new RegExp(`${folder}%.*?/`, 'g');
    this.folderPattern = new RegExp(`${folder}/`, 'g');

    this.tocLocator = new TocBoundaryLocator(logger, {
      startMarker: MARKDOWN_TOC_MARKERS.START,
      endMarker: MARKDOWN_TOC_MARKERS.END,
    });
  }

  clean(markdown: string): string {
    let result = this.stripTocLinks(markdown);

    result = result
      .replace(this.encodedFolderPattern, () => `${this.exportFolder}/`)
      .replace(this.folderPattern, () => this.imageDir)
      .replace(UNTITLED_ENCODED_PATTERN, 'Untitled$1')
      .replace(UNTITLED_LABEL_PATTERN, '[]');

    this.logger.debug(
      `[MarkdownCleaner] Cleaned ${markdown.length} chars into ${result.length} chars`,
    );
    return result;
  }

  /**
   * Replace `[label](target)` with `[label]` inside the TOC region only
   */
  stripTocLinks(markdown: string): string {
    const interval = this.tocLocator.locate(markdown);
    if (!interval.found) {
      return markdown;
    }

    const section = markdown
      .slice(interval.start, interval.end)
      .replace(TOC_LINK_PATTERN, (link) => `${link.split(']')[0]}]`);

    return (
      markdown.slice(0, interval.start) + section + markdown.slice(interval.end)
    );
  }
}
