import type { LoggerMethods } from '@reportsmith/logger';
import type { InlineImage, ReportDocument } from '@reportsmith/model';

import { StageError } from '../errors/report-processing-error';
import { collectInlineImages } from '../utils/document-utils';
import { getDocumentUsableWidth } from '../utils/page-geometry';

export interface ImageAutofitResult {
  resized: number;
  skipped: number;
}

/**
 * ImageAutofitScaler
 *
 * Stretches every inline image to the usable content width of the governing
 * section and derives the height from the image's intrinsic aspect ratio:
 *
 *   height = round(width * pixelHeight / pixelWidth)
 *
 * Images without a positive intrinsic size are skipped. Any other failure
 * is raised as a StageError naming the image.
 */
export class ImageAutofitScaler {
  constructor(private readonly logger: LoggerMethods) {}

  autofit(doc: ReportDocument): ImageAutofitResult {
    const usableWidth = getDocumentUsableWidth(doc);
    const images = collectInlineImages(doc);
    const result: ImageAutofitResult = { resized: 0, skipped: 0 };

    images.forEach((image, imageIndex) => {
      try {
        if (!ImageAutofitScaler.hasValidIntrinsicSize(image)) {
          this.logger.warn(
            `[ImageAutofitScaler] Image ${imageIndex} (${image.source}) has no valid intrinsic size (${image.pixelWidth}x${image.pixelHeight}), skipped`,
          );
          result.skipped++;
          return;
        }

        ImageAutofitScaler.resize(image, usableWidth);
        result.resized++;
        this.logger.debug(
          `[ImageAutofitScaler] Image ${imageIndex} resized to ${image.width}x${image.height} EMU`,
        );
      } catch (error) {
        throw StageError.wrap('image-autofit', `image ${imageIndex}`, error);
      }
    });

    this.logger.info(
      `[ImageAutofitScaler] Resized ${result.resized} images to ${usableWidth} EMU wide (${result.skipped} skipped)`,
    );
    return result;
  }

  /**
   * Resize one image to `width`, preserving its intrinsic aspect ratio
   */
  static resize(image: InlineImage, width: number): void {
    image.width = width;
    image.height = Math.round((width * image.pixelHeight) / image.pixelWidth);
  }

  static hasValidIntrinsicSize(image: InlineImage): boolean {
    return (
      Number.isFinite(image.pixelWidth) &&
      Number.isFinite(image.pixelHeight) &&
      image.pixelWidth > 0 &&
      image.pixelHeight > 0
    );
  }
}
