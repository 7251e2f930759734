import type { ReportDocument, ReportSection } from '@reportsmith/model';

import { DEFAULT_PAGE_GEOMETRY } from '../config/constants';
import { InvalidPageGeometryError } from '../errors/report-processing-error';

/**
 * Usable content width of a section: page width minus left and right margins.
 *
 * Unset (or zero) width and margins fall back to A4 with 1 cm side margins.
 *
 * @throws {InvalidPageGeometryError} When the result is not positive
 */
export function getUsableWidth(section: ReportSection | undefined): number {
  const pageWidth = section?.pageWidth || DEFAULT_PAGE_GEOMETRY.PAGE_WIDTH;
  const left = section?.margins.left || DEFAULT_PAGE_GEOMETRY.LEFT_MARGIN;
  const right = section?.margins.right || DEFAULT_PAGE_GEOMETRY.RIGHT_MARGIN;

  const usableWidth = pageWidth - left - right;
  if (!(usableWidth > 0)) {
    throw new InvalidPageGeometryError(usableWidth);
  }
  return usableWidth;
}

/**
 * Usable content width of the governing (first) section of a document
 */
export function getDocumentUsableWidth(doc: ReportDocument): number {
  return getUsableWidth(doc.sections[0]);
}
