/**
 * Length units (EMU = English Metric Unit)
 */
export const UNITS = {
  EMU_PER_INCH: 914400,
  EMU_PER_CM: 360000,
  EMU_PER_MM: 36000,
  EMU_PER_PT: 12700,
} as const;

/**
 * Page geometry used when a section leaves width or margins unset
 */
export const DEFAULT_PAGE_GEOMETRY = {
  /**
   * A4 width (210 mm)
   */
  PAGE_WIDTH: 210 * UNITS.EMU_PER_MM,

  LEFT_MARGIN: UNITS.EMU_PER_CM,

  RIGHT_MARGIN: UNITS.EMU_PER_CM,
} as const;

/**
 * Margins applied to every section during page setup (1 cm each side)
 */
export const DEFAULT_PAGE_MARGINS = {
  top: UNITS.EMU_PER_CM,
  bottom: UNITS.EMU_PER_CM,
  left: UNITS.EMU_PER_CM,
  right: UNITS.EMU_PER_CM,
} as const;

/**
 * Font applied to styled table cells and body text
 */
export const REPORT_FONT = {
  NAME: 'Open Sans',
  SIZE_PT: 10,
} as const;

/**
 * Border applied to every side of a styled table cell
 */
export const CELL_BORDER = {
  style: 'single',
  size: 4,
  space: 0,
  color: 'auto',
} as const;

/**
 * Section titles that always start on a new page, checked before the
 * configurable prefixes
 */
export const PRIMARY_SECTION_PREFIXES = [
  'Executive Summary',
  'Appendix',
] as const;

/**
 * Default configurable section-title prefixes
 */
export const DEFAULT_SECTION_PREFIXES = [
  '1. Azure',
  '2. AWS',
  '3. WP Engine',
  '4. Cisco Meraki',
  '5. Barracuda',
  '6. Websites',
] as const;

/**
 * Markers bounding the table of contents in plain document text
 */
export const TOC_MARKERS = {
  START: /\s*Table of Contents/,
  END: /\n\n---/,
} as const;

/**
 * Markers bounding the table of contents in markdown source
 */
export const MARKDOWN_TOC_MARKERS = {
  START: /\s*# Table of Contents/,
  END: /\n\n---/,
} as const;

/**
 * Separator placed between paragraph texts when building document text
 */
export const PARAGRAPH_SEPARATOR = '\n';
