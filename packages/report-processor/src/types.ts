/**
 * Table of contents location as a half-open text-offset interval
 */
export type TocInterval =
  | {
      found: true;

      /**
       * Offset of the first character of the TOC region
       */
      start: number;

      /**
       * Offset one past the last character of the TOC region
       */
      end: number;
    }
  | { found: false };

/**
 * Table categories known to the classifier
 */
export const TABLE_CATEGORIES = [
  'azure',
  'wpengine',
  'cisco',
  'barracuda',
  'websites',
  'summary',
] as const;

export type StyledCategory = (typeof TABLE_CATEGORIES)[number];

/**
 * Classification result; 'none' means the table is left unstyled
 */
export type TableCategory = StyledCategory | 'none';

/**
 * Header Signature
 *
 * Classification key extracted from the header row of a table.
 */
export interface HeaderSignature {
  /**
   * Trimmed header cell texts with empty cells dropped (exact comparisons)
   */
  texts: string[];

  /**
   * Trimmed header cell texts including empty ones (positional comparisons)
   */
  cells: string[];
}

/**
 * Section-title prefix matching mode
 */
export type PrefixMatchMode = 'startsWith' | 'contains';

/**
 * Pipeline stages in execution order
 */
export type PipelineStage =
  | 'load'
  | 'classify-style'
  | 'section-breaks'
  | 'image-autofit'
  | 'formatting'
  | 'save';

/**
 * Outcome of a single pipeline stage
 */
export interface StageReport {
  stage: PipelineStage;
  status: 'completed' | 'failed';
  durationMs: number;

  /**
   * Error message when the stage failed
   */
  error?: string;
}
