import type { CategoryDefinition, CategoryStyle } from './category-registry';

import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { ReportProcessingError } from '../errors/report-processing-error';
import { TABLE_CATEGORIES } from '../types';
import { CategoryRegistry } from './category-registry';

const HexColorSchema = z
  .string()
  .regex(/^[0-9A-Fa-f]{6}$/, 'Expected a six-digit hex color')
  .transform((value) => value.toUpperCase());

/**
 * Style as written in the configuration file (snake_case keys)
 */
export const CategoryStyleSchema = z
  .object({
    header_fill: HexColorSchema,
    header_font: HexColorSchema,
    content_fill_1: HexColorSchema,
    content_fill_2: HexColorSchema,
    content_font: HexColorSchema,
  })
  .strict()
  .transform(
    (style): CategoryStyle => ({
      headerFill: style.header_fill,
      headerFont: style.header_font,
      contentFill1: style.content_fill_1,
      contentFill2: style.content_fill_2,
      contentFont: style.content_font,
    }),
  );

export const MatchSpecSchema = z
  .object({
    exact: z.array(z.array(z.string()).min(1)).default([]),
    shapes: z
      .array(
        z
          .object({
            length: z.number().int().positive(),
            emptyAt: z.array(z.number().int().nonnegative()).min(1),
          })
          .refine(
            (shape) =>
              shape.emptyAt.every((position) => position < shape.length),
            {
              message: 'Empty positions must be less than the header length',
              path: ['emptyAt'],
            },
          ),
      )
      .default([]),
  })
  .strict()
  .refine((spec) => spec.exact.length > 0 || spec.shapes.length > 0, {
    message: 'A category needs at least one exact header or shape',
  });

/**
 * Configuration artifact: `{ category: { match, style } }`, e.g.
 *
 * ```json
 * {
 *   "websites": {
 *     "match": { "exact": [["Website", "Uptime"]] },
 *     "style": {
 *       "header_fill": "7030A0",
 *       "header_font": "FFFFFF",
 *       "content_fill_1": "E4DFEC",
 *       "content_fill_2": "CCC0DA",
 *       "content_font": "000000"
 *     }
 *   }
 * }
 * ```
 *
 * Keys are limited to the known categories.
 */
export const CategoryRegistryConfigSchema = z.record(
  z.enum(TABLE_CATEGORIES),
  z.object({ match: MatchSpecSchema, style: CategoryStyleSchema }).strict(),
);

export type CategoryRegistryConfig = z.infer<
  typeof CategoryRegistryConfigSchema
>;

/**
 * Build a CategoryRegistry from an already-parsed configuration object
 *
 * @throws {ReportProcessingError} When the configuration is invalid
 */
export function parseCategoryRegistryConfig(input: unknown): CategoryRegistry {
  const result = CategoryRegistryConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ReportProcessingError(
      `Invalid category registry configuration: ${issues}`,
    );
  }

  const definitions: CategoryDefinition[] = [];
  for (const category of TABLE_CATEGORIES) {
    const entry = result.data[category];
    if (entry) {
      definitions.push({ category, match: entry.match, style: entry.style });
    }
  }

  return new CategoryRegistry(definitions);
}

/**
 * Read and parse a category registry configuration file (JSON)
 *
 * @throws {ReportProcessingError} When the file cannot be read, is not JSON,
 * or is not a valid configuration
 */
export function loadCategoryRegistryConfig(path: string): CategoryRegistry {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw ReportProcessingError.fromError(
      `Failed to read category registry configuration ${path}`,
      error,
    );
  }
  return parseCategoryRegistryConfig(raw);
}
