import { z } from 'zod';

/** Zod schema for character formatting */
const RunFontSchema = z.object({
  name: z.string().optional(),
  size: z.number().positive().optional(),
  bold: z.boolean().optional(),
  color: z.string().optional(),
});

const InlineImageSchema = z.object({
  source: z.string(),
  pixelWidth: z.number(),
  pixelHeight: z.number(),
  width: z.number().nonnegative(),
  height: z.number().nonnegative(),
});

const ReportRunSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('text'),
    text: z.string(),
    font: RunFontSchema.default({}),
  }),
  z.object({
    kind: z.literal('break'),
    breakType: z.enum(['page', 'line']),
  }),
  z.object({
    kind: z.literal('image'),
    image: InlineImageSchema,
  }),
]);

const HorizontalAlignmentSchema = z.enum(['left', 'center', 'right', 'justify']);

const ReportParagraphSchema = z.object({
  kind: z.literal('paragraph'),
  style: z.string().optional(),
  alignment: HorizontalAlignmentSchema.optional(),
  runs: z.array(ReportRunSchema),
});

const BorderSpecSchema = z.object({
  style: z.enum(['single', 'double', 'dashed', 'dotted', 'none']),
  size: z.number().nonnegative(),
  space: z.number().nonnegative(),
  color: z.string(),
});

const ReportTableCellSchema = z.object({
  paragraphs: z.array(ReportParagraphSchema),
  shading: z.object({ fill: z.string() }).optional(),
  borders: z
    .object({
      top: BorderSpecSchema.optional(),
      left: BorderSpecSchema.optional(),
      bottom: BorderSpecSchema.optional(),
      right: BorderSpecSchema.optional(),
    })
    .optional(),
  width: z.number().nonnegative().optional(),
  verticalAlignment: z.enum(['top', 'center', 'bottom']).optional(),
});

const ReportTableSchema = z.object({
  kind: z.literal('table'),
  rows: z.array(z.object({ cells: z.array(ReportTableCellSchema) })),
  properties: z
    .object({
      widthPercent: z.number().positive().optional(),
      alignment: z.enum(['left', 'center', 'right']).optional(),
      autofit: z.boolean().optional(),
    })
    .default({}),
});

const ReportSectionSchema = z.object({
  pageWidth: z.number().nonnegative().optional(),
  pageHeight: z.number().nonnegative().optional(),
  margins: z
    .object({
      top: z.number().nonnegative().optional(),
      bottom: z.number().nonnegative().optional(),
      left: z.number().nonnegative().optional(),
      right: z.number().nonnegative().optional(),
    })
    .default({}),
});

/**
 * Persisted form of a ReportDocument.
 *
 * Intrinsic image sizes are accepted as any number; invalid ones are
 * skipped by the autofit stage rather than rejected at load time.
 */
export const ReportDocumentSchema = z.object({
  name: z.string().min(1),
  sections: z.array(ReportSectionSchema).min(1),
  body: z.array(
    z.discriminatedUnion('kind', [ReportParagraphSchema, ReportTableSchema]),
  ),
  styles: z
    .record(
      z.string(),
      z.object({
        font: RunFontSchema.default({}),
        alignment: HorizontalAlignmentSchema.optional(),
      }),
    )
    .default({}),
});

export type ReportDocumentInput = z.input<typeof ReportDocumentSchema>;
