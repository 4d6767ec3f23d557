import { z } from 'zod';
import type { CellValue, ColumnType } from './types';

/**
 * Zod helpers that coerce loader output into typed cell values.
 * Loaders often hand over numbers as strings or bigints and dates as
 * epoch milliseconds or ISO strings.
 */
export const cellSchemas = {
  /**
   * Number-like values (number, numeric string, bigint). Empty is null.
   */
  numeric: z
    .union([z.number(), z.string(), z.bigint(), z.null(), z.undefined()])
    .transform((val, ctx): number | null => {
      if (val === null || val === undefined || val === '') {
        return null;
      }
      const num = Number(val);
      if (!isFinite(num)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected a number, received "${String(val)}"`,
        });
        return z.NEVER;
      }
      return num;
    }),

  /**
   * Dates, ISO strings, epoch milliseconds or bigint epochs.
   */
  temporal: z
    .union([
      z.date(),
      z.string(),
      z.number(),
      z.bigint(),
      z.null(),
      z.undefined(),
    ])
    .transform((val, ctx): Date | null => {
      if (val === null || val === undefined || val === '') {
        return null;
      }
      const date =
        val instanceof Date
          ? val
          : new Date(typeof val === 'bigint' ? Number(val) : val);
      if (isNaN(date.getTime())) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected a date, received "${String(val)}"`,
        });
        return z.NEVER;
      }
      return date;
    }),

  categorical: z
    .union([z.string(), z.number(), z.boolean(), z.null(), z.undefined()])
    .transform((val): CellValue => val ?? null),

  key: z.union([z.string().min(1), z.number()]),
} satisfies Record<ColumnType, z.ZodType<CellValue, z.ZodTypeDef, unknown>>;

export const columnDefSchema = z.object({
  name: z.string().trim().min(1),
  type: z.enum(['categorical', 'numeric', 'temporal', 'key']),
  label: z.string().optional(),
});

export const chartStyleSchema = z.object({
  color: z.string().default('#4e79a7'),
  highlightColor: z.string().default('#e15759'),
  opacity: z.number().min(0).max(1).default(1),
  dimOpacity: z.number().min(0).max(1).default(0.2),
  width: z.number().int().positive().default(640),
  height: z.number().int().positive().default(400),
});

export type ResolvedChartStyle = z.infer<typeof chartStyleSchema>;

export const chartSpecSchema = z.object({
  mark: z
    .enum(['point', 'line', 'bar', 'area', 'rect', 'text'])
    .default('point'),
  channels: z
    .object({
      x: z.string().min(1).optional(),
      y: z.string().min(1).optional(),
      color: z.string().min(1).optional(),
      size: z.string().min(1).optional(),
      group: z.string().min(1).optional(),
      tooltip: z.array(z.string().min(1)).optional(),
    })
    .strict(),
  style: chartStyleSchema.default({}),
  title: z.string().optional(),
});

export type ResolvedChartSpec = z.infer<typeof chartSpecSchema>;

/**
 * Options accepted by `new LinkGroup(dataset, options)`.
 */
export const linkGroupOptionsSchema = z.object({
  id: z.string().min(1).optional(),
  /**
   * How highlight contributions from several sources combine.
   * `union` merges every source's keys; `single` keeps only the latest.
   */
  highlightResolution: z.enum(['union', 'single']).default('union'),
});

export type LinkGroupOptions = z.input<typeof linkGroupOptionsSchema>;

export const filterWidgetOptionsSchema = z.object({
  id: z.string().min(1).optional(),
  label: z.string().optional(),
  /** Debounce delay in ms for `setValue`. 0 applies immediately. */
  debounceTime: z.number().int().nonnegative().default(0),
});

export type FilterWidgetOptions = z.input<typeof filterWidgetOptionsSchema>;
