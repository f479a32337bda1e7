/**
 * Export configuration schema
 *
 * Table and column identifiers are trusted configuration once they pass this
 * schema; they are interpolated into SQL text, so only plain identifiers are
 * accepted.
 */

import { z } from 'zod';
import { DateTime } from 'luxon';
import { GRANULARITIES } from '../domain/export.js';

export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_$]*$/;

/**
 * One to three dot-separated identifiers (table, schema.table, database.schema.table)
 */
export const TABLE_PATTERN = /^[A-Za-z_][A-Za-z0-9_$]*(\.[A-Za-z_][A-Za-z0-9_$]*){0,2}$/;

export const PREFIX_PATTERN = /^[A-Za-z0-9_.-]+$/;

const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a date in YYYY-MM-DD form')
  .refine((value) => DateTime.fromISO(value, { zone: 'utc' }).isValid, 'must be a valid calendar date');

export const GranularitySchema = z.enum(GRANULARITIES);

export const ExportConfigSchema = z
  .object({
    table: z
      .string()
      .trim()
      .regex(TABLE_PATTERN, 'must be an identifier in DATABASE.SCHEMA.TABLE form'),
    dateColumn: z.string().trim().regex(IDENTIFIER_PATTERN, 'must be a plain column identifier'),
    startDate: IsoDateSchema,
    endDate: IsoDateSchema,
    groupBy: GranularitySchema.default('day'),
    prefix: z
      .string()
      .trim()
      .min(1)
      .max(100)
      .regex(PREFIX_PATTERN, 'may only contain letters, digits, "_", "-" and "."')
      .default('exported_data'),
  })
  .refine((config) => config.endDate >= config.startDate, {
    message: 'endDate must not be before startDate',
    path: ['endDate'],
  });

export type ExportConfigInput = z.input<typeof ExportConfigSchema>;

export type ExportConfig = Readonly<z.output<typeof ExportConfigSchema>>;
