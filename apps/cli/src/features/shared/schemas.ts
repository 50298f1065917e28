import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

const DateOptionSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Expected an ISO 8601 date or timestamp' })
  .transform((value) => new Date(value));

/**
 * `--start` / `--end`. Either may be omitted; the window defaults are applied later.
 */
export const WindowOptionsSchema = z.object({
  start: DateOptionSchema.optional(),
  end: DateOptionSchema.optional(),
});

export const PreviewCommandOptionsSchema = WindowOptionsSchema.extend({
  policy: z.string({ required_error: '--policy <file> is required' }).min(1, '--policy <file> is required'),
}).extend(JsonFlagSchema.shape);

export const SettleCommandOptionsSchema = PreviewCommandOptionsSchema.extend({
  allowOverlap: z.boolean().optional(),
});

export const AuditCommandOptionsSchema = JsonFlagSchema.extend({
  explain: z.boolean().optional(),
});

export const BatchesCommandOptionsSchema = JsonFlagSchema.extend({
  useCase: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().optional(),
});

export const IngestCommandOptionsSchema = JsonFlagSchema;

export const UseCasesCommandOptionsSchema = JsonFlagSchema;

export type WindowOptions = z.infer<typeof WindowOptionsSchema>;
export type PreviewCommandOptions = z.infer<typeof PreviewCommandOptionsSchema>;
export type SettleCommandOptions = z.infer<typeof SettleCommandOptionsSchema>;
export type BatchesCommandOptions = z.infer<typeof BatchesCommandOptionsSchema>;
export type AuditCommandOptions = z.infer<typeof AuditCommandOptionsSchema>;
