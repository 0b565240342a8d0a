import { z } from 'zod';
import { DEFAULT_OUTPUT_FILE } from '../../core/config';

export const QueryXrefSchema = z.object({
  name: z.string().min(1, 'Function name is required'),
  dump: z.string().default(DEFAULT_OUTPUT_FILE),
  exact: z.boolean().default(false),
});

export const FindXrefsSchema = z.object({
  prefix: z.string().min(1, 'Prefix is required'),
  dump: z.string().default(DEFAULT_OUTPUT_FILE),
  limit: z.coerce.number().int().positive().default(200),
});

export type QueryXrefInput = z.infer<typeof QueryXrefSchema>;
export type FindXrefsInput = z.infer<typeof FindXrefsSchema>;
