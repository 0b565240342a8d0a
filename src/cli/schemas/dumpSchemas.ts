import { z } from 'zod';
import { DemanglerAbiSchema } from '../../core/config';

export const DumpXrefsSchema = z.object({
  snapshot: z.string().min(1, 'Snapshot path is required'),
  config: z.string().optional(),
  abi: DemanglerAbiSchema.optional(),
  out: z.string().min(1).optional(),
  cxxfilt: z.boolean().default(false),
});

export type DumpXrefsInput = z.infer<typeof DumpXrefsSchema>;
