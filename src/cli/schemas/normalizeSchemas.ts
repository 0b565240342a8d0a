import { z } from 'zod';

export const NormalizeNamesSchema = z.object({
  names: z.array(z.string()).min(1, 'At least one name is required'),
  config: z.string().optional(),
});

export type NormalizeNamesInput = z.infer<typeof NormalizeNamesSchema>;
