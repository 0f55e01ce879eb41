/**
 * Example Query Model
 *
 * A natural-language description paired with the structured query that
 * answers it.
 */

import { z } from 'zod';

export const exampleQuerySchema = z.object({
  description: z.string().min(1),
  query: z.string().min(1)
});

export type ExampleQuery = z.infer<typeof exampleQuerySchema>;

export const exampleQueryFileSchema = z.record(exampleQuerySchema);
