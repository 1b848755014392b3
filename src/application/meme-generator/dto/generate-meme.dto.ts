import { z } from 'zod';

export const generateMemeCommandSchema = z.object({
  gifPath: z.string().min(1),
  texts: z.array(z.string()).default([]),
  outputPath: z.string().min(1).optional(),
  posterPath: z.string().min(1).optional(),
});

export type GenerateMemePayload = z.input<typeof generateMemeCommandSchema>;

export type ValidatedGenerateMemePayload = z.output<typeof generateMemeCommandSchema>;
