import { z } from 'zod';

export const languageToolMatchSchema = z.object({
  message: z.string(),
  shortMessage: z.string().optional(),
  offset: z.number().int().nonnegative(),
  length: z.number().int().nonnegative(),
  replacements: z.array(z.object({ value: z.string() })).default([]),
  rule: z.object({
    id: z.string(),
    description: z.string().optional(),
    issueType: z.string().optional(),
    category: z.object({
      id: z.string(),
      name: z.string().optional(),
    }),
  }),
});
export type LanguageToolMatch = z.infer<typeof languageToolMatchSchema>;

export const languageToolResponseSchema = z.object({
  matches: z.array(languageToolMatchSchema),
});
