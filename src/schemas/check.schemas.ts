/**
 * Check Schemas
 *
 * Zod schemas for the analysis API request bodies.
 */

import { z } from 'zod';
import { config } from '../config';

const textField = z
  .string({ required_error: 'Text is required', invalid_type_error: 'Text must be a string' })
  .max(config.maxTextLength, `Text cannot exceed ${config.maxTextLength} characters`)
  .refine((text) => text.trim().length > 0, { message: 'Text cannot be empty' });

export const checkTextSchema = {
  body: z.object({
    text: textField,
    auto_correct: z.boolean().default(false),
  }),
};
export type CheckTextBody = z.infer<typeof checkTextSchema.body>;

export const correctTextSchema = {
  body: z.object({
    text: textField,
  }),
};
export type CorrectTextBody = z.infer<typeof correctTextSchema.body>;
