import type { ProcessingOptions } from '@paysplit/model';

import { z } from 'zod';

import { ConfigurationError } from '../errors/configuration-error';
import { IDENTITY_MATCHER, TEXT_ACQUIRER } from './constants';

/** Zod schema for ProcessingOptions; every field has a default */
export const processingOptionsSchema = z.object({
  useFuzzyMatching: z.boolean().default(false),
  ocrTextThreshold: z
    .number()
    .int()
    .min(0)
    .default(TEXT_ACQUIRER.OCR_TEXT_THRESHOLD),
  fuzzyScoreThreshold: z
    .number()
    .min(0)
    .max(100)
    .default(IDENTITY_MATCHER.FUZZY_SCORE_THRESHOLD),
  fuzzyCandidateLimit: z
    .number()
    .int()
    .min(1)
    .default(IDENTITY_MATCHER.FUZZY_CANDIDATE_LIMIT),
  ocrUpscaleFactor: z
    .number()
    .positive()
    .max(8)
    .default(TEXT_ACQUIRER.OCR_UPSCALE_FACTOR),
  ocrLanguage: z
    .string()
    .trim()
    .regex(/^[A-Za-z_]+(\+[A-Za-z_]+)*$/, 'Expected Tesseract language codes such as "por" or "por+eng"')
    .default(TEXT_ACQUIRER.OCR_LANGUAGE),
});

/** Partial options accepted from callers */
export type ProcessingOptionsInput = z.input<typeof processingOptionsSchema>;

/**
 * Fill in defaults and validate caller-supplied options.
 *
 * @throws ConfigurationError when a value is out of range
 */
export function resolveProcessingOptions(
  input: ProcessingOptionsInput = {},
): ProcessingOptions {
  const parsed = processingOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw ConfigurationError.fromZodError(
      'Invalid processing options',
      parsed.error,
    );
  }
  return parsed.data;
}
