/**
 * Configuration validation schemas using Zod
 */

import { z } from 'zod';
import {
  DEFAULT_BASE_URL,
  DEFAULT_INBOX_PROJECT_ID,
  DEFAULT_TIMEOUT_MS,
} from '../types/config.js';

/**
 * Environment variables read at startup
 */
export const EnvSchema = z.object({
  TICKTICK_API_TOKEN: z
    .string({ required_error: 'TICKTICK_API_TOKEN is required' })
    .trim()
    .min(1, 'TICKTICK_API_TOKEN is required'),
  // An explicitly empty value disables the inbox fallback
  TICKTICK_INBOX_PROJECT_ID: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value === undefined ? DEFAULT_INBOX_PROJECT_ID : value || null)),
  TICKTICK_API_BASE_URL: z
    .string()
    .trim()
    .url()
    .default(DEFAULT_BASE_URL)
    .transform((value) => value.replace(/\/+$/, '')),
  TICKTICK_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export type ValidatedEnv = z.infer<typeof EnvSchema>;

/**
 * Validate environment variables
 */
export function validateEnv(env: Record<string, string | undefined>): {
  success: boolean;
  data?: ValidatedEnv;
  error?: z.ZodError;
} {
  const result = EnvSchema.safeParse(env);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, error: result.error };
}
