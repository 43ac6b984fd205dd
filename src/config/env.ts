/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z
  .object({
    // Target
    MEDIUM_LIST_URL: z.string().url().default('https://medium.com/@username/list/your-list-id'),
    SITE_ORIGIN: z.string().url().default('https://medium.com'),

    // Output
    OUTPUT_DIR: z.string().default('output'),

    // Pacing
    DELAY_MIN_SECONDS: z.coerce.number().nonnegative().default(1.5),
    DELAY_MAX_SECONDS: z.coerce.number().nonnegative().default(2.5),
    MAX_REQUESTS_PER_HOUR: z.coerce.number().int().positive().default(400),
    SAVE_INTERVAL: z.coerce.number().int().positive().default(50),
    CHECKPOINT_INTERVAL_SECONDS: z.coerce.number().int().positive().default(300),

    // Browser
    HEADLESS: booleanFlag.default('false'),
    BROWSER: z.enum(['chromium', 'firefox', 'webkit']).default('firefox'),
    NAV_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    PAGE_LOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    NAV_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(1),

    // Stop conditions
    MAX_NO_GROWTH_SCROLLS: z.coerce.number().int().positive().default(10),
    MAX_EMPTY_SCROLLS: z.coerce.number().int().positive().default(5),
    MIN_ALL_KNOWN_SCROLLS: z.coerce.number().int().positive().default(200),
    ALL_KNOWN_ARTICLES_PER_SCROLL: z.coerce.number().int().positive().default(15),
    ALL_KNOWN_PADDING: z.coerce.number().int().nonnegative().default(100),
    MAX_SCROLL_ATTEMPTS: z.coerce.number().int().positive().default(5000),
    FAST_SCROLL_DISTANCE_PX: z.coerce.number().int().positive().default(2000),

    // Extraction bounds
    MIN_TITLE_LENGTH: z.coerce.number().int().nonnegative().default(5),
    MAX_TITLE_LENGTH: z.coerce.number().int().positive().default(500),
    MAX_SNIPPET_LENGTH: z.coerce.number().int().positive().default(1000),

    // Logging
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    LOG_FILE: z.string().optional(),

    // Environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  })
  .refine((value) => value.DELAY_MIN_SECONDS <= value.DELAY_MAX_SECONDS, {
    message: 'DELAY_MIN_SECONDS must not exceed DELAY_MAX_SECONDS',
    path: ['DELAY_MIN_SECONDS'],
  })
  .refine((value) => value.MIN_TITLE_LENGTH <= value.MAX_TITLE_LENGTH, {
    message: 'MIN_TITLE_LENGTH must not exceed MAX_TITLE_LENGTH',
    path: ['MIN_TITLE_LENGTH'],
  });

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();
