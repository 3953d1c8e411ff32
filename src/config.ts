import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';
import { ExtractionConfig } from './types';

dotenv.config();

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

export const DEFAULT_CONFIG: Readonly<ExtractionConfig> = Object.freeze({
  maxProductsPerStore: 100,
  rateLimitDelay: 1.0,
  timeout: 30,
  concurrentRequests: 5,
  maxRetries: 3,
  userAgent: DEFAULT_USER_AGENT,
  headless: true,
  geminiModel: 'gemini-2.5-flash',
});

const configSchema = z.object({
  maxProductsPerStore: z.number().int().positive(),
  rateLimitDelay: z.number().nonnegative(),
  timeout: z.number().positive(),
  concurrentRequests: z.number().int().positive(),
  maxRetries: z.number().int().positive(),
  userAgent: z.string().min(1),
  headless: z.boolean(),
  geminiApiKey: z.string().min(1).optional(),
  geminiModel: z.string().min(1),
});

/**
 * Builds the run configuration from defaults, the environment and explicit
 * overrides (CLI flags), in that order of precedence.
 */
export function createConfig(
  overrides: Partial<ExtractionConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): Readonly<ExtractionConfig> {
  const fromEnv: Partial<ExtractionConfig> = {};
  if (env.GEMINI_API_KEY) fromEnv.geminiApiKey = env.GEMINI_API_KEY;
  if (env.GEMINI_MODEL) fromEnv.geminiModel = env.GEMINI_MODEL;

  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );

  const parsed = configSchema.safeParse({ ...DEFAULT_CONFIG, ...fromEnv, ...defined });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  return Object.freeze(parsed.data);
}
