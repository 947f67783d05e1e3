import dotenv from 'dotenv';
import { ZodIssue } from 'zod';
import { AnalyzerConfigSchema, type AnalyzerConfig } from '../types/AnalyzerConfig';

// Load environment variables from .env file
dotenv.config();

/**
 * Loads and validates analyzer configuration from environment variables
 * @param overrides - Values taking precedence over the environment (e.g. CLI flags)
 * @throws Error if configuration is invalid
 */
export function loadConfig(overrides: Partial<AnalyzerConfig> = {}): AnalyzerConfig {
  const config = {
    feedsDir: process.env.FEEDS_DIR || undefined,
    feedExtension: process.env.FEED_EXTENSION || undefined,
    logLevel: process.env.LOG_LEVEL || undefined,
    logDir: process.env.LOG_DIR || undefined,
    ...overrides,
  };

  const result = AnalyzerConfigSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.issues.map((e: ZodIssue) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid configuration: ${errors}`);
  }

  return result.data;
}
