import { z } from 'zod';

/**
 * Schema for feed analyzer configuration
 */
export const AnalyzerConfigSchema = z.object({
  feedsDir: z.string().min(1, 'Feeds directory is required').default('XMLFEEDS'),
  feedExtension: z
    .string()
    .regex(/^\.[^./\\]+$/, 'Feed extension must look like ".xml"')
    .default('.xml'),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  logDir: z.string().min(1).optional(),
});

/**
 * TypeScript type for feed analyzer configuration
 */
export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;

export type LogLevel = AnalyzerConfig['logLevel'];
