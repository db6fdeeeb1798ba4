import 'dotenv/config';
import { z } from 'zod';
import { formatZodIssues } from '../spec/schema';

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1'));

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  LOG_SILENT: booleanFlag(false),
  LOG_CONSOLE: booleanFlag(true),
  LOG_FILE_PATH: z.preprocess((value) => (value === '' ? undefined : value), z.string().optional()),
  INDICATOR_MAX_WINDOW: z.coerce.number().int().positive().default(10000),
});

export interface EngineConfig {
  logLevel: string;
  logSilent: boolean;
  logConsole: boolean;
  logFilePath?: string;
  /** Upper bound of every window-length parameter in the standard catalogue */
  maxWindow: number;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid environment configuration: ${formatZodIssues(result.error)}`);
  }
  const parsed = result.data;
  return {
    logLevel: parsed.LOG_LEVEL,
    logSilent: parsed.LOG_SILENT,
    logConsole: parsed.LOG_CONSOLE,
    logFilePath: parsed.LOG_FILE_PATH,
    maxWindow: parsed.INDICATOR_MAX_WINDOW,
  };
}
