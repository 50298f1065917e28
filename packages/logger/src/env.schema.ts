import { z } from 'zod';

// Custom levels; `audit` records settlement batches and sits above `error` so it is never filtered out.
export const logLevelsSchema = {
  audit: 60,
  debug: 20,
  error: 50,
  info: 30,
  trace: 10,
  warn: 40,
} as const;

export type LogLevelName = keyof typeof logLevelsSchema;

const booleanString = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val: string) => val === 'true');

export const loggerEnvSchema = z.object({
  LOGGER_AUDIT_LOG_DIRNAME: z.string().trim().min(1, { message: 'Invalid audit log directory name' }).default('logs'),
  LOGGER_AUDIT_LOG_ENABLED: booleanString('false'),
  LOGGER_AUDIT_LOG_FILENAME: z.string().trim().min(1, { message: 'Invalid audit log file name' }).default('audit'),
  LOGGER_CONSOLE_ENABLED: booleanString('false'),
  LOGGER_FILE_LOG_ENABLED: booleanString('false'),
  LOGGER_FILE_LOG_FILENAME: z.string().trim().min(1, { message: 'Invalid file log name' }).default('application.log'),
  LOGGER_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'audit']).default('info'),
  LOGGER_SERVICE_NAME: z.string().default('netsettle'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
