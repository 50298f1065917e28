export { getLogger, getLoggerTransports, setLoggerTransports, type Logger, type TransportMode } from './pino-logger.js';
export { loggerEnvSchema, logLevelsSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
