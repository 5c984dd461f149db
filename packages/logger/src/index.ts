export { getLogger, resetLoggers, setLoggerTransports, type Logger } from './pino-logger.js';
export { loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
