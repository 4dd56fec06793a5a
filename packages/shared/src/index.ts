export { createLogger, type Logger, type LoggerConfig, type LogLevel, LogLevelSchema } from './logger'
