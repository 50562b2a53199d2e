export { StepwiseLogger } from './logger.js';
export type { StepwiseLoggerConfig } from './logger.js';
export { createLogger } from './factory.js';
export type { CreateLoggerOptions } from './factory.js';
export { createTransport, createTransports } from './transport-factory.js';
export { LoggerConfigSchema, LoggerTransportSchema } from './schemas.js';
export type { LoggerConfig, LoggerConfigInput, LoggerTransportConfig } from './schemas.js';
export { LogComponent } from './types.js';
export type { Logger, LoggerTransport, LogEntry, LogLevel } from './types.js';
export { ConsoleTransport } from './transports/console-transport.js';
export { FileTransport } from './transports/file-transport.js';
export { SilentTransport } from './transports/silent-transport.js';
export { LoggerError } from './errors.js';
export { LoggerErrorCode } from './error-codes.js';
