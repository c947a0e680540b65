export * from './lib/paymob';
export * from './lib/callbacks';
export * from './lib/credentials';
export * from './lib/fetch/httpTransport';
export { emitLog, createLogger, type Logger, type LogLevel } from './lib/logging';
