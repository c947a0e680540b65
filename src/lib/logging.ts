export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export function isDebugLoggingEnabled(): boolean {
  return process.env.PAYMOB_DEBUG === '1';
}

/**
 * Writes one JSON line per event. `type` groups entries by subsystem
 * (`paymob_token`, `paymob_callback`, `credential_cache`, ...).
 */
export function emitLog(type: string, level: LogLevel, event: string, context: LogContext = {}): void {
  if (level === 'debug' && !isDebugLoggingEnabled()) {
    return;
  }

  const entry = {
    timestamp: new Date().toISOString(),
    type,
    level,
    event,
    ...context,
  };
  const message = JSON.stringify(entry);
  if (level === 'debug') {
    console.debug(message);
  } else if (level === 'info') {
    console.log(message);
  } else if (level === 'warn') {
    console.warn(message);
  } else {
    console.error(message);
  }
}

export function createLogger(type: string) {
  return {
    debug: (event: string, context?: LogContext) => emitLog(type, 'debug', event, context),
    info: (event: string, context?: LogContext) => emitLog(type, 'info', event, context),
    warn: (event: string, context?: LogContext) => emitLog(type, 'warn', event, context),
    error: (event: string, context?: LogContext) => emitLog(type, 'error', event, context),
  };
}

export type Logger = ReturnType<typeof createLogger>;
