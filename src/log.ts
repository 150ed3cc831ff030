/** Log severity levels. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Injectable logging callback.
 *
 * Sync code calls this instead of writing to `console` directly so tests can
 * capture what was reported.
 */
export type Logger = (level: LogLevel, message: string, meta?: Record<string, unknown>) => void;

/**
 * Default logger. Everything goes to stderr: stdout carries the MCP protocol.
 */
export const defaultLogger: Logger = (level, message, meta) => {
  const line = `[fieldsync] ${level}: ${message}`;
  if (meta && Object.keys(meta).length > 0) {
    console.error(line, JSON.stringify(meta));
  } else {
    console.error(line);
  }
};

/** Logger that drops everything. */
export const silentLogger: Logger = () => {};
