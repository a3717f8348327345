// Diagnostics go to stderr only: stdout carries the forwarded probe lines.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = Record<LogLevel, (...args: unknown[]) => void>;

function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.PROBE_SIEVE_DEBUG;
  return value === '1' || value === 'true';
}

function createLogger(debugEnabled: boolean = isDebugEnabled()): Logger {
  return {
    debug: (...args: unknown[]) => {
      if (debugEnabled) {
        console.error('[DEBUG]', ...args);
      }
    },
    info: (...args: unknown[]) => console.error('[INFO]', ...args),
    warn: (...args: unknown[]) => console.error('[WARN]', ...args),
    error: (...args: unknown[]) => console.error('[ERROR]', ...args)
  };
}

const logger = createLogger();

export default logger;
