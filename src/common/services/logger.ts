/**
 * Structured Logger Service
 *
 * JSON-formatted log lines on stderr. stdout stays free for CLI output.
 *
 * Every line of one query shares its query_id, so
 * grep "query_1734345045123" shows the whole state-machine walk.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  // Correlation
  query_id?: string;
  session_id?: string;
  job?: string;

  // Pipeline
  state?: string;
  intent?: string;
  backend?: string;
  records?: number;

  // Performance
  duration_ms?: number;

  // Errors
  error?: string;
  error_class?: string;

  // Extensible
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLevelName(value: string): value is LogLevel | 'silent' {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function thresholdFromEnv(): number {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLevelName(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

/**
 * Log a structured message to stderr
 *
 * Output format:
 * {"ts":"2026-01-06T07:00:00.123Z","level":"info","msg":"Backend responded","query_id":"query_...",...}
 */
export function log(level: LogLevel, message: string, context: LogContext = {}): void {
  if (LEVEL_ORDER[level] < thresholdFromEnv()) return;
  const entry = {
    ts: new Date().toISOString(),
    level,
    msg: message,
    ...context,
  };
  console.error(JSON.stringify(entry));
}

// Convenience functions
export const logInfo = (msg: string, ctx?: LogContext) => log('info', msg, ctx);
export const logWarn = (msg: string, ctx?: LogContext) => log('warn', msg, ctx);
export const logError = (msg: string, ctx?: LogContext) => log('error', msg, ctx);
export const logDebug = (msg: string, ctx?: LogContext) => log('debug', msg, ctx);

/**
 * Generate unique query ID for log correlation
 * Format: query_<timestamp>_<random>
 */
export function generateQueryId(): string {
  return `query_${Date.now()}_${Math.random().toString(36).substring(2, 8)}`;
}
