/**
 * Simple Logger with request_id and action tracking
 */

export interface LogContext {
  request_id?: string;
  action?: string;
  service?: string;
  [key: string]: unknown; // Allow additional properties
}

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

const RESERVED_KEYS = new Set(['request_id', 'action', 'service']);

export function formatLog(level: LogLevel, message: string, context?: LogContext, now: Date = new Date()): string {
  const parts = [
    `[${now.toISOString()}]`,
    `[${level}]`,
  ];

  if (context?.service) {
    parts.push(`[${context.service}]`);
  }

  if (context?.action) {
    parts.push(`[${context.action}]`);
  }

  if (context?.request_id) {
    parts.push(`[req:${context.request_id.substring(0, 8)}]`);
  }

  parts.push(message);

  // Remaining fields are appended as JSON so they stay greppable
  const extra = Object.entries(context ?? {}).filter(
    ([key, value]) => !RESERVED_KEYS.has(key) && value !== undefined
  );
  if (extra.length > 0) {
    parts.push(JSON.stringify(Object.fromEntries(extra)));
  }

  return parts.join(' ');
}

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(service: string) {
  return {
    info(message: string, context?: Omit<LogContext, 'service'>) {
      console.log(formatLog('INFO', message, { ...context, service }));
    },

    warn(message: string, context?: Omit<LogContext, 'service'>) {
      console.warn(formatLog('WARN', message, { ...context, service }));
    },

    error(message: string, context?: Omit<LogContext, 'service'>) {
      console.error(formatLog('ERROR', message, { ...context, service }));
    },

    debug(message: string, context?: Omit<LogContext, 'service'>) {
      if (process.env.DEBUG) {
        console.log(formatLog('DEBUG', message, { ...context, service }));
      }
    },
  };
}
