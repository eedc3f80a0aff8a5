/**
 * Structured logger for CloudWatch.
 * Every log line carries userId and requestId so a conversation can be traced
 * across the route and interpret invocations.
 */

import type { Target } from '../models/session';

export interface LogContext {
  userId?: string;
  requestId?: string;
  target?: Target;
}

function formatLog(level: string, message: string, ctx: LogContext, extra?: Record<string, unknown>): string {
  return JSON.stringify({
    level,
    message,
    ...ctx,
    ...extra,
    ts: new Date().toISOString(),
  });
}

export const logger = {
  info(message: string, ctx: LogContext = {}, extra?: Record<string, unknown>): void {
    console.log(formatLog('INFO', message, ctx, extra));
  },
  warn(message: string, ctx: LogContext = {}, extra?: Record<string, unknown>): void {
    console.warn(formatLog('WARN', message, ctx, extra));
  },
  error(message: string, ctx: LogContext = {}, extra?: Record<string, unknown>): void {
    console.error(formatLog('ERROR', message, ctx, extra));
  },
  debug(message: string, ctx: LogContext = {}, extra?: Record<string, unknown>): void {
    if (process.env.LOG_LEVEL === 'DEBUG') {
      console.debug(formatLog('DEBUG', message, ctx, extra));
    }
  },
};

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name;
  }
  return String(err);
}
