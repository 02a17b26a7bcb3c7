/**
 * Logging
 *
 * Engine and provider code log through this shape so tests can pass
 * `{ info: vi.fn(), warn: vi.fn(), error: vi.fn() }`.
 */

import { pino } from 'pino';
import { env } from '../config/env.js';

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

export const rootLogger = pino({
  level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,
  base: { service: 'site-decision' },
});

export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}
