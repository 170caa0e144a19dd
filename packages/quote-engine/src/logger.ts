import { pino, type BaseLogger } from 'pino';

/** The subset of pino's logger the engine writes to. Fastify's `app.log` satisfies it. */
export type EngineLogger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export function createLogger(name: string): EngineLogger {
  return pino({ name, level: process.env.LOG_LEVEL ?? 'info' });
}
