import pino, { type DestinationStream } from 'pino';
import { Writable } from 'stream';
import { loadConfig } from '../config/index.js';
import type { EventArgs } from '../core/types.js';

let loggerInstance: pino.Logger | null = null;

function collectorSink(logs: string[]): DestinationStream {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
}

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const cfg = loadConfig();
    loggerInstance = pino({
      level: cfg.logging.level,
      transport: cfg.logging.json ? undefined : { target: 'pino-pretty' },
    });
  }
  return loggerInstance;
}

/**
 * Default error handler of every bus: one `error` record with the event
 * name, the failing listener's error (stack included) and the emitted
 * arguments.
 */
export function logDispatchError(event: string, error: unknown, args: EventArgs): void {
  getLogger().error(
    { err: error, event, args },
    `An exception was raised while dispatching a '${event}' event`,
  );
}

// Test-only helper to reset singleton (not exported in production docs)
export function __resetLoggerForTests(): void {
  loggerInstance = null;
}

// Force-enable in-memory log collection for tests regardless of env timing
export function __enableTestLogCollector(level = 'trace'): string[] {
  const logs: string[] = [];
  loggerInstance = pino({ level }, collectorSink(logs));
  return logs;
}
