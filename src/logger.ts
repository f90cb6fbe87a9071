import pino from 'pino';
import { v4 as uuid } from 'uuid';
import { loadConfig } from './config.js';

// stdout carries the JSON report, so all log lines go to stderr.
const logger = pino({ name: 'certlens', level: loadConfig().logLevel }, pino.destination(2));

export type Logger = pino.Logger;

export function runLogger(bindings: Record<string, unknown> = {}): Logger {
  return logger.child({ runId: uuid(), ...bindings });
}

export default logger;
