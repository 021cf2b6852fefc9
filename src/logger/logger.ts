/**
 * @file src/logger/logger.ts
 * Structured JSON logger wrapping pino.
 * Secret-adjacent field names are redacted before serialisation.
 */

import pino from 'pino';
import type { DestinationStream, Logger as PinoLogger } from 'pino';

// ── Redacted field names ──────────────────────────────────────────────────────
// Values under these field names are replaced with '[REDACTED]'. Wallet code
// must never pass secrets to the logger in the first place.
const REDACTED_PATHS = [
  'seed',
  'passphrase',
  'password',
  'token',
  'sessionToken',
  'blind',
  'secretNonce',
  'mnemonic',
  'words',
  '*.seed',
  '*.passphrase',
  '*.password',
  '*.token',
  '*.blind',
  '*.secretNonce',
  '*.mnemonic',
  '*.words',
];

// ── Public logger type ────────────────────────────────────────────────────────

export type Logger = PinoLogger;

// ── Factory ───────────────────────────────────────────────────────────────────

export interface LoggerOptions {
  level?: string;
  /** Persistent fields bound to every log line from this logger. */
  bindings?: Record<string, string>;
  /** Whether to pretty-print (dev only). Never use in production. */
  pretty?: boolean;
  /** Where log lines go. Defaults to stdout. */
  destination?: DestinationStream;
}

/**
 * Creates a structured logger. Call once at startup and pass the instance
 * through the dependency tree. Never create ad-hoc loggers in modules.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', bindings = {}, pretty = false, destination } = options;

  const transport =
    pretty && process.env['NODE_ENV'] !== 'production'
      ? pino.transport({ target: 'pino-pretty', options: { colorize: true } })
      : destination;

  const base = pino(
    {
      level,
      redact: {
        paths: REDACTED_PATHS,
        censor: '[REDACTED]',
      },
      serializers: {
        err: pino.stdSerializers.err,
        error: pino.stdSerializers.err,
      },
      base: {
        pid: process.pid,
        ...bindings,
      },
    },
    transport,
  );

  return base;
}

/** Child logger bound to one wallet. Every line carries the username. */
export function createWalletLogger(parent: Logger, username: string): Logger {
  return parent.child({ username });
}
