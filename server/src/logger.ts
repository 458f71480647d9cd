import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

// Keep credentials out of logs even when a whole config object is logged.
const REDACT_PATHS = [
  'req.headers.authorization',
  'sheetsAccessToken',
  'config.sheetsAccessToken',
  'geminiApiKey',
  'config.geminiApiKey',
  'token',
  'apiKey'
];

export function createLogger(level: string, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    base: { service: 'calc-engine' },
    redact: { paths: REDACT_PATHS, remove: true }
  };
  return destination ? pino(options, destination) : pino(options);
}

/** A logger that drops everything; handy for tests and library use. */
export const silentLogger: Logger = pino({ level: 'silent' });
