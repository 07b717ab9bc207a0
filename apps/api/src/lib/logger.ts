import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Logger with PHI redaction. Patient names, clinical notes, document content
 * and credentials never reach log output; MRN and NPI are logged only through
 * maskIdentifier().
 */

// Keys redacted wherever they appear up to two levels deep.
const REDACTED_KEYS = [
  'first_name',
  'last_name',
  'firstName',
  'lastName',
  'date_of_birth',
  'dateOfBirth',
  'allergies',
  'clinical_notes',
  'clinicalNotes',
  'medication_history',
  'medicationHistory',
  'content',
  'prompt',
  'apiKey',
  'api_key',
  'authorization',
  'password',
];

export const REDACT_PATHS = [
  ...REDACTED_KEYS,
  ...REDACTED_KEYS.map((key) => `*.${key}`),
  ...REDACTED_KEYS.map((key) => `*.*.${key}`),
  'req.headers.authorization',
  'req.headers.cookie',
];

export interface CreateLoggerOptions {
  name: string;
  level?: string;
}

export function baseLoggerOptions(level: string): LoggerOptions {
  return {
    level,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = process.env.LOG_LEVEL ?? 'info' } = options;
  return pino({
    ...baseLoggerOptions(level),
    name,
    serializers: { err: pino.stdSerializers.err },
  });
}

export type { Logger };
