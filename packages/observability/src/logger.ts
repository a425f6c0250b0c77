import pino from 'pino';

export type Logger = pino.Logger;
export type LoggerOptions = pino.LoggerOptions;
export type DestinationStream = pino.DestinationStream;

/**
 * Redact sensitive data from logs
 * - Authorization headers
 * - Passwords and other secrets
 * - Database connection settings
 */
const REDACTION_PATHS = [
  'headers.authorization',
  'headers.Authorization',
  'authorization',
  'Authorization',
  'password',
  'token',
  'secret',
  'connectionString',
  'databaseUrl',
  '*.connectionString',
  '*.databaseUrl',
];

const CONNECTION_STRING_CREDENTIALS = /(postgres(?:ql)?:\/\/[^:/\s@]+:)[^@\s]+@/g;

/**
 * Mask the password part of any Postgres URL embedded in a string
 */
export function redactConnectionStrings(value: string): string {
  return value.replace(CONNECTION_STRING_CREDENTIALS, '$1[REDACTED]@');
}

/**
 * Recursively mask credentials in string fields
 */
function redactObjectCredentials(value: unknown, depth = 0): unknown {
  if (typeof value === 'string') {
    return redactConnectionStrings(value);
  }
  if (depth > 8 || value === null || typeof value !== 'object') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactObjectCredentials(item, depth + 1));
  }
  // Errors, dates and class instances keep their own serializers
  if (Object.getPrototypeOf(value) !== Object.prototype) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    result[key] = redactObjectCredentials(field, depth + 1);
  }
  return result;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Automatic redaction of secrets and database credentials
 * - Structured JSON output with ISO 8601 timestamps
 */
export function createLogger(options?: LoggerOptions, destination?: DestinationStream): Logger {
  const config: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    // Format timestamps as ISO 8601
    timestamp: pino.stdTimeFunctions.isoTime,
    // Hook to mask credentials in the log object and message
    hooks: {
      logMethod(args, method) {
        const redacted = args.map((arg: unknown) => redactObjectCredentials(arg));
        Reflect.apply(method, this, redacted);
      },
    },
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
