/**
 * SQLSTATE codes the ledger distinguishes
 * See https://www.postgresql.org/docs/current/errcodes-appendix.html
 */
export const PostgresErrorCode = {
  UniqueViolation: '23505',
  ForeignKeyViolation: '23503',
  CheckViolation: '23514',
  InvalidTextRepresentation: '22P02',
  SerializationFailure: '40001',
  DeadlockDetected: '40P01',
  LockNotAvailable: '55P03',
  QueryCanceled: '57014',
  IdleInTransactionTimeout: '25P03',
} as const;

export type PostgresErrorDetails = {
  code: string;
  constraint: string | null;
  table: string | null;
  detail: string | null;
  message: string;
};

const SQLSTATE_REGEX = /^[0-9A-Z]{5}$/;
const MAX_CAUSE_DEPTH = 5;

function readString(value: object, key: string): string | null {
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : null;
}

/**
 * Extract SQLSTATE details from a pg error, following `cause` links when a
 * query builder wrapped the driver error.
 */
export function getPostgresErrorDetails(error: unknown): PostgresErrorDetails | null {
  let current: unknown = error;

  for (let depth = 0; depth < MAX_CAUSE_DEPTH; depth += 1) {
    if (typeof current !== 'object' || current === null) {
      return null;
    }

    const code = readString(current, 'code');
    if (code && SQLSTATE_REGEX.test(code)) {
      return {
        code,
        constraint: readString(current, 'constraint'),
        table: readString(current, 'table'),
        detail: readString(current, 'detail'),
        message: readString(current, 'message') ?? '',
      };
    }

    current = Reflect.get(current, 'cause');
  }

  return null;
}

/**
 * pg-pool rejects with a plain Error when no connection frees up within
 * `connectionTimeoutMillis`.
 */
export function isConnectionTimeoutError(error: unknown): boolean {
  return (
    error instanceof Error && error.message.includes('timeout exceeded when trying to connect')
  );
}
