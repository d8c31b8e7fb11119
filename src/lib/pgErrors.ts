type PgError = {
  code?: string;
  constraint?: string;
  detail?: string;
};

export type PgErrorResponse = { status: number; body: Record<string, unknown> };

export type PgErrorMapping = {
  unique?: (err: PgError) => PgErrorResponse | null;
  foreignKey?: (err: PgError) => PgErrorResponse | null;
  check?: (err: PgError) => PgErrorResponse | null;
  notNull?: (err: PgError) => PgErrorResponse | null;
};

function asPgError(err: unknown): PgError | null {
  if (!err || typeof err !== 'object') return null;
  const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  const constraint = 'constraint' in err && typeof err.constraint === 'string' ? err.constraint : undefined;
  const detail = 'detail' in err && typeof err.detail === 'string' ? err.detail : undefined;
  return { code, constraint, detail };
}

/**
 * Maps Postgres constraint errors to HTTP responses. Callers supply the
 * message bodies; there are no default messages.
 */
export function mapPgErrorToHttp(err: unknown, mapping: PgErrorMapping): PgErrorResponse | null {
  const pgErr = asPgError(err);
  if (!pgErr) {
    return null;
  }
  switch (pgErr.code) {
    case '23505':
      return mapping.unique?.(pgErr) ?? null;
    case '23503':
      return mapping.foreignKey?.(pgErr) ?? null;
    case '23514':
      return mapping.check?.(pgErr) ?? null;
    case '23502':
      return mapping.notNull?.(pgErr) ?? null;
    default:
      return null;
  }
}
