/**
 * True for a Postgres unique_violation (SQLSTATE 23505) raised through pg.
 */
export const isUniqueViolation = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
