import { InvalidArgumentError } from './errors';

/**
 * Ticket data is read-only to this service: one SELECT or WITH statement, a
 * trailing semicolon tolerated. Table names go through `safeIdent`.
 */
export function assertReadOnlySql(sql: string) {
  const trimmed = (sql ?? '').trim();
  if (!trimmed) throw new InvalidArgumentError('sql', 'is empty');

  const body = trimmed.endsWith(';') ? trimmed.slice(0, -1) : trimmed;
  if (body.includes(';')) {
    throw new InvalidArgumentError('sql', 'multiple statements are not allowed');
  }

  const lower = body.toLowerCase();
  if (!(lower.startsWith('select') || lower.startsWith('with'))) {
    throw new InvalidArgumentError('sql', 'only SELECT/WITH queries are allowed');
  }
}

/** Quotes a plain identifier (optionally schema-qualified) or throws. */
export function safeIdent(name: string): string {
  const parts = (name ?? '').trim().split('.');
  if (
    parts.length > 2 ||
    !parts.every((p) => /^[a-zA-Z_][a-zA-Z0-9_]*$/.test(p))
  ) {
    throw new InvalidArgumentError('identifier', `invalid SQL identifier "${name}"`);
  }
  return parts.map((p) => `"${p}"`).join('.');
}
