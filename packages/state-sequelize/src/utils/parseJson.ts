/**
 * Parse a JSON column that may arrive as a string or already parsed.
 *
 * SQLite and some MySQL/MariaDB driver versions return JSON columns as text.
 */
export function parseJson(value: unknown): unknown {
  if (typeof value === 'string') {
    return JSON.parse(value);
  }
  return value;
}
