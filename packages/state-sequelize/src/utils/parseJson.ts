/**
 * Read a JSON column. SQLite, and MySQL/MariaDB with some driver versions,
 * hand JSON columns back as text; other dialects return the parsed value.
 */
export function parseJson(value: unknown, column: string): unknown {
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value) as unknown;
  } catch (error) {
    throw new Error(`Malformed JSON in column ${column}`, { cause: error });
  }
}
