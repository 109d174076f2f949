/** BIGINT columns come back as strings from some drivers (pg) and as numbers from others. */
export function toEpoch(value: number | string): number {
  return Number(value);
}

export function toOptionalEpoch(value: number | string | null): number | undefined {
  return value === null ? undefined : Number(value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Narrow a stored string to one of `allowed`, failing loudly on anything else. */
export function parseEnum<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Unexpected ${column} value in database: ${value}`);
  }
  return match;
}
