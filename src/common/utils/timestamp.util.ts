const RFC3339 =
  /^(\d{4}-\d{2}-\d{2})[Tt](\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?([Zz]|[+-]\d{2}:\d{2})$/;

/**
 * Normalizes an RFC3339 timestamp to UTC with exactly six fraction digits,
 * truncating (never rounding) anything finer than a microsecond.
 * Returns `null` when the text is not a valid RFC3339 timestamp.
 *
 * PostgreSQL `timestamptz` stores microseconds, so this is the precision a
 * seek key has to carry to land exactly on a stored row.
 */
export function parseMicrosecondTimestamp(value: string): string | null {
  const match = RFC3339.exec(value);
  if (!match) return null;

  const [, day, time, fraction = '', zone] = match;
  const millis = Date.parse(`${day}T${time}${zone.toUpperCase()}`);
  if (Number.isNaN(millis)) return null;

  const seconds = new Date(millis).toISOString().slice(0, 19);
  return `${seconds}.${fraction.slice(0, 6).padEnd(6, '0')}Z`;
}

export function toMicrosecondTimestamp(value: string | Date): string {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new RangeError('Invalid Date cannot be used as a timestamp');
    }
    return `${value.toISOString().slice(0, 23)}000Z`;
  }

  const normalized = parseMicrosecondTimestamp(value);
  if (normalized === null) {
    throw new RangeError(`Not an RFC3339 timestamp: ${value}`);
  }
  return normalized;
}
