/**
 * Parses a duration such as `90s`, `15m`, `24h` or `7d` into seconds.
 * A bare integer is taken as seconds. Anything unparseable yields `defaultSeconds`.
 */
export const parseDurationToSeconds = (
  duration: string | undefined,
  defaultSeconds: number,
): number => {
  if (!duration) return defaultSeconds;

  const trimmed = duration.trim();
  if (/^\d+$/.test(trimmed)) return parseInt(trimmed, 10);

  const unit = trimmed.slice(-1);
  const value = parseInt(trimmed.slice(0, -1), 10);

  if (isNaN(value) || value < 0) return defaultSeconds;

  switch (unit) {
    case 's': return value;
    case 'm': return value * 60;
    case 'h': return value * 60 * 60;
    case 'd': return value * 60 * 60 * 24;
    case 'w': return value * 60 * 60 * 24 * 7;
    default: return defaultSeconds;
  }
};
