/**
 * Durations in config files are either plain milliseconds or a number with
 * a unit: `500ms`, `30s`, `5m`, `1h`, `1d`.
 */

export const DURATION_UNITS = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
} as const;

type DurationUnit = keyof typeof DURATION_UNITS;

export const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|s|m|h|d)$/;

function isDurationUnit(unit: string): unit is DurationUnit {
  return Object.hasOwn(DURATION_UNITS, unit);
}

export function isDurationString(value: unknown): value is string {
  return typeof value === 'string' && DURATION_PATTERN.test(value);
}

/** Milliseconds for a duration string; undefined when it does not parse. */
export function parseDuration(value: string): number | undefined {
  const match = DURATION_PATTERN.exec(value.trim());
  if (!match) return undefined;

  const [, amount, unit] = match;
  if (!isDurationUnit(unit)) return undefined;

  const ms = Number.parseFloat(amount) * DURATION_UNITS[unit];
  return Number.isFinite(ms) ? Math.round(ms) : undefined;
}

export function parseDurationValue(value: string | number): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? Math.round(value) : undefined;
  }
  return parseDuration(value);
}

/** Shortest exact rendering, e.g. 300000 → `5m`, 1500 → `1500ms`. */
export function formatDuration(ms: number): string {
  const units: DurationUnit[] = ['d', 'h', 'm', 's'];
  for (const unit of units) {
    const size = DURATION_UNITS[unit];
    if (ms >= size && ms % size === 0) {
      return `${ms / size}${unit}`;
    }
  }
  return `${ms}ms`;
}
