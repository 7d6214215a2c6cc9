export type TimeUnit = 'ns' | 'μs' | 'ms' | 's' | 'm' | 'h' | 'd';

/** Length of each unit in seconds, smallest first. */
export const TIME_UNIT_SECONDS: Readonly<Record<TimeUnit, number>> = {
  ns: 1e-9,
  μs: 1e-6,
  ms: 1e-3,
  s: 1,
  m: 60,
  h: 3600,
  d: 86400,
};

export const TIME_UNITS: readonly TimeUnit[] = ['ns', 'μs', 'ms', 's', 'm', 'h', 'd'];

export function isTimeUnit(value: string): value is TimeUnit {
  return (TIME_UNITS as readonly string[]).includes(value);
}

/**
 * Largest unit not longer than `seconds`; used to show time per item.
 */
export function niceTimeUnit(seconds: number): TimeUnit {
  for (let i = TIME_UNITS.length - 1; i >= 0; i--) {
    const unit = TIME_UNITS[i];
    if (unit !== undefined && seconds >= TIME_UNIT_SECONDS[unit]) {
      return unit;
    }
  }
  return 'ns';
}

/**
 * Smallest unit of at least a second that is not shorter than `seconds`;
 * used to show items per unit of time.
 */
export function niceSpeedUnit(seconds: number): TimeUnit {
  for (const unit of TIME_UNITS.slice(3)) {
    if (seconds <= TIME_UNIT_SECONDS[unit]) {
      return unit;
    }
  }
  return 'd';
}

/**
 * Formats a duration as `123ms` below one second, otherwise as
 * `[Nd ][Nh ][Nm ]Ns` with whole units.
 */
export function prettyPrintDuration(ms: number): string {
  const millis = Math.max(0, Math.floor(ms));
  if (millis < 1000) {
    return `${millis}ms`;
  }

  let seconds = Math.floor(millis / 1000);
  const parts: string[] = [];

  for (const unit of ['d', 'h', 'm'] as const) {
    const unitSeconds = TIME_UNIT_SECONDS[unit];
    if (seconds >= unitSeconds) {
      parts.push(`${Math.floor(seconds / unitSeconds)}${unit}`);
      seconds %= unitSeconds;
    }
  }

  parts.push(`${seconds}s`);
  return parts.join(' ');
}

const SCALE_PREFIXES = ['', 'k', 'M', 'G', 'T', 'P', 'E', 'Z', 'Y'] as const;

/** Divides by 1000 until the value drops below 1000 (or prefixes run out). */
export function scale(value: number): [number, string] {
  let scaled = value;
  for (const prefix of SCALE_PREFIXES) {
    if (scaled < 1000) {
      return [scaled, prefix];
    }
    scaled /= 1000;
  }
  return [scaled, 'Y'];
}

export function humanize(value: number): string {
  const [scaled, prefix] = scale(value);
  return `${scaled.toFixed(2)}${prefix}`;
}

export function formatCount(count: number, grouped: boolean): string {
  return grouped ? count.toLocaleString('en-US') : String(count);
}
