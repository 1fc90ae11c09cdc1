/**
 * Human readable durations such as "10m", "1h30m" or "1.5s".
 *
 * Values are nanosecond counts so they print back in the same notation the
 * cluster-autoscaler flags expect ("10m0s").
 */

export type Duration = number;

export const NANOSECOND = 1;
export const MICROSECOND = 1_000 * NANOSECOND;
export const MILLISECOND = 1_000 * MICROSECOND;
export const SECOND = 1_000 * MILLISECOND;
export const MINUTE = 60 * SECOND;
export const HOUR = 60 * MINUTE;

const UNITS: Record<string, number> = {
  ns: NANOSECOND,
  us: MICROSECOND,
  'µs': MICROSECOND,
  'μs': MICROSECOND,
  ms: MILLISECOND,
  s: SECOND,
  m: MINUTE,
  h: HOUR,
};

export class DurationParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DurationParseError';
  }
}

export function parseDuration(input: string): Duration {
  const quoted = JSON.stringify(input);
  let rest = input;
  let sign = 1;

  if (rest.startsWith('-') || rest.startsWith('+')) {
    sign = rest.startsWith('-') ? -1 : 1;
    rest = rest.slice(1);
  }
  if (rest === '0') {
    return 0;
  }
  if (rest === '') {
    throw new DurationParseError(`invalid duration ${quoted}`);
  }

  let total = 0;
  while (rest !== '') {
    const number = /^(\d*)(?:\.(\d*))?/.exec(rest);
    const whole = number?.[1] ?? '';
    const fraction = number?.[2];
    if (whole === '' && (fraction === undefined || fraction === '')) {
      throw new DurationParseError(`invalid duration ${quoted}`);
    }
    rest = rest.slice(number?.[0].length ?? 0);

    const unitMatch = /^[^\d.]+/.exec(rest);
    if (!unitMatch) {
      throw new DurationParseError(`missing unit in duration ${quoted}`);
    }
    const unitName = unitMatch[0];
    const unit = UNITS[unitName];
    if (unit === undefined) {
      if (/\s/.test(unitName)) {
        throw new DurationParseError(`invalid duration ${quoted}`);
      }
      throw new DurationParseError(`unknown unit ${JSON.stringify(unitName)} in duration ${quoted}`);
    }
    rest = rest.slice(unitName.length);

    const value = Number(whole || '0') * unit + (fraction ? Math.round(Number(`0.${fraction}`) * unit) : 0);
    total += value;
  }

  if (!Number.isSafeInteger(total)) {
    throw new DurationParseError(`invalid duration ${quoted}`);
  }
  return sign * total;
}

function trimFraction(value: number, unit: number): string {
  const whole = Math.floor(value / unit);
  const remainder = value % unit;
  if (remainder === 0) {
    return String(whole);
  }
  const digits = String(unit).length - 1;
  const fraction = String(remainder).padStart(digits, '0').replace(/0+$/, '');
  return `${whole}.${fraction}`;
}

export function formatDuration(duration: Duration): string {
  if (duration === 0) {
    return '0s';
  }
  const sign = duration < 0 ? '-' : '';
  const d = Math.abs(duration);

  if (d < MICROSECOND) {
    return `${sign}${d}ns`;
  }
  if (d < MILLISECOND) {
    return `${sign}${trimFraction(d, MICROSECOND)}µs`;
  }
  if (d < SECOND) {
    return `${sign}${trimFraction(d, MILLISECOND)}ms`;
  }

  const hours = Math.floor(d / HOUR);
  const minutes = Math.floor((d % HOUR) / MINUTE);
  const seconds = trimFraction(d % MINUTE, SECOND);

  if (hours > 0) {
    return `${sign}${hours}h${minutes}m${seconds}s`;
  }
  if (minutes > 0) {
    return `${sign}${minutes}m${seconds}s`;
  }
  return `${sign}${seconds}s`;
}
