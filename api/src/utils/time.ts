interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatterCache.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatterCache.set(timeZone, fmt);
  }
  return fmt;
}

/**
 * Wall-clock fields of `instant` in `timeZone`
 */
export function getZonedParts(instant: number, timeZone: string): ZonedParts {
  const parts: Record<string, number> = {};
  for (const part of getFormatter(timeZone).formatToParts(new Date(instant))) {
    if (part.type !== 'literal') {
      parts[part.type] = parseInt(part.value, 10);
    }
  }
  return {
    year: parts.year,
    month: parts.month,
    day: parts.day,
    hour: parts.hour === 24 ? 0 : parts.hour,
    minute: parts.minute,
    second: parts.second,
  };
}

/**
 * Offset of `timeZone` from UTC at `instant`, in milliseconds
 */
export function getZoneOffset(instant: number, timeZone: string): number {
  const p = getZonedParts(instant, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUtc - Math.floor(instant / 1000) * 1000;
}

/**
 * Start of the calendar day containing `instant`, as observed in `timeZone`
 */
export function localMidnight(instant: number, timeZone: string): number {
  const p = getZonedParts(instant, timeZone);
  const wall = Date.UTC(p.year, p.month - 1, p.day);

  // The offset at midnight can differ from the offset at `instant` across DST changes
  const guess = wall - getZoneOffset(instant, timeZone);
  return wall - getZoneOffset(guess, timeZone);
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * HH:MM in `timeZone`
 */
export function formatLocalTime(instant: number, timeZone: string): string {
  const p = getZonedParts(instant, timeZone);
  return `${pad(p.hour)}:${pad(p.minute)}`;
}

/**
 * DD.MM HH:MM in `timeZone`
 */
export function formatLocalDateTime(instant: number, timeZone: string): string {
  const p = getZonedParts(instant, timeZone);
  return `${pad(p.day)}.${pad(p.month)} ${pad(p.hour)}:${pad(p.minute)}`;
}

/**
 * Whether `timeZone` is an IANA name the runtime knows
 */
export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone) {
    return false;
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}
