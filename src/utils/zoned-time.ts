// Timezone-aware wall-clock formatting on top of Intl, with a fixed-offset
// fallback for runtimes built without full ICU data.

export interface ZonedParts {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone }).format();
    return true;
  } catch {
    return false;
  }
}

function intlParts(date: Date, timeZone: string): ZonedParts {
  const fmt = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });
  const lookup: Record<string, string> = {};
  for (const p of fmt.formatToParts(date)) {
    if (p.type !== 'literal') lookup[p.type] = p.value;
  }
  return {
    year: lookup.year ?? '1970',
    month: lookup.month ?? '01',
    day: lookup.day ?? '01',
    hour: lookup.hour ?? '00',
    minute: lookup.minute ?? '00',
    second: lookup.second ?? '00',
  };
}

export function fixedOffsetParts(date: Date, offsetMinutes: number): ZonedParts {
  const shifted = new Date(date.getTime() + offsetMinutes * 60_000);
  return {
    year: String(shifted.getUTCFullYear()),
    month: pad2(shifted.getUTCMonth() + 1),
    day: pad2(shifted.getUTCDate()),
    hour: pad2(shifted.getUTCHours()),
    minute: pad2(shifted.getUTCMinutes()),
    second: pad2(shifted.getUTCSeconds()),
  };
}

/**
 * Wall-clock parts of `date` in `timeZone`; an unknown zone uses the fixed
 * `fallbackOffsetMinutes` east of UTC instead.
 */
export function getZonedParts(date: Date, timeZone: string, fallbackOffsetMinutes: number): ZonedParts {
  if (!isValidTimeZone(timeZone)) return fixedOffsetParts(date, fallbackOffsetMinutes);
  return intlParts(date, timeZone);
}

/** `2026-01-31 18:05:09` */
export function formatIsoLike(p: ZonedParts): string {
  return `${p.year}-${p.month}-${p.day} ${p.hour}:${p.minute}:${p.second}`;
}

/** `31/01/2026 18:05:09` */
export function formatDayMonthYear(p: ZonedParts): string {
  return `${p.day}/${p.month}/${p.year} ${p.hour}:${p.minute}:${p.second}`;
}
