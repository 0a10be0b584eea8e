export type Parsed<T> =
  | { status: 'absent' }
  | { status: 'invalid'; raw: string }
  | { status: 'ok'; value: T };

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?Z?$/;

/**
 * Parses a naive wall-clock timestamp. The result is a Date whose UTC fields
 * equal the wall clock, so calendar features read it with getUTC*().
 */
export function parseTimestamp(value: string | undefined): Parsed<Date> {
  const raw = value?.trim();
  if (!raw) return { status: 'absent' };

  const match = TIMESTAMP_PATTERN.exec(raw);
  if (!match) return { status: 'invalid', raw };

  const [, y, mo, d, h, mi, s = '0', frac = '0'] = match;
  const year = Number(y);
  const month = Number(mo) - 1;
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = Math.round(Number(`0.${frac}`) * 1000);

  const date = new Date(Date.UTC(year, month, day, hour, minute, second, millis));
  // Date.UTC rolls over out-of-range fields (Feb 30 -> Mar 2); reject those
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return { status: 'invalid', raw };
  }
  return { status: 'ok', value: date };
}

export function parseNumber(value: string | undefined): Parsed<number> {
  const raw = value?.trim();
  if (!raw) return { status: 'absent' };

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return { status: 'invalid', raw };
  return { status: 'ok', value: parsed };
}

export function parseText(value: string | undefined): string | null {
  const raw = value?.trim();
  return raw ? raw : null;
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

export function formatTimestamp(date: Date): string {
  const base =
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  const ms = date.getUTCMilliseconds();
  return ms === 0 ? base : `${base}.${pad(ms, 3)}`;
}
