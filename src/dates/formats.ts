// Field parsers for the timestamp shapes the exporter writes. All of them
// read wall-clock time in the local zone except the internet date-time,
// which carries its own offset.

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const MONTH_DAY_YEAR_TIME = /^([a-z]{3})\s+(\d{1,2}),\s*(\d{4})\s+(\d{1,2}):(\d{2}):(\d{2})\s*([ap]m)$/i;
const MONTH_DAY_YEAR_AT_TIME = /^([a-z]{3})\s+(\d{1,2}),\s*(\d{4})\s+at\s+(\d{1,2}):(\d{2}):(\d{2})\s*([ap]m)$/i;
const ISO_LOCAL_SPACE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const ISO_LOCAL_T = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;
const INTERNET_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d+)(Z|[+-]\d{2}:\d{2})$/i;

interface Fields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function inRange(f: Fields): boolean {
  return f.month >= 1 && f.month <= 12
    && f.day >= 1 && f.day <= 31
    && f.hour >= 0 && f.hour <= 23
    && f.minute >= 0 && f.minute <= 59
    && f.second >= 0 && f.second <= 59;
}

/** Local wall-clock time, or null for a date the calendar does not have (Feb 30). */
function localDate(f: Fields): Date | null {
  if (!inRange(f)) return null;
  const date = new Date(f.year, f.month - 1, f.day, f.hour, f.minute, f.second);
  if (date.getFullYear() !== f.year || date.getMonth() !== f.month - 1 || date.getDate() !== f.day) {
    return null;
  }
  return date;
}

function fromMonthMatch(m: RegExpExecArray | null): Date | null {
  if (!m) return null;
  const month = MONTHS.indexOf(m[1].toLowerCase()) + 1;
  const hour12 = Number(m[4]);
  if (month === 0 || hour12 < 1 || hour12 > 12) return null;

  const pm = m[7].toLowerCase() === 'pm';
  const hour = (hour12 % 12) + (pm ? 12 : 0);

  return localDate({
    year: Number(m[3]),
    month,
    day: Number(m[2]),
    hour,
    minute: Number(m[5]),
    second: Number(m[6]),
  });
}

function fromIsoMatch(m: RegExpExecArray | null): Date | null {
  if (!m) return null;
  return localDate({
    year: Number(m[1]),
    month: Number(m[2]),
    day: Number(m[3]),
    hour: Number(m[4]),
    minute: Number(m[5]),
    second: Number(m[6]),
  });
}

/** "Nov 28, 2024 11:46:34 AM" */
export function parseMonthDayYearTime(text: string): Date | null {
  return fromMonthMatch(MONTH_DAY_YEAR_TIME.exec(text));
}

/** "Nov 28, 2024 at 11:46:34 AM" */
export function parseMonthDayYearAtTime(text: string): Date | null {
  return fromMonthMatch(MONTH_DAY_YEAR_AT_TIME.exec(text));
}

/** "2024-11-28 11:46:34", or with a "T" separator when asked. */
export function parseIsoLocal(text: string, separator: ' ' | 'T' = ' '): Date | null {
  return fromIsoMatch((separator === 'T' ? ISO_LOCAL_T : ISO_LOCAL_SPACE).exec(text));
}

/** "2024-11-28T11:46:34.250Z" or "...+02:00". Fractional seconds and a zone are required. */
export function parseInternetDateTime(text: string): Date | null {
  const m = INTERNET_DATE_TIME.exec(text);
  if (!m) return null;

  const f: Fields = {
    year: Number(m[1]),
    month: Number(m[2]),
    day: Number(m[3]),
    hour: Number(m[4]),
    minute: Number(m[5]),
    second: Number(m[6]),
  };
  if (!inRange(f)) return null;

  const ms = Number(m[7].padEnd(3, '0').slice(0, 3));
  const utc = Date.UTC(f.year, f.month - 1, f.day, f.hour, f.minute, f.second, ms);
  const check = new Date(utc);
  if (check.getUTCFullYear() !== f.year || check.getUTCMonth() !== f.month - 1 || check.getUTCDate() !== f.day) {
    return null;
  }

  const zone = m[8].toUpperCase();
  let offsetMinutes = 0;
  if (zone !== 'Z') {
    const sign = zone.startsWith('-') ? -1 : 1;
    const hours = Number(zone.slice(1, 3));
    const minutes = Number(zone.slice(4, 6));
    if (hours > 23 || minutes > 59) return null;
    offsetMinutes = sign * (hours * 60 + minutes);
  }

  return new Date(utc - offsetMinutes * 60_000);
}
