export const DEFAULT_TIMESTAMP_FORMAT = '%Y-%m-%d %H:%M:%S';

const SHORT_DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const LONG_DAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const SHORT_MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const LONG_MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December'
];

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function dayOfYear(date: Date): number {
  const startOfYear = new Date(date.getFullYear(), 0, 1);
  const startOfDay = new Date(date.getFullYear(), date.getMonth(), date.getDate());
  return Math.round((startOfDay.getTime() - startOfYear.getTime()) / 86_400_000) + 1;
}

function utcOffset(date: Date): string {
  const offsetMins = -date.getTimezoneOffset();
  const sign = offsetMins < 0 ? '-' : '+';
  const abs = Math.abs(offsetMins);
  return `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`;
}

const directives: Record<string, (date: Date) => string> = {
  Y: (date) => String(date.getFullYear()),
  y: (date) => pad(date.getFullYear() % 100),
  m: (date) => pad(date.getMonth() + 1),
  d: (date) => pad(date.getDate()),
  H: (date) => pad(date.getHours()),
  I: (date) => pad(date.getHours() % 12 || 12),
  M: (date) => pad(date.getMinutes()),
  S: (date) => pad(date.getSeconds()),
  f: (date) => pad(date.getMilliseconds() * 1000, 6),
  p: (date) => (date.getHours() < 12 ? 'AM' : 'PM'),
  j: (date) => pad(dayOfYear(date), 3),
  a: (date) => SHORT_DAYS[date.getDay()],
  A: (date) => LONG_DAYS[date.getDay()],
  b: (date) => SHORT_MONTHS[date.getMonth()],
  B: (date) => LONG_MONTHS[date.getMonth()],
  z: (date) => utcOffset(date),
  s: (date) => String(Math.floor(date.getTime() / 1000)),
  '%': () => '%'
};

/** Lists what is wrong with a strftime-style pattern; empty when it is usable. */
export function validateTimestampFormat(pattern: string): string[] {
  const problems: string[] = [];
  for (let i = 0; i < pattern.length; i += 1) {
    if (pattern[i] !== '%') {
      continue;
    }
    const directive = pattern[i + 1];
    if (directive === undefined) {
      problems.push('pattern ends with a lone "%"');
    } else if (!(directive in directives)) {
      problems.push(`unsupported directive "%${directive}"`);
    }
    i += 1;
  }
  return problems;
}

/** Renders `epochMs` in local time; unknown directives are copied through as-is. */
export function formatTimestamp(pattern: string, epochMs: number): string {
  const date = new Date(epochMs);
  let out = '';
  for (let i = 0; i < pattern.length; i += 1) {
    const char = pattern[i];
    const directive = pattern[i + 1];
    if (char !== '%' || directive === undefined) {
      out += char;
      continue;
    }
    const render: ((date: Date) => string) | undefined = directives[directive];
    out += render ? render(date) : `%${directive}`;
    i += 1;
  }
  return out;
}
