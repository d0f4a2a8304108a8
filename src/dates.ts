const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Three-letter prefixes of month names, English and Portuguese
const MONTH_PREFIXES: Record<string, number> = {
  jan: 1,
  feb: 2,
  fev: 2,
  mar: 3,
  apr: 4,
  abr: 4,
  may: 5,
  mai: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  ago: 8,
  sep: 9,
  set: 9,
  oct: 10,
  out: 10,
  nov: 11,
  dec: 12,
  dez: 12,
};

const MONTH_WORD = '([A-Za-zÀ-ÿ]{3,10})\\.?';

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const ISO_DATETIME = /^(\d{4})-(\d{2})-(\d{2})[T ]\d{2}:\d{2}/;
const UTC_OFFSET = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const NUMERIC_DMY = /^(\d{1,2})[/\-.](\d{1,2})[/\-.](\d{2}|\d{4})$/;
const TEXT_DMY = new RegExp(
  `^(\\d{1,2})(?:st|nd|rd|th|º|°)?\\s+(?:de\\s+)?${MONTH_WORD},?\\s+(?:de\\s+)?(\\d{4})$`,
  'i',
);
const TEXT_MDY = new RegExp(`^${MONTH_WORD}\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})$`, 'i');

function stripAccents(value: string): string {
  return value.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

export function monthFromName(name: string): number | null {
  const key = stripAccents(name).toLowerCase().slice(0, 3);
  return MONTH_PREFIXES[key] ?? null;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function toIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const check = new Date(Date.UTC(year, month - 1, day));
  const rolledOver =
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day;
  if (rolledOver) return null;
  return `${year}-${pad(month)}-${pad(day)}`;
}

function expandYear(value: string): number {
  const year = parseInt(value, 10);
  return value.length === 2 ? 2000 + year : year;
}

/**
 * Calendar date (YYYY-MM-DD) of an instant as seen in the given time zone.
 */
export function zonedDate(instant: Date | number, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(instant);
  const get = (type: string) => parts.find((part) => part.type === type)?.value ?? '';
  return `${get('year')}-${get('month')}-${get('day')}`;
}

/**
 * Parses the many ways sources print a date into YYYY-MM-DD, or null when
 * nothing sensible comes out. Numeric dates are read day-first.
 */
export function parseDateAny(value: string | null | undefined, timeZone = 'UTC'): string | null {
  if (!value) return null;
  const trimmed = value.replace(/\s+/g, ' ').trim();
  if (!trimmed || trimmed.toUpperCase() === 'TBD') return null;

  let match = trimmed.match(ISO_DATE);
  if (match) {
    return toIsoDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  match = trimmed.match(ISO_DATETIME);
  if (match) {
    // without an offset the printed calendar date is the deadline
    if (!UTC_OFFSET.test(trimmed)) {
      return toIsoDate(Number(match[1]), Number(match[2]), Number(match[3]));
    }
    const parsed = Date.parse(trimmed);
    return Number.isNaN(parsed) ? null : zonedDate(parsed, timeZone);
  }

  match = trimmed.match(NUMERIC_DMY);
  if (match) {
    return toIsoDate(expandYear(match[3]), Number(match[2]), Number(match[1]));
  }

  match = trimmed.match(TEXT_DMY);
  if (match) {
    const month = monthFromName(match[2]);
    return month ? toIsoDate(Number(match[3]), month, Number(match[1])) : null;
  }

  match = trimmed.match(TEXT_MDY);
  if (match) {
    const month = monthFromName(match[1]);
    return month ? toIsoDate(Number(match[3]), month, Number(match[2])) : null;
  }

  // RFC 822 and other engine-readable timestamps, as found in feeds
  if (/\d{4}/.test(trimmed) && /\d{1,2}:\d{2}/.test(trimmed)) {
    const parsed = Date.parse(trimmed);
    if (!Number.isNaN(parsed)) return zonedDate(parsed, timeZone);
  }

  return null;
}

export function daysBetween(fromIso: string, toIso: string): number {
  const [fy, fm, fd] = fromIso.split('-').map(Number);
  const [ty, tm, td] = toIso.split('-').map(Number);
  return Math.round((Date.UTC(ty, tm - 1, td) - Date.UTC(fy, fm - 1, fd)) / MS_PER_DAY);
}

/**
 * Unknown deadlines always pass: a missing date says nothing about
 * eligibility.
 */
export function withinMinDays(
  deadlineIso: string | null,
  minDays: number,
  todayIso: string,
): boolean {
  if (!deadlineIso) return true;
  return daysBetween(todayIso, deadlineIso) >= minDays;
}

const DATE_TOKEN = [
  String.raw`\d{4}-\d{2}-\d{2}`,
  String.raw`\d{1,2}[/\-.]\d{1,2}[/\-.]\d{2,4}`,
  String.raw`\d{1,2}\s+(?:de\s+)?[A-Za-zçÇáéíóúãõâêôüÜ]{3,15}\.?\s+(?:de\s+)?\d{4}`,
].join('|');

// English or Portuguese
const DEADLINE_KEYWORD = [
  'deadline',
  'closing',
  'closes',
  String.raw`close\s*date`,
  String.raw`due\s*date`,
  String.raw`apply\s*by`,
  'prazo',
  'encerramento',
  String.raw`inscri[cç][oõ]es\s*at[eé]`,
  'fecha(?:mento)?',
  String.raw`fecha\s*em`,
].join('|');

// keyword followed by a date
const DEADLINE_NEAR_KEYWORD = new RegExp(
  `(?:${DEADLINE_KEYWORD})[^0-9A-Za-z]{0,20}(${DATE_TOKEN})`,
  'i',
);

const ANY_DATE = new RegExp(`(${DATE_TOKEN})`);

export function findDeadlineNearKeyword(text: string, timeZone = 'UTC'): string | null {
  const near = text.match(DEADLINE_NEAR_KEYWORD);
  return near ? parseDateAny(near[1], timeZone) : null;
}

/**
 * Looks for a date next to a deadline keyword first, then for any date at
 * all.
 */
export function findDeadlineInText(text: string, timeZone = 'UTC'): string | null {
  if (!text) return null;
  const near = findDeadlineNearKeyword(text, timeZone);
  if (near) return near;
  const any = text.match(ANY_DATE);
  return any ? parseDateAny(any[1], timeZone) : null;
}
