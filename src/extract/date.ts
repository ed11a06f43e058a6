/**
 * Publication date normalization.
 *
 * Turns the locale-formatted strings news sites print ("12 марта 2024, 14:30",
 * "05.03.2024 09:15", "Yesterday, 18:00", ISO 8601) into a Date. Anything that
 * does not parse, or names an impossible calendar date, yields null.
 * Times without an explicit offset are taken as UTC.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Accepted spellings per month, January first: Russian nominative, genitive
 * and abbreviated forms, then English full names and abbreviations.
 */
const MONTH_FORMS: readonly (readonly string[])[] = [
  ['январь', 'января', 'янв', 'january', 'jan'],
  ['февраль', 'февраля', 'фев', 'february', 'feb'],
  ['март', 'марта', 'мар', 'march', 'mar'],
  ['апрель', 'апреля', 'апр', 'april', 'apr'],
  ['май', 'мая', 'may'],
  ['июнь', 'июня', 'июн', 'june', 'jun'],
  ['июль', 'июля', 'июл', 'july', 'jul'],
  ['август', 'августа', 'авг', 'august', 'aug'],
  ['сентябрь', 'сентября', 'сен', 'сент', 'september', 'sep', 'sept'],
  ['октябрь', 'октября', 'окт', 'october', 'oct'],
  ['ноябрь', 'ноября', 'ноя', 'нояб', 'november', 'nov'],
  ['декабрь', 'декабря', 'дек', 'december', 'dec'],
];

const MONTHS = new Map<string, number>(
  MONTH_FORMS.flatMap((forms, index) => forms.map((form): [string, number] => [form, index + 1]))
);

const RELATIVE_DAYS: Record<string, number> = {
  сегодня: 0,
  today: 0,
  вчера: -1,
  yesterday: -1,
};

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[t ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?(z|[+-]\d{2}:?\d{2})?)?$/;

const TIME_PATTERN = /(?:^|[\s,])(?:в\s+)?(\d{1,2}):(\d{2})(?::(\d{2}))?(?=$|[\s,])/u;

const DOTTED_DATE_PATTERN = /^(\d{1,2})[./](\d{1,2})[./](\d{4})$/;

const NAMED_MONTH_PATTERN = /^(\d{1,2})\s+([a-zа-яё]+)\.?(?:\s+(\d{4}))?$/u;

const YEAR_SUFFIX = /\s*(?:г\.?|года)$/u;

interface TimeOfDay {
  hours: number;
  minutes: number;
  seconds: number;
}

const MIDNIGHT: TimeOfDay = { hours: 0, minutes: 0, seconds: 0 };

/**
 * Build a UTC date, rejecting out-of-range parts (Date.UTC would roll
 * 31 February over into March).
 */
function utcDate(year: number, month: number, day: number, time: TimeOfDay): Date | null {
  const { hours, minutes, seconds } = time;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

function parseOffsetMinutes(offset: string | undefined): number {
  if (!offset || offset === 'z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2)));
}

function parseIso(value: string): Date | null {
  const match = ISO_PATTERN.exec(value);
  if (!match) return null;

  const [, year, month, day, hours, minutes, seconds, offset] = match;
  const local = utcDate(Number(year), Number(month), Number(day), {
    hours: Number(hours ?? 0),
    minutes: Number(minutes ?? 0),
    seconds: Number(seconds ?? 0),
  });
  if (!local) return null;
  return new Date(local.getTime() - parseOffsetMinutes(offset) * 60 * 1000);
}

/** Split "12 марта 2024, 14:30" into the date words and the time of day. */
function splitTime(value: string): { datePart: string; time: TimeOfDay } {
  const match = TIME_PATTERN.exec(value);
  if (!match) return { datePart: value, time: MIDNIGHT };

  const datePart = (value.slice(0, match.index) + ' ' + value.slice(match.index + match[0].length))
    .replace(/[\s,]+/g, ' ')
    .trim();
  return {
    datePart,
    time: {
      hours: Number(match[1]),
      minutes: Number(match[2]),
      seconds: Number(match[3] ?? 0),
    },
  };
}

/**
 * Normalize a raw date string. `now` anchors relative words such as
 * "сегодня" and supplies the year when a named-month date omits it.
 */
export function normalizeDate(raw: string | null | undefined, now: Date = new Date()): Date | null {
  if (!raw) return null;
  const value = raw.replace(/\s+/g, ' ').trim().toLowerCase();
  if (!value) return null;

  const iso = parseIso(value);
  if (iso) return iso;

  const { datePart, time } = splitTime(value);
  const cleaned = datePart.replace(YEAR_SUFFIX, '');

  if (Object.hasOwn(RELATIVE_DAYS, cleaned)) {
    const anchor = new Date(now.getTime() + RELATIVE_DAYS[cleaned] * DAY_MS);
    return utcDate(anchor.getUTCFullYear(), anchor.getUTCMonth() + 1, anchor.getUTCDate(), time);
  }

  const dotted = DOTTED_DATE_PATTERN.exec(cleaned);
  if (dotted) {
    return utcDate(Number(dotted[3]), Number(dotted[2]), Number(dotted[1]), time);
  }

  const named = NAMED_MONTH_PATTERN.exec(cleaned);
  if (named) {
    const month = MONTHS.get(named[2]);
    if (month === undefined) return null;
    const year = named[3] ? Number(named[3]) : now.getUTCFullYear();
    return utcDate(year, month, Number(named[1]), time);
  }

  return null;
}
