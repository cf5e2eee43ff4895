// "Today" is always the calendar date in the configured time zone, never UTC.

const formatters = new Map<string, Intl.DateTimeFormat>();

const formatterFor = (timeZone: string): Intl.DateTimeFormat => {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
};

/** Calendar date of `date` in `timeZone`, as YYYY-MM-DD. */
export const localDateKey = (date: Date, timeZone: string): string => {
  const parts = formatterFor(timeZone).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "";
  return `${part("year")}-${part("month")}-${part("day")}`;
};

export const isSameLocalDay = (a: Date, b: Date, timeZone: string): boolean =>
  localDateKey(a, timeZone) === localDateKey(b, timeZone);

// UTC offsets run from -12h to +14h, so a local day always starts less than
// 48 hours before any instant inside it.
const LOCAL_DAY_LOOKBACK_MS = 48 * 60 * 60 * 1000;

/** A lower bound for queries that are filtered down to `now`'s local day. */
export const localDayLookback = (now: Date): Date =>
  new Date(now.getTime() - LOCAL_DAY_LOOKBACK_MS);
