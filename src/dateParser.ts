import { DateFormatError, UnknownMonthError } from "./errors";
import { OutageWindow } from "./types";

/** Polish month names in the genitive case, as used in "8 grudnia 2025 r." */
export const MONTHS: Readonly<Record<string, number>> = {
  stycznia: 1,
  lutego: 2,
  marca: 3,
  kwietnia: 4,
  maja: 5,
  czerwca: 6,
  lipca: 7,
  sierpnia: 8,
  września: 9,
  października: 10,
  listopada: 11,
  grudnia: 12,
};

interface DatePattern {
  name: string;
  /**
   * Must capture `day`, `month`, `year`, `endHour` and `endMinute`.
   * Patterns that publish a window also capture `startHour` and `startMinute`.
   */
  regex: RegExp;
}

/** Tried in order; the first match wins. */
export const DATE_PATTERNS: readonly DatePattern[] = [
  {
    // "8 grudnia 2025 r. w godz. 08:00 - 16:00"
    name: "planned-window",
    regex:
      /(?<day>\d{1,2})\s+(?<month>\p{L}+)\s+(?<year>\d{4})\s+r\.\s*w\s+godz\.\s*(?<startHour>\d{1,2}):(?<startMinute>\d{1,2})\s*[-–—]\s*(?<endHour>\d{1,2}):(?<endMinute>\d{1,2})/iu,
  },
  {
    // "19 listopada 2025 r.  do godziny 12:30"
    name: "unplanned-deadline",
    regex:
      /(?<day>\d{1,2})\s+(?<month>\p{L}+)\s+(?<year>\d{4})\s+r\.\s*do\s+godziny\s+(?<endHour>\d{1,2}):(?<endMinute>\d{1,2})/iu,
  },
];

export function monthNumber(monthName: string): number {
  const month = MONTHS[monthName.toLocaleLowerCase("pl")];
  if (month === undefined) {
    throw new UnknownMonthError(monthName);
  }
  return month;
}

function toDate(
  dateInfo: string,
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number
): Date {
  if (hour > 23 || minute > 59) {
    throw new DateFormatError(dateInfo, `invalid time ${hour}:${minute}`);
  }

  const date = new Date(year, month - 1, day, hour, minute, 0, 0);
  // Date rolls "31 lutego" over into March; reject instead.
  if (date.getMonth() !== month - 1 || date.getDate() !== day) {
    throw new DateFormatError(dateInfo, `invalid day ${day}`);
  }
  return date;
}

function requireGroup(
  groups: Record<string, string | undefined>,
  key: string,
  dateInfo: string
): string {
  const value = groups[key];
  if (value === undefined) {
    throw new DateFormatError(dateInfo, `missing ${key}`);
  }
  return value;
}

/**
 * Turns the bold date line of a notice into a start/end pair.
 * Unplanned notices only publish the expected restoration time, so their
 * start is null. Throws DateFormatError or UnknownMonthError.
 */
export function normalizeDateInfo(dateInfo: string): OutageWindow {
  for (const pattern of DATE_PATTERNS) {
    const groups = pattern.regex.exec(dateInfo)?.groups;
    if (!groups) {
      continue;
    }

    const day = Number(requireGroup(groups, "day", dateInfo));
    const month = monthNumber(requireGroup(groups, "month", dateInfo));
    const year = Number(requireGroup(groups, "year", dateInfo));

    const endHour = Number(requireGroup(groups, "endHour", dateInfo));
    const endMinute = Number(requireGroup(groups, "endMinute", dateInfo));
    const endTime = toDate(dateInfo, year, month, day, endHour, endMinute);

    if (groups.startHour === undefined || groups.startMinute === undefined) {
      return { startTime: null, endTime };
    }

    const startHour = Number(groups.startHour);
    const startMinute = Number(groups.startMinute);
    const startTime = toDate(dateInfo, year, month, day, startHour, startMinute);

    // Wall-clock order; Date values collapse inside a DST gap.
    if (startHour * 60 + startMinute >= endHour * 60 + endMinute) {
      throw new DateFormatError(dateInfo, "window ends before it starts");
    }

    return { startTime, endTime };
  }

  throw new DateFormatError(dateInfo);
}
