import { addDays, format, getHours, getMinutes, isValid, parse, startOfDay } from "date-fns";
import { MEAL_PERIODS, WEEKDAYS, type DayHours, type Weekday } from "./types";

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Lowercase 3-letter day code, e.g. "sun" */
export function weekdayCode(date: Date): Weekday {
    return WEEKDAYS[date.getDay()];
}

export function isoDate(date: Date): string {
    return format(date, "yyyy-MM-dd");
}

/**
 * Dates whose menus get collected: yesterday through five days ahead.
 */
export function menuWindow(today: Date, before = 1, after = 5): string[] {
    const start = startOfDay(today);
    const dates: string[] = [];
    for (let offset = -before; offset <= after; offset++) {
        dates.push(isoDate(addDays(start, offset)));
    }
    return dates;
}

export function isIsoDate(value: string): boolean {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
    const parsed = parse(value, "yyyy-MM-dd", new Date());
    return isValid(parsed) && isoDate(parsed) === value;
}

/** "Lunch  Menu" -> "lunchmenu" */
export function compactKey(text: string): string {
    return text.replace(/\s+/g, "").toLowerCase();
}

/**
 * Minutes after midnight for "7:00 a.m." / "5:30 PM" / "12:00 p.m.".
 */
export function parseClockTime(value: string): number | null {
    const normalized = value
        .trim()
        .replace(/\s*([ap])\.?\s*m\.?$/i, (_, half: string) => ` ${half.toUpperCase()}M`);
    const parsed = parse(normalized, "h:mm a", new Date(2000, 0, 1));
    if (!isValid(parsed)) return null;
    return getHours(parsed) * 60 + getMinutes(parsed);
}

const RANGE_PATTERN = /(\d{1,2}:\d{2}\s*[ap]\.?\s*m\.?)\s*[-–]\s*(\d{1,2}:\d{2}\s*[ap]\.?\s*m\.?)/i;

/**
 * Whether `now` falls inside a range like "7:00 a.m. - 10:00 a.m.".
 * Ranges ending at or before their start run past midnight.
 */
export function isWithinHourRange(range: string, now: Date): boolean {
    const match = range.match(RANGE_PATTERN);
    if (!match) return false;

    const start = parseClockTime(match[1]);
    const end = parseClockTime(match[2]);
    if (start === null || end === null) return false;

    const current = getHours(now) * 60 + getMinutes(now);
    if (end <= start) {
        return current >= start || current <= end;
    }
    return current >= start && current <= end;
}

export function isHallOpen(hours: Partial<Record<Weekday, DayHours>>, now: Date): boolean {
    const today = hours[weekdayCode(now)];
    if (!today) return false;

    return MEAL_PERIODS.some((period) => {
        const range = today[period];
        return range !== "Closed" && isWithinHourRange(range, now);
    });
}

/** Absolute URL for a link found on a page, or the link unchanged if it cannot be resolved */
export function resolveUrl(href: string, base: string): string {
    return URL.canParse(href, base) ? new URL(href, base).toString() : href;
}
