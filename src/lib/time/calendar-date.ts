import { InvalidDateError } from "@/lib/errors";
import type { CalendarDate } from "@/types/scores";

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

/**
 * Parses an ISO `YYYY-MM-DD` string, rejecting impossible days such as
 * `2024-13-40` or `2023-02-29`.
 */
export function parseCalendarDate(input: string): CalendarDate {
    const match = ISO_DATE_PATTERN.exec(input.trim());
    if (!match) throw new InvalidDateError(input);

    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);

    // Overflowing parts roll forward, so a round trip exposes them.
    // setUTCFullYear keeps years 0-99 literal; Date.UTC would map them to 19xx.
    const roundTrip = new Date(0);
    roundTrip.setUTCFullYear(year, month - 1, day);
    if (
        roundTrip.getUTCFullYear() !== year ||
        roundTrip.getUTCMonth() !== month - 1 ||
        roundTrip.getUTCDate() !== day
    ) {
        throw new InvalidDateError(input);
    }

    return { year, month, day };
}

export const formatIsoDate = (date: CalendarDate): string =>
    `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;

/** Scoreboard query format: `YYYYMMDD` */
export const toApiDate = (date: CalendarDate): string =>
    `${pad(date.year, 4)}${pad(date.month)}${pad(date.day)}`;

const zonedParts = (instant: Date, timeZone: string, options: Intl.DateTimeFormatOptions) => {
    const parts = new Intl.DateTimeFormat("en-US", { timeZone, ...options }).formatToParts(instant);
    const read = (type: Intl.DateTimeFormatPartTypes): string =>
        parts.find((part) => part.type === type)?.value ?? "";
    return read;
};

/**
 * Calendar day of `instant` as seen in `timeZone`. The default date of the
 * scoreboard query is "today" in the reference zone, not in the host's zone.
 */
export const calendarDateInZone = (instant: Date, timeZone: string): CalendarDate => {
    const read = zonedParts(instant, timeZone, { year: "numeric", month: "2-digit", day: "2-digit" });
    return { year: Number(read("year")), month: Number(read("month")), day: Number(read("day")) };
};

export const todayInZone = (timeZone: string, now: Date = new Date()): CalendarDate =>
    calendarDateInZone(now, timeZone);

/** Clock time like `07:30 PM EST` in the given zone. */
export const formatClockTime = (instant: Date, timeZone: string): string => {
    const read = zonedParts(instant, timeZone, {
        hour: "2-digit",
        minute: "2-digit",
        hour12: true,
        timeZoneName: "short",
    });
    return `${read("hour")}:${read("minute")} ${read("dayPeriod")} ${read("timeZoneName")}`;
};

export const isValidTimeZone = (timeZone: string): boolean => {
    try {
        new Intl.DateTimeFormat("en-US", { timeZone });
        return true;
    } catch {
        return false;
    }
};
