/**
 * DateTimeNormalizer
 *
 * Turns the free-form schedule strings found in the post store into instants.
 * Strings without a zone are read in a fixed default offset (IST, +05:30,
 * unless configured otherwise). Malformed input yields null, never an error.
 */

export const DEFAULT_UTC_OFFSET_MINUTES = 330;

interface DateTimeFormat {
    name: string;
    pattern: RegExp;
    order: 'ymd' | 'mdy' | 'dmy';
}

const TIME = '(\\d{1,2}):(\\d{1,2})';
const SECONDS = ':(\\d{1,2})';
const ZONE = '(?:\\s*(Z|[+-]\\d{2}:?\\d{2}))?';

/**
 * Tried in order; the first successful parse wins.
 */
const FORMATS: DateTimeFormat[] = [
    { name: 'YYYY-MM-DD HH:MM:SS', pattern: new RegExp(`^(\\d{4})-(\\d{1,2})-(\\d{1,2})[ T]${TIME}${SECONDS}${ZONE}$`), order: 'ymd' },
    { name: 'YYYY-MM-DD HH:MM', pattern: new RegExp(`^(\\d{4})-(\\d{1,2})-(\\d{1,2})[ T]${TIME}()${ZONE}$`), order: 'ymd' },
    { name: 'MM/DD/YYYY HH:MM:SS', pattern: new RegExp(`^(\\d{1,2})/(\\d{1,2})/(\\d{4}) ${TIME}${SECONDS}$`), order: 'mdy' },
    { name: 'MM/DD/YYYY HH:MM', pattern: new RegExp(`^(\\d{1,2})/(\\d{1,2})/(\\d{4}) ${TIME}$`), order: 'mdy' },
    { name: 'DD/MM/YYYY HH:MM:SS', pattern: new RegExp(`^(\\d{1,2})/(\\d{1,2})/(\\d{4}) ${TIME}${SECONDS}$`), order: 'dmy' },
    { name: 'DD/MM/YYYY HH:MM', pattern: new RegExp(`^(\\d{1,2})/(\\d{1,2})/(\\d{4}) ${TIME}$`), order: 'dmy' },
];

export const ACCEPTED_DATETIME_FORMATS: readonly string[] = FORMATS.map((format) => format.name);

interface DateTimeParts {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
}

/**
 * Parses a schedule string into an instant.
 *
 * @param defaultOffsetMinutes - offset east of UTC applied when the string carries no zone
 * @returns the instant, or null when the value is blank or matches no accepted format
 */
export function parseScheduleDateTime(
    value: string | null | undefined,
    defaultOffsetMinutes: number = DEFAULT_UTC_OFFSET_MINUTES
): Date | null {
    const text = (value ?? '').trim();
    if (!text) {
        return null;
    }

    for (const format of FORMATS) {
        const match = format.pattern.exec(text);
        if (!match) {
            continue;
        }

        const parts = toParts(format.order, match);
        if (!isValidCalendarTime(parts)) {
            continue;
        }

        const zone = format.order === 'ymd' ? match[7] : undefined;
        const offsetMinutes = zone ? parseUtcOffset(zone) : defaultOffsetMinutes;
        if (offsetMinutes === null) {
            continue;
        }

        const wallClockMs = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
        return new Date(wallClockMs - offsetMinutes * 60_000);
    }

    return null;
}

export function isSchedulable(value: string, defaultOffsetMinutes: number = DEFAULT_UTC_OFFSET_MINUTES): boolean {
    return parseScheduleDateTime(value, defaultOffsetMinutes) !== null;
}

/**
 * Formats an instant as 'YYYY-MM-DD HH:MM:SS' wall-clock time in the given offset.
 */
export function formatDateTime(instant: Date, offsetMinutes: number = DEFAULT_UTC_OFFSET_MINUTES): string {
    const shifted = new Date(instant.getTime() + offsetMinutes * 60_000);
    const pad = (n: number) => n.toString().padStart(2, '0');
    return (
        `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())} ` +
        `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())}`
    );
}

/**
 * Parses 'Z', '+05:30', '-0800' or '+05' style designators into minutes east of UTC.
 */
export function parseUtcOffset(value: string): number | null {
    const text = value.trim();
    if (text === 'Z' || text === 'z') {
        return 0;
    }

    const match = /^([+-])(\d{2}):?(\d{2})?$/.exec(text);
    if (!match) {
        return null;
    }

    const hours = parseInt(match[2], 10);
    const minutes = match[3] ? parseInt(match[3], 10) : 0;
    if (hours > 14 || minutes > 59) {
        return null;
    }

    const total = hours * 60 + minutes;
    return match[1] === '-' ? -total : total;
}

function toParts(order: DateTimeFormat['order'], match: RegExpExecArray): DateTimeParts {
    const n = (index: number) => (match[index] ? parseInt(match[index], 10) : 0);
    const time = { hour: n(4), minute: n(5), second: n(6) };

    switch (order) {
        case 'ymd':
            return { year: n(1), month: n(2), day: n(3), ...time };
        case 'mdy':
            return { year: n(3), month: n(1), day: n(2), ...time };
        case 'dmy':
            return { year: n(3), month: n(2), day: n(1), ...time };
    }
}

function isValidCalendarTime(parts: DateTimeParts): boolean {
    if (parts.month < 1 || parts.month > 12 || parts.day < 1) {
        return false;
    }
    if (parts.hour > 23 || parts.minute > 59 || parts.second > 59) {
        return false;
    }
    // Day 0 of the next month is the last day of this one
    const daysInMonth = new Date(Date.UTC(parts.year, parts.month, 0)).getUTCDate();
    return parts.day <= daysInMonth;
}
