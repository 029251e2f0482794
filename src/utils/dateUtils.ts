/** Calendar days and game times are reported on the US West Coast. */
export const SCAN_TIME_ZONE = 'America/Los_Angeles';

/**
 * Formats a Date as 'YYYY-MM-DD' in the given time zone.
 * Avoids the off-by-one day of toISOString(), which is UTC.
 */
export const formatZonedDate = (date: Date, timeZone: string = SCAN_TIME_ZONE): string => {
    return new Intl.DateTimeFormat('en-CA', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
    }).format(date);
};

/**
 * 'h:mm AM/PM TZ', e.g. "4:30 PM PST"
 */
export const formatZonedTime = (date: Date, timeZone: string = SCAN_TIME_ZONE): string => {
    return new Intl.DateTimeFormat('en-US', {
        timeZone,
        hour: 'numeric',
        minute: '2-digit',
        timeZoneName: 'short',
    }).format(date);
};

const MONTHS: Record<string, number> = {
    JAN: 0, FEB: 1, MAR: 2, APR: 3, MAY: 4, JUN: 5,
    JUL: 6, AUG: 7, SEP: 8, OCT: 9, NOV: 10, DEC: 11,
};

/**
 * Game dates arrive as "NOV 03, 2025" (player logs) or "2025-11-03"
 * (game finder). Returns a UTC timestamp, or null when unparseable.
 */
export const parseGameDate = (raw: string): number | null => {
    const iso = /^(\d{4})-(\d{2})-(\d{2})/.exec(raw);
    if (iso) return Date.UTC(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3]));

    const named = /^([A-Za-z]{3})\s+(\d{1,2}),\s*(\d{4})$/.exec(raw.trim());
    if (named) {
        const month = MONTHS[named[1].toUpperCase()];
        if (month === undefined) return null;
        return Date.UTC(Number(named[3]), month, Number(named[2]));
    }
    return null;
};

/**
 * Calendar arithmetic on 'YYYY-MM-DD' days
 */
export const addDays = (day: string, days: number): string => {
    const ts = parseGameDate(day);
    if (ts === null) throw new Error(`Invalid date: ${day}`);
    return new Date(ts + days * 86_400_000).toISOString().slice(0, 10);
};
