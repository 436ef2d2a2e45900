// Calendar helpers. All calendar arithmetic is done in UTC.

export const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

export function hourOfDay(date: Date): number {
    return date.getUTCHours();
}

/**
 * 0 = Monday .. 6 = Sunday
 */
export function weekday(date: Date): number {
    return (date.getUTCDay() + 6) % 7;
}

/**
 * Calendar date key, e.g. 2025-01-07
 */
export function dateKey(date: Date): string {
    return date.toISOString().slice(0, 10);
}
