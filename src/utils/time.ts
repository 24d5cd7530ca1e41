const DAY_MS = 24 * 60 * 60 * 1000;
const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses a YYYY-MM-DD string into a UTC midnight Date.
 * Rejects impossible dates such as 2024-02-30.
 */
export function parseDay(value: string): Date {
    const match = DAY_PATTERN.exec(value);
    if (!match) {
        throw new Error(`Invalid date "${value}", expected YYYY-MM-DD`);
    }

    const [, year, month, day] = match;
    const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));

    if (formatDay(date) !== value) {
        throw new Error(`Invalid date "${value}"`);
    }
    return date;
}

export function addDays(date: Date, days: number): Date {
    return new Date(date.getTime() + days * DAY_MS);
}

export function formatDay(date: Date): string {
    return date.toISOString().slice(0, 10);
}

// 2024-01-05 -> 20240105
export function formatCompactDay(date: Date): string {
    return formatDay(date).replace(/-/g, "");
}

export function daysBetweenInclusive(start: Date, end: Date): number {
    if (end.getTime() < start.getTime()) return 0;
    return Math.round((end.getTime() - start.getTime()) / DAY_MS) + 1;
}

export function sleep(ms: number): Promise<void> {
    return new Promise(res => setTimeout(res, ms));
}
