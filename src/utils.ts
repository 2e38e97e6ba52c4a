/** Creates a date with no local timezone offset. `month` and `day` are 1-based. */
export function createDate(year: number, month: number, day: number): Date {
    return new Date(Date.UTC(year, month - 1, day));
}




/**
 * Parses an 8-character date string of the form 'YYYYMMDD' into a UTC Date object. Returns undefined if the string is
 * not a valid calendar date.
 */
export function parse8CharDate(s: string): Date | undefined {
    let match = /^(\d{4})(\d{2})(\d{2})$/.exec(s);
    if (!match) return undefined;
    let [year, month, day] = match.slice(1).map(Number);
    let date = createDate(year, month, day);

    // Reject dates that Date.UTC silently rolls over, like 20230231.
    if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return undefined;
    return date;
}




/** Parses the given Visual FoxPro DateTime representation into a UTC Date object. */
export function parseVfpDateTime(dt: {julianDay: number, msSinceMidnight: number}): Date {
    // Compute year/month/day
    const s1 = dt.julianDay + 68569;
    const n = Math.floor(4 * s1 / 146097);
    const s2 = s1 - Math.floor(((146097 * n) + 3) / 4);
    const i = Math.floor(4000 * (s2 + 1) / 1461001);
    const s3 = s2 - Math.floor(1461 * i / 4) + 31;
    const q = Math.floor(80 * s3 / 2447);
    const s4 = Math.floor(q / 11);
    const year = (100 * (n - 49)) + i + s4;
    const month = q + 2 - (12 * s4);
    const day = s3 - Math.floor(2447 * q / 80);

    // Compute hour/minute/second
    const secsSinceMidnight = Math.floor(dt.msSinceMidnight / 1_000);
    const minsSinceMidnight = Math.floor(secsSinceMidnight / 60);
    const second = secsSinceMidnight % 60;
    const minute = minsSinceMidnight % 60;
    const hour = Math.floor(minsSinceMidnight / 60);
    return new Date(Date.UTC(year, month - 1, day, hour, minute, second));
}
