const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;         // YYYY-MM-DD
const DAY_FIRST_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;  // DD/MM/YYYY
const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Builds a UTC-midnight Date, or null when the parts do not name a real
 * calendar day (2024-02-30, month 13, ...).
 */
function toUtcDate(year: number, month: number, day: number): Date | null {
    if (year < 1 || month < 1 || month > 12 || day < 1) {
        return null;
    }
    // setUTCFullYear, unlike Date.UTC, does not map years 0-99 to 19xx
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    if (
        date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day
    ) {
        return null;
    }
    return date;
}

/**
 * Parses the canonical YYYY-MM-DD form only.
 */
export function parseIsoDate(text: string): Date | null {
    const match = ISO_DATE.exec(text.trim());
    if (!match) return null;
    return toUtcDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

/**
 * Parses either accepted input format: YYYY-MM-DD or DD/MM/YYYY.
 */
export function parseTransactionDate(text: string): Date | null {
    const trimmed = text.trim();
    const iso = parseIsoDate(trimmed);
    if (iso) return iso;

    const match = DAY_FIRST_DATE.exec(trimmed);
    if (!match) return null;
    return toUtcDate(Number(match[3]), Number(match[2]), Number(match[1]));
}

export function formatIsoDate(date: Date): string {
    const year = String(date.getUTCFullYear()).padStart(4, '0');
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Strict decimal parse. Unlike Number(), blank text, hex, 'Infinity'
 * and trailing garbage all give null.
 */
export function parseNumber(text: string | null | undefined): number | null {
    if (text === null || text === undefined) return null;
    const trimmed = text.trim();
    if (!NUMERIC.test(trimmed)) return null;
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : null;
}

export function isBlank(value: string | null | undefined): boolean {
    return value === null || value === undefined || value.trim() === '';
}
