// Amounts are carried as integer cents. Rounding is half-up (away from zero)
// to two decimals everywhere.

/**
 * Reads a price-like value that may come back from storage as a number or a
 * string (`"5.00"`, `"5,00"`, `" 12.5 "`). Anything that does not parse to a
 * finite number counts as 0.
 */
export const parseAmount = (value: unknown): number => {
    if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
    if (typeof value === 'bigint') return Number(value);
    if (typeof value !== 'string') return 0;

    const raw = value.trim();
    if (!raw) return 0;
    const normalized = raw.includes(',') && !raw.includes('.') ? raw.replace(',', '.') : raw;
    const parsed = Number(normalized);
    return Number.isFinite(parsed) ? parsed : 0;
};

export const roundHalfUp = (value: number): number => {
    if (!Number.isFinite(value)) return 0;
    const sign = value < 0 ? -1 : 1;
    // toPrecision trims binary noise such as 1.005 * 100 = 100.49999999999999.
    const scaled = Number((Math.abs(value) * 100).toPrecision(15));
    return (sign * Math.round(scaled)) / 100;
};

export const toCents = (value: unknown): number => Math.round(roundHalfUp(parseAmount(value)) * 100);

export const fromCents = (cents: number): number => cents / 100;

export const applyRateToCents = (cents: number, rate: number): number => {
    const scaled = Number((cents * (1 - rate)).toPrecision(15));
    return Math.round(scaled);
};
