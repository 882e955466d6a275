import { roundHalfUp } from './money';

export const normalizeText = (value: unknown): string => (typeof value === 'string' ? value.trim() : '');

export const optionalText = (value: unknown): string | null => {
    const normalized = normalizeText(value);
    return normalized || null;
};

/** Case-insensitive substring match; `%` and `_` are plain characters. */
export const containsText = (value: string, query: string): boolean =>
    value.toLowerCase().includes(query.toLowerCase());

export const parsePositiveInt = (value: unknown): number | null => {
    if (typeof value === 'string' && !value.trim()) return null;
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) return null;
    return parsed;
};

export const parseNonNegativeInt = (value: unknown): number | null => {
    if (typeof value === 'string' && !value.trim()) return null;
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) return null;
    return parsed;
};

export const parseNonZeroInt = (value: unknown): number | null => {
    if (typeof value === 'string' && !value.trim()) return null;
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed === 0) return null;
    return parsed;
};

/** Non-negative money input, rounded to cents. */
export const parsePrice = (value: unknown): number | null => {
    if (typeof value === 'string' && !value.trim()) return null;
    if (typeof value !== 'number' && typeof value !== 'string') return null;
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) return null;
    return roundHalfUp(parsed);
};

export const parseDateParam = (value: unknown): Date | null => {
    const raw = normalizeText(value);
    if (!raw) return null;
    const date = new Date(raw);
    if (!Number.isFinite(date.getTime())) return null;
    return date;
};

export const parseIdList = (value: unknown): string[] | null => {
    if (!Array.isArray(value)) return null;
    const ids: string[] = [];
    for (const item of value) {
        const id = normalizeText(item);
        if (!id) return null;
        ids.push(id);
    }
    return ids;
};

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Calendar day as `YYYY-MM-DD`; impossible dates such as 2026-02-30 are refused. */
export const parseDay = (value: unknown): string | null => {
    const raw = normalizeText(value);
    const match = DAY_PATTERN.exec(raw);
    if (!match) return null;
    const [, year, month, day] = match;
    const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    return date.toISOString().slice(0, 10) === raw ? raw : null;
};

/** `YYYY-MM` to its first and last day. */
export const parseMonth = (value: unknown): { first: string; last: string } | null => {
    const match = /^(\d{4})-(\d{2})$/.exec(normalizeText(value));
    if (!match) return null;
    const year = Number(match[1]);
    const month = Number(match[2]);
    if (month < 1 || month > 12) return null;
    const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
    return { first: `${match[1]}-${match[2]}-01`, last: `${match[1]}-${match[2]}-${String(lastDay).padStart(2, '0')}` };
};

export const parseBoolean = (value: unknown): boolean | null => {
    if (typeof value === 'boolean') return value;
    const raw = normalizeText(value).toLowerCase();
    if (raw === 'true') return true;
    if (raw === 'false') return false;
    return null;
};
