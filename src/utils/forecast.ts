import { roundHalfUp } from './money';

export interface DailyTotal {
    date: string; // YYYY-MM-DD (UTC)
    total: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export const toDayKey = (date: Date): string => date.toISOString().slice(0, 10);

const dayIndex = (dayKey: string): number => Math.round(Date.parse(`${dayKey}T00:00:00.000Z`) / DAY_MS);

/**
 * Ordinary least squares fit of daily totals over the day number. Returns
 * slope and intercept; a single day gives a flat line through it.
 */
export const fitLinearTrend = (series: DailyTotal[]): { slope: number; intercept: number } | null => {
    if (series.length === 0) return null;
    const xs = series.map((point) => dayIndex(point.date));
    const ys = series.map((point) => point.total);
    const n = series.length;
    const meanX = xs.reduce((sum, x) => sum + x, 0) / n;
    const meanY = ys.reduce((sum, y) => sum + y, 0) / n;

    let covariance = 0;
    let variance = 0;
    xs.forEach((x, i) => {
        covariance += (x - meanX) * (ys[i] - meanY);
        variance += (x - meanX) ** 2;
    });

    const slope = variance === 0 ? 0 : covariance / variance;
    return { slope, intercept: meanY - slope * meanX };
};

/** Predicts the `days` days after the last observed day. */
export const forecastRevenue = (series: DailyTotal[], days: number): DailyTotal[] => {
    const sorted = [...series].sort((a, b) => a.date.localeCompare(b.date));
    const trend = fitLinearTrend(sorted);
    if (!trend) return [];

    const lastIndex = dayIndex(sorted[sorted.length - 1].date);
    return Array.from({ length: days }, (_, offset) => {
        const x = lastIndex + offset + 1;
        return {
            date: toDayKey(new Date(x * DAY_MS)),
            total: roundHalfUp(trend.slope * x + trend.intercept),
        };
    });
};
