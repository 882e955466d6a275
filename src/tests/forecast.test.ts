import { fitLinearTrend, forecastRevenue, toDayKey } from '../utils/forecast';

describe('forecast', () => {
    it('keys days in UTC', () => {
        expect(toDayKey(new Date('2026-03-01T23:59:59.000Z'))).toBe('2026-03-01');
    });

    it('fits a straight line through daily totals', () => {
        const trend = fitLinearTrend([
            { date: '2026-03-01', total: 10 },
            { date: '2026-03-02', total: 20 },
            { date: '2026-03-03', total: 30 },
        ]);
        expect(trend?.slope).toBeCloseTo(10, 10);
    });

    it('projects the days after the last observation', () => {
        const forecast = forecastRevenue([
            { date: '2026-03-03', total: 30 },
            { date: '2026-03-01', total: 10 },
            { date: '2026-03-02', total: 20 },
        ], 2);

        expect(forecast).toEqual([
            { date: '2026-03-04', total: 40 },
            { date: '2026-03-05', total: 50 },
        ]);
    });

    it('handles gaps between days', () => {
        const forecast = forecastRevenue([
            { date: '2026-03-01', total: 10 },
            { date: '2026-03-05', total: 50 },
        ], 1);

        expect(forecast).toEqual([{ date: '2026-03-06', total: 60 }]);
    });

    it('stays flat with a single day', () => {
        expect(forecastRevenue([{ date: '2026-02-28', total: 12.5 }], 2)).toEqual([
            { date: '2026-03-01', total: 12.5 },
            { date: '2026-03-02', total: 12.5 },
        ]);
    });

    it('returns nothing without history', () => {
        expect(fitLinearTrend([])).toBeNull();
        expect(forecastRevenue([], 30)).toEqual([]);
    });
});
