import { Settlement } from '../models';
import { ReportService } from '../services/ReportService';
import { InvalidInputError } from '../utils/errors';
import { PaymentMethod } from '../utils/paymentMethod';
import { closeDatabase, createClient, createOrder, createProduct, resetDatabase } from './helpers/db';

describe('ReportService', () => {
    beforeEach(resetDatabase);
    afterAll(closeDatabase);

    const seedSettlements = async () => {
        const ana = await createClient('Ana');
        const rows: Array<[string, PaymentMethod, number]> = [
            ['2026-03-01T10:00:00.000Z', 'pix', 35.1],
            ['2026-03-01T18:00:00.000Z', 'cash', 10],
            ['2026-03-02T09:00:00.000Z', 'pix', 20],
        ];
        for (const [settledAt, method, total] of rows) {
            await Settlement.create({
                client_id: ana.id,
                payment_method: method,
                discount_rate: 0,
                total_before_discount: total,
                total_after_discount: total,
                order_count: 1,
                settled_at: new Date(settledAt),
            });
        }
    };

    it('totals revenue per day and per payment method', async () => {
        await seedSettlements();

        const report = await ReportService.revenue({ forecastDays: 2 });

        expect(report.total).toBe(65.1);
        expect(report.daily).toEqual([
            { date: '2026-03-01', total: 45.1 },
            { date: '2026-03-02', total: 20 },
        ]);
        expect(report.by_method).toEqual({ debit: 0, credit: 0, pix: 55.1, cash: 10 });
        expect(report.forecast.map((point) => point.date)).toEqual(['2026-03-03', '2026-03-04']);
        expect(report.forecast[0].total).toBeCloseTo(-5.1, 2);
        expect(report.forecast[1].total).toBeCloseTo(-30.2, 2);
    });

    it('limits the report to the requested range', async () => {
        await seedSettlements();

        const report = await ReportService.revenue({ from: new Date('2026-03-02T00:00:00.000Z') });

        expect(report.from).toBe('2026-03-02T00:00:00.000Z');
        expect(report.to).toBeNull();
        expect(report.daily).toEqual([{ date: '2026-03-02', total: 20 }]);
        expect(report.forecast).toHaveLength(30);
        expect(report.forecast[0]).toEqual({ date: '2026-03-03', total: 20 });
    });

    it('is empty without settlements', async () => {
        const report = await ReportService.revenue();

        expect(report.total).toBe(0);
        expect(report.daily).toEqual([]);
        expect(report.forecast).toEqual([]);
    });

    it('validates its options', async () => {
        await expect(ReportService.revenue({ forecastDays: 0 })).rejects.toBeInstanceOf(InvalidInputError);
        await expect(ReportService.revenue({ forecastDays: 366 })).rejects.toBeInstanceOf(InvalidInputError);
        await expect(ReportService.revenue({
            from: new Date('2026-03-02T00:00:00.000Z'),
            to: new Date('2026-03-01T00:00:00.000Z'),
        })).rejects.toThrow('from must not be after to');
    });

    it('sets stock on hand against open tabs', async () => {
        const ana = await createClient('Ana');
        const water = await createProduct('Water', 5, 10);
        const chips = await createProduct('Chips', 8, 4);
        await createProduct('Ice', 2, 4);
        await createOrder(ana, water, 3, new Date('2026-03-01T12:00:00.000Z'));
        await createOrder(ana, chips, 6, new Date('2026-03-01T12:05:00.000Z'));
        await createOrder(ana, water, 2, new Date('2026-03-01T12:10:00.000Z'), 'paid_cash');

        const rows = await ReportService.stock();

        expect(rows).toEqual([
            { product_id: water.id, name: 'Water', stock_quantity: 10, open_quantity: 3, available: 7 },
            { product_id: expect.any(String), name: 'Ice', stock_quantity: 4, open_quantity: 0, available: 4 },
            { product_id: chips.id, name: 'Chips', stock_quantity: 4, open_quantity: 6, available: -2 },
        ]);
    });
});
