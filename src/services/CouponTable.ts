import fs from 'fs';
import defaultCoupons from '../config/coupons.json';
import { COUPONS_FILE } from '../config/settings';

/**
 * Static coupon code → discount rate table.
 *
 * Lookups are exact and case-sensitive: `desconto10` does not match
 * `DESCONTO10`, and surrounding whitespace is not trimmed. An unknown code
 * simply resolves to no discount.
 */
export class CouponTable {
    private readonly rates: ReadonlyMap<string, number>;

    constructor(entries: Record<string, unknown>) {
        const rates = new Map<string, number>();
        Object.entries(entries).forEach(([code, rawRate]) => {
            if (!code) {
                throw new Error('Coupon table contains an empty code');
            }
            if (typeof rawRate !== 'number' || !Number.isFinite(rawRate) || rawRate < 0 || rawRate > 1) {
                throw new Error(`Coupon ${code} has rate ${String(rawRate)}; rates must be numbers between 0 and 1`);
            }
            rates.set(code, rawRate);
        });
        this.rates = rates;
    }

    static fromFile(filePath: string): CouponTable {
        const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
        if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
            throw new Error(`Coupon file ${filePath} must contain a JSON object of code → rate`);
        }
        return new CouponTable(Object.fromEntries(Object.entries(parsed)));
    }

    resolve(code: string): number | null {
        return this.rates.get(code) ?? null;
    }

    codes(): string[] {
        return Array.from(this.rates.keys());
    }
}

let defaultTable: CouponTable | null = null;

export const getCouponTable = (): CouponTable => {
    if (!defaultTable) {
        defaultTable = COUPONS_FILE ? CouponTable.fromFile(COUPONS_FILE) : new CouponTable(defaultCoupons);
    }
    return defaultTable;
};
