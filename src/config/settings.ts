import dotenv from 'dotenv';

dotenv.config();

const parsePositiveInt = (raw: string | undefined, fallback: number): number => {
    const parsed = Number(raw ?? '');
    if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
    return Math.floor(parsed);
};

export const PORT = parsePositiveInt(process.env.PORT, 5000);

export const JWT_SECRET = process.env.JWT_SECRET || 'dev-only-secret'; // Fallback for dev only
export const JWT_EXPIRES_IN_SEC = parsePositiveInt(process.env.JWT_EXPIRES_IN_SEC, 12 * 60 * 60);

// Currency units spent per loyalty point earned at settlement.
export const LOYALTY_POINTS_UNIT = parsePositiveInt(process.env.LOYALTY_POINTS_UNIT, 10);
export const LOYALTY_REWARD_COST = parsePositiveInt(process.env.LOYALTY_REWARD_COST, 100);

export const COUPONS_FILE = String(process.env.COUPONS_FILE || '').trim() || null;
