import { Transaction } from 'sequelize';
import { Client, LoyaltyEntry, Settlement, sequelize } from '../models';
import { Actor } from '../models/User';
import { LOYALTY_REWARD_COST } from '../config/settings';
import { InsufficientPointsError, InvalidInputError, NotFoundError, translateStorageError, withStorage } from '../utils/errors';
import { fromCents, toCents } from '../utils/money';
import { optionalText, parseNonZeroInt } from '../utils/parse';
import { rollbackQuietly } from '../utils/transaction';

export interface LoyaltySummaryRow {
    client_id: string;
    name: string;
    total_spent: number;
    settlements: number;
    points: number;
}

const sumPoints = async (clientId: string, transaction?: Transaction): Promise<number> => {
    const entries = await LoyaltyEntry.findAll({
        where: { client_id: clientId },
        attributes: ['points'],
        transaction,
    });
    return entries.reduce((sum, entry) => sum + Number(entry.points || 0), 0);
};

const ensureClient = async (clientId: string, transaction?: Transaction) => {
    // Locking the client row serializes concurrent bookings for the same client.
    const client = await Client.findByPk(clientId, {
        attributes: ['id', 'name'],
        transaction,
        lock: transaction ? transaction.LOCK.UPDATE : undefined,
    });
    if (!client) throw new NotFoundError(`Client ${clientId} not found`);
    return client;
};

export class LoyaltyService {
    static async balance(clientId: string) {
        return withStorage(async () => {
            const client = await ensureClient(clientId);
            const entries = await LoyaltyEntry.findAll({
                where: { client_id: clientId },
                order: [['createdAt', 'DESC'], ['id', 'DESC']],
            });
            const points = entries.reduce((sum, entry) => sum + Number(entry.points || 0), 0);
            return { client_id: client.id, name: client.name, points, entries };
        });
    }

    /** Spending and point balance per client, biggest spenders first. */
    static async summary(): Promise<LoyaltySummaryRow[]> {
        const [clients, settlements, entries] = await withStorage(() => Promise.all([
            Client.findAll({ attributes: ['id', 'name'] }),
            Settlement.findAll({ attributes: ['client_id', 'total_after_discount'] }),
            LoyaltyEntry.findAll({ attributes: ['client_id', 'points'] }),
        ]));

        const rows = new Map<string, { name: string; spentCents: number; settlements: number; points: number }>();
        clients.forEach((client) => rows.set(client.id, { name: client.name, spentCents: 0, settlements: 0, points: 0 }));
        settlements.forEach((settlement) => {
            const row = rows.get(settlement.client_id);
            if (!row) return;
            row.spentCents += toCents(settlement.total_after_discount);
            row.settlements += 1;
        });
        entries.forEach((entry) => {
            const row = rows.get(entry.client_id);
            if (row) row.points += Number(entry.points || 0);
        });

        return Array.from(rows.entries())
            .map(([clientId, row]) => ({
                client_id: clientId,
                name: row.name,
                total_spent: fromCents(row.spentCents),
                settlements: row.settlements,
                points: row.points,
            }))
            .sort((a, b) => b.total_spent - a.total_spent || a.name.localeCompare(b.name));
    }

    /**
     * Manual correction by an admin. A negative adjustment cannot take the
     * balance below zero.
     */
    static async adjust(clientId: string, input: { points?: unknown; note?: unknown }, actor?: Actor | null) {
        const points = parseNonZeroInt(input.points);
        if (points === null) throw new InvalidInputError('points must be a non-zero integer');
        return this.book(clientId, points, 'adjustment', optionalText(input.note), actor);
    }

    static async redeem(clientId: string, actor?: Actor | null, cost = LOYALTY_REWARD_COST) {
        return this.book(clientId, -cost, 'redemption', 'Reward redeemed', actor);
    }

    private static async book(
        clientId: string,
        points: number,
        reason: 'adjustment' | 'redemption',
        note: string | null,
        actor?: Actor | null
    ) {
        const t = await withStorage(() => sequelize.transaction());
        try {
            await ensureClient(clientId, t);
            const balance = await sumPoints(clientId, t);
            if (balance + points < 0) {
                throw new InsufficientPointsError(balance, -points);
            }
            const entry = await LoyaltyEntry.create({
                client_id: clientId,
                points,
                reason,
                note,
                created_by: actor?.id ?? null,
            }, { transaction: t });
            await t.commit();
            return { entry, points: balance + points };
        } catch (error) {
            await rollbackQuietly(t, 'LoyaltyService');
            throw translateStorageError(error);
        }
    }
}
