import { Client, LoyaltyEntry, Order, Settlement } from '../models';
import { ConflictError, InvalidInputError, NotFoundError, withStorage } from '../utils/errors';
import { containsText, normalizeText, optionalText } from '../utils/parse';

export interface ClientInput {
    name?: unknown;
    phone?: unknown;
    email?: unknown;
}

const findClientOrFail = async (id: string) => {
    const client = await withStorage(() => Client.findByPk(id));
    if (!client) throw new NotFoundError(`Client ${id} not found`);
    return client;
};

export class ClientService {
    static async list(query = '') {
        const q = query.trim();
        const clients = await withStorage(() => Client.findAll({ order: [['name', 'ASC']] }));
        return q ? clients.filter((row) => containsText(row.name, q)) : clients;
    }

    static async get(id: string) {
        return findClientOrFail(id);
    }

    static async create(input: ClientInput) {
        const name = normalizeText(input.name);
        if (!name) throw new InvalidInputError('Client name is required');

        return withStorage(() => Client.create({
            name,
            phone: optionalText(input.phone),
            email: optionalText(input.email)?.toLowerCase() ?? null,
        }));
    }

    static async update(id: string, input: ClientInput) {
        const client = await findClientOrFail(id);
        const updates: { name?: string; phone?: string | null; email?: string | null } = {};

        if (input.name !== undefined) {
            const name = normalizeText(input.name);
            if (!name) throw new InvalidInputError('Client name cannot be empty');
            updates.name = name;
        }
        if (input.phone !== undefined) updates.phone = optionalText(input.phone);
        if (input.email !== undefined) updates.email = optionalText(input.email)?.toLowerCase() ?? null;

        return withStorage(() => client.update(updates));
    }

    static async remove(id: string) {
        const client = await findClientOrFail(id);
        const [orderCount, settlementCount, loyaltyCount] = await withStorage(() => Promise.all([
            Order.count({ where: { client_id: id } }),
            Settlement.count({ where: { client_id: id } }),
            LoyaltyEntry.count({ where: { client_id: id } }),
        ]));
        if (orderCount > 0 || settlementCount > 0 || loyaltyCount > 0) {
            throw new ConflictError('Client has order history and cannot be deleted', {
                orders: orderCount,
                settlements: settlementCount,
                loyalty_entries: loyaltyCount,
            });
        }
        await withStorage(() => client.destroy());
    }
}
