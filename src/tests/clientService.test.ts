import { ClientService } from '../services/ClientService';
import { ConflictError, InvalidInputError, NotFoundError, StorageRejectedError } from '../utils/errors';
import { closeDatabase, createOrder, createProduct, resetDatabase } from './helpers/db';

describe('ClientService', () => {
    beforeEach(resetDatabase);
    afterAll(closeDatabase);

    it('creates clients with normalized contact data', async () => {
        const client = await ClientService.create({ name: ' Ana ', phone: ' ', email: 'Ana@Example.com' });

        expect(client.name).toBe('Ana');
        expect(client.phone).toBeNull();
        expect(client.email).toBe('ana@example.com');
    });

    it('requires a name', async () => {
        await expect(ClientService.create({ name: '   ' })).rejects.toBeInstanceOf(InvalidInputError);
    });

    it('reports duplicates and malformed emails as rejected by storage', async () => {
        await ClientService.create({ name: 'Ana' });

        await expect(ClientService.create({ name: 'Ana' })).rejects.toBeInstanceOf(StorageRejectedError);
        await expect(ClientService.create({ name: 'Bruno', email: 'not-an-email' }))
            .rejects.toBeInstanceOf(StorageRejectedError);
    });

    it('searches by name', async () => {
        await ClientService.create({ name: 'Juliana' });
        await ClientService.create({ name: 'Bruno' });
        await ClientService.create({ name: 'Ana' });

        expect((await ClientService.list('an')).map((client) => client.name)).toEqual(['Ana', 'Juliana']);
        expect((await ClientService.list()).map((client) => client.name)).toEqual(['Ana', 'Bruno', 'Juliana']);
    });

    it('treats % and _ in a search as plain characters', async () => {
        await ClientService.create({ name: '50% Club' });
        await ClientService.create({ name: '500 Club' });
        await ClientService.create({ name: 'Ana_Maria' });
        await ClientService.create({ name: 'Ana Maria' });

        expect((await ClientService.list('50%')).map((client) => client.name)).toEqual(['50% Club']);
        expect((await ClientService.list('a_m')).map((client) => client.name)).toEqual(['Ana_Maria']);
    });

    it('updates contact details', async () => {
        const client = await ClientService.create({ name: 'Ana', phone: '555-0100' });

        const updated = await ClientService.update(client.id, { phone: null, email: 'ANA@EXAMPLE.COM' });

        expect(updated.phone).toBeNull();
        expect(updated.email).toBe('ana@example.com');
        await expect(ClientService.update(client.id, { name: '' })).rejects.toBeInstanceOf(InvalidInputError);
    });

    it('keeps clients with order history', async () => {
        const client = await ClientService.create({ name: 'Ana' });
        const water = await createProduct('Water', 5);
        await createOrder(client, water, 1, new Date('2026-03-01T12:00:00.000Z'));

        await expect(ClientService.remove(client.id)).rejects.toMatchObject({
            code: 'CONFLICT',
            details: { orders: 1, settlements: 0, loyalty_entries: 0 },
        });
        await expect(ClientService.remove(client.id)).rejects.toBeInstanceOf(ConflictError);
    });

    it('removes a client without history', async () => {
        const client = await ClientService.create({ name: 'Ana' });

        await ClientService.remove(client.id);

        await expect(ClientService.get(client.id)).rejects.toBeInstanceOf(NotFoundError);
    });
});
