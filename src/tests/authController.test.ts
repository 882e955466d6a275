import bcrypt from 'bcrypt';
import { login, me } from '../controllers/AuthController';
import { User } from '../models';
import { closeDatabase, resetDatabase } from './helpers/db';
import { mockRequest, mockResponse } from './helpers/http';

describe('AuthController', () => {
    beforeEach(async () => {
        await resetDatabase();
        await User.create({
            username: 'cashier',
            name: 'Front Desk',
            password: await bcrypt.hash('test-password', 4),
            role: 'cashier',
        });
    });
    afterAll(closeDatabase);

    it('issues a token for valid credentials', async () => {
        const { res, statusCode, body } = mockResponse();

        await login(mockRequest({ body: { username: ' Cashier ', password: 'test-password' } }), res);

        expect(statusCode()).toBe(200);
        expect(body()).toMatchObject({
            message: 'Login successful',
            token: expect.any(String),
            user: { username: 'cashier', name: 'Front Desk', role: 'cashier' },
        });
    });

    it('rejects a wrong password', async () => {
        const { res, statusCode, body } = mockResponse();

        await login(mockRequest({ body: { username: 'cashier', password: 'wrong-password' } }), res);

        expect(statusCode()).toBe(401);
        expect(body()).toEqual({ message: 'Invalid credentials' });
    });

    it('rejects inactive accounts', async () => {
        await User.update({ status: 'inactive' }, { where: { username: 'cashier' } });
        const { res, statusCode } = mockResponse();

        await login(mockRequest({ body: { username: 'cashier', password: 'test-password' } }), res);

        expect(statusCode()).toBe(403);
    });

    it('requires both fields', async () => {
        const { res, statusCode } = mockResponse();

        await login(mockRequest({ body: { username: 'cashier' } }), res);

        expect(statusCode()).toBe(400);
    });

    it('returns the current user without the password', async () => {
        const user = await User.findOne({ where: { username: 'cashier' } });
        if (!user) throw new Error('expected the seeded user');
        const { res, body } = mockResponse();

        await me(mockRequest({ user: { id: user.id, username: 'cashier', role: 'cashier' } }), res);

        expect(body()).toMatchObject({ user: { id: user.id, username: 'cashier', role: 'cashier' } });
        expect(JSON.stringify(body())).not.toContain('password');
    });
});
