import jwt from 'jsonwebtoken';
import { authenticateToken, authorizeRoles, generateToken } from '../middleware/authMiddleware';
import { JWT_SECRET } from '../config/settings';
import { mockRequest, mockResponse } from './helpers/http';

const cashier = { id: 'user-1', username: 'cashier', role: 'cashier' as const };

describe('authenticateToken', () => {
    it('accepts a token it issued', () => {
        const req = mockRequest({ headers: { authorization: `Bearer ${generateToken(cashier)}` } });
        const { res, status } = mockResponse();
        const next = jest.fn();

        authenticateToken(req, res, next);

        expect(next).toHaveBeenCalledTimes(1);
        expect(status).not.toHaveBeenCalled();
        expect(req.user).toEqual(cashier);
    });

    it('requires a token', () => {
        const { res, statusCode, body } = mockResponse();
        const next = jest.fn();

        authenticateToken(mockRequest({}), res, next);

        expect(next).not.toHaveBeenCalled();
        expect(statusCode()).toBe(401);
        expect(body()).toEqual({ message: 'Access token required' });
    });

    it('rejects a token signed with another secret', () => {
        const token = jwt.sign(cashier, 'another-test-secret');
        const { res, statusCode } = mockResponse();
        const next = jest.fn();

        authenticateToken(mockRequest({ headers: { authorization: `Bearer ${token}` } }), res, next);

        expect(next).not.toHaveBeenCalled();
        expect(statusCode()).toBe(403);
    });

    it('rejects a token without a known role', () => {
        const token = jwt.sign({ id: 'user-1', username: 'guest', role: 'guest' }, JWT_SECRET);
        const { res, statusCode } = mockResponse();
        const next = jest.fn();

        authenticateToken(mockRequest({ headers: { authorization: `Bearer ${token}` } }), res, next);

        expect(next).not.toHaveBeenCalled();
        expect(statusCode()).toBe(403);
    });
});

describe('authorizeRoles', () => {
    it('lets allowed roles through', () => {
        const next = jest.fn();
        const { res } = mockResponse();

        authorizeRoles('admin', 'cashier')(mockRequest({ user: cashier }), res, next);

        expect(next).toHaveBeenCalledTimes(1);
    });

    it('blocks other roles', () => {
        const next = jest.fn();
        const { res, statusCode, body } = mockResponse();

        authorizeRoles('admin')(mockRequest({ user: cashier }), res, next);

        expect(next).not.toHaveBeenCalled();
        expect(statusCode()).toBe(403);
        expect(body()).toEqual({ message: 'Access denied: Insufficient permissions' });
    });

    it('needs an authenticated user', () => {
        const next = jest.fn();
        const { res, statusCode } = mockResponse();

        authorizeRoles('admin')(mockRequest({}), res, next);

        expect(next).not.toHaveBeenCalled();
        expect(statusCode()).toBe(401);
    });
});
