import { Request, Response, NextFunction } from 'express';
import jwt, { JwtPayload } from 'jsonwebtoken';
import { JWT_EXPIRES_IN_SEC, JWT_SECRET } from '../config/settings';
import { Actor, USER_ROLES, UserRole } from '../models/User';

// Extend Express Request interface to include user property
declare global {
    namespace Express {
        interface Request {
            user?: Actor;
        }
    }
}

const isUserRole = (value: unknown): value is UserRole =>
    typeof value === 'string' && USER_ROLES.some((role) => role === value);

const toActor = (payload: string | JwtPayload | undefined): Actor | null => {
    if (!payload || typeof payload === 'string') return null;
    const { id, username, role } = payload;
    if (typeof id !== 'string' || typeof username !== 'string' || !isUserRole(role)) return null;
    return { id, username, role };
};

export const authenticateToken = (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers['authorization'];
    const token = authHeader && authHeader.split(' ')[1]; // Bearer <token>

    if (!token) {
        return res.status(401).json({ message: 'Access token required' });
    }

    jwt.verify(token, JWT_SECRET, (err, payload) => {
        const actor = err ? null : toActor(payload);
        if (!actor) {
            return res.status(403).json({ message: 'Invalid or expired token' });
        }
        req.user = actor;
        next();
    });
};

export const authorizeRoles = (...allowedRoles: UserRole[]) => {
    return (req: Request, res: Response, next: NextFunction) => {
        if (!req.user) {
            return res.status(401).json({ message: 'User not authenticated' });
        }

        if (!allowedRoles.includes(req.user.role)) {
            return res.status(403).json({ message: 'Access denied: Insufficient permissions' });
        }

        next();
    };
};

export const generateToken = (user: Actor) => {
    return jwt.sign({ id: user.id, username: user.username, role: user.role }, JWT_SECRET, { expiresIn: JWT_EXPIRES_IN_SEC });
};
