import { Request, Response } from 'express';
import bcrypt from 'bcrypt';
import { User } from '../models';
import { generateToken } from '../middleware/authMiddleware';
import { normalizeText } from '../utils/parse';

export const login = async (req: Request, res: Response) => {
    try {
        const username = normalizeText(req.body?.username).toLowerCase();
        const password = typeof req.body?.password === 'string' ? req.body.password : '';

        if (!username || !password) {
            return res.status(400).json({ message: 'Username and password are required' });
        }

        const user = await User.findOne({ where: { username } });
        if (!user) {
            return res.status(401).json({ message: 'Invalid credentials' });
        }

        const isMatch = await bcrypt.compare(password, user.password);
        if (!isMatch) {
            return res.status(401).json({ message: 'Invalid credentials' });
        }

        if (user.status !== 'active') {
            return res.status(403).json({ message: 'Account is inactive' });
        }

        const token = generateToken({ id: user.id, username: user.username, role: user.role });

        return res.json({
            message: 'Login successful',
            token,
            user: {
                id: user.id,
                username: user.username,
                name: user.name,
                role: user.role
            }
        });
    } catch (error) {
        console.error('Login error:', error);
        return res.status(500).json({ message: 'Login failed' });
    }
};

export const me = async (req: Request, res: Response) => {
    try {
        const actor = req.user;
        if (!actor) {
            return res.status(401).json({ message: 'User not authenticated' });
        }
        const user = await User.findByPk(actor.id, { attributes: ['id', 'username', 'name', 'role', 'status'] });
        if (!user) {
            return res.status(404).json({ message: 'User not found' });
        }
        return res.json({ user });
    } catch (error) {
        console.error('Error fetching current user:', error);
        return res.status(500).json({ message: 'Error fetching current user' });
    }
};
