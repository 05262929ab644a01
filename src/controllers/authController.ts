import { Request, Response } from 'express';
import { randomUUID } from 'crypto';
import db from '../config/sqlite';
import { hashPassword, verifyPassword } from '../utils/password';
import { generateAccessToken } from '../utils/jwt';
import { canLogin } from '../utils/accessPolicy';
import { decisionErrorBody } from '../utils/decisionResponse';
import { UserRole } from '../lib/permissions';
import { asString, asTrimmedString } from '../utils/validation';
import { isConstraintError } from '../utils/dbErrorHandler';

interface LoginRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  role: string;
  points: number;
}

// POST /api/v1/auth/signup
export const signup = async (req: Request, res: Response) => {
  try {
    const username = asTrimmedString(req.body?.username);
    const email = asTrimmedString(req.body?.email)?.toLowerCase();
    const password = asString(req.body?.password);
    const name = asTrimmedString(req.body?.name) ?? null;

    if (!username || !email || !password) {
      return res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Username, email and password are required',
        },
      });
    }

    if (username.length > 30 || !/^[a-zA-Z0-9_]+$/.test(username)) {
      return res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Username must be 1-30 alphanumeric + underscore',
          fields: { username: 'Invalid username format' },
        },
      });
    }

    if (!email.match(/^[^\s@]+@[^\s@]+\.[^\s@]+$/)) {
      return res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid email format',
          fields: { email: 'Invalid email format' },
        },
      });
    }

    if (password.length < 8 || !/\d/.test(password) || !/[A-Z]/.test(password)) {
      return res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Password must be at least 8 chars with 1 digit and 1 uppercase',
          fields: { password: 'Password policy not met' },
        },
      });
    }

    const existing = db
      .prepare<[string, string], { id: string }>('SELECT id FROM users WHERE email = ? OR username = ?')
      .get(email, username);
    if (existing) {
      return res.status(409).json({
        error: {
          code: 'USER_EXISTS',
          message: 'Email or username already registered',
        },
      });
    }

    const passwordHash = await hashPassword(password);
    const userId = randomUUID();

    db.prepare(`
      INSERT INTO users (id, username, email, password_hash, name, role)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(userId, username, email, passwordHash, name, UserRole.CITIZEN);

    return res.status(201).json({
      user: {
        id: userId,
        username,
        email,
        name,
        role: UserRole.CITIZEN,
        points: 0,
      },
      token: generateAccessToken(userId, UserRole.CITIZEN),
    });
  } catch (error) {
    // A concurrent signup can take the email or username between the check and the insert
    if (isConstraintError(error)) {
      return res.status(409).json({
        error: {
          code: 'USER_EXISTS',
          message: 'Email or username already registered',
        },
      });
    }
    console.error('Signup error:', error);
    res.status(500).json({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'Signup failed',
      },
    });
  }
};

// POST /api/v1/auth/login
export const login = async (req: Request, res: Response) => {
  try {
    const identifier = asTrimmedString(req.body?.email) ?? asTrimmedString(req.body?.username);
    const password = asString(req.body?.password);

    if (!identifier || !password) {
      return res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Email (or username) and password required',
        },
      });
    }

    const user = db
      .prepare<[string, string], LoginRow>(`
        SELECT id, username, email, password_hash, role, points
        FROM users WHERE email = ? OR username = ?
      `)
      .get(identifier.toLowerCase(), identifier);

    if (!user || !(await verifyPassword(password, user.password_hash))) {
      return res.status(401).json({
        error: {
          code: 'UNAUTHORIZED',
          message: 'Invalid email or password',
        },
      });
    }

    const decision = canLogin(user.points);
    if (decision.status !== 'allowed') {
      console.warn(`🚫 Login refused for banned user ${user.id} (${user.points} points)`);
      return res.status(403).json(decisionErrorBody(decision));
    }

    return res.status(200).json({
      user: {
        id: user.id,
        username: user.username,
        email: user.email,
        role: user.role,
        points: user.points,
      },
      token: generateAccessToken(user.id, user.role),
    });
  } catch (error) {
    console.error('Login error:', error);
    res.status(500).json({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'Login failed',
      },
    });
  }
};
