// src/middleware/adminMiddleware.ts
// 🔐 Role & Permission Middleware

import { Request, Response, NextFunction } from 'express'
import db from '../config/sqlite'
import { Permission, UserRole, hasPermission, isValidRole } from '../lib/permissions'

declare global {
  namespace Express {
    interface Request {
      userRole?: UserRole
    }
  }
}

/**
 * Middleware: Load the caller's role from the users table
 */
export const roleMiddleware = (req: Request, res: Response, next: NextFunction) => {
  try {
    if (!req.userId) {
      return res.status(401).json({
        error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
      })
    }

    const user = db.prepare<[string], { role: string }>('SELECT role FROM users WHERE id = ?').get(req.userId)

    if (!user) {
      return res.status(401).json({
        error: { code: 'UNAUTHORIZED', message: 'User not found' },
      })
    }

    req.userRole = isValidRole(user.role) ? user.role : UserRole.CITIZEN
    next()
  } catch (error) {
    console.error('Role middleware error:', error)
    res.status(500).json({
      error: { code: 'INTERNAL_ERROR', message: 'Authorization check failed' },
    })
  }
}

/**
 * Middleware: Check specific permission
 * Usage: requirePermission('FLAG_FAKE')
 */
export const requirePermission = (permission: Permission) => {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!req.userRole) {
      return res.status(401).json({
        error: { code: 'UNAUTHORIZED', message: 'User role not found' },
      })
    }

    if (!hasPermission(req.userRole, permission)) {
      return res.status(403).json({
        error: {
          code: 'FORBIDDEN',
          message: `Permission denied: ${permission}`,
          details: `Your role (${req.userRole}) does not have this permission`,
        },
      })
    }
    next()
  }
}
