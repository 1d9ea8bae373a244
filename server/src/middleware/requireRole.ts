import type { Request, Response, NextFunction } from 'express';
import { HttpError } from '../utils/errors.js';
import type { UserRole } from '../types.js';

export function requireRole(...roles: UserRole[]) {
  const allowed = new Set(roles);
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!req.auth) {
      return next(new HttpError(401, 'Unauthorized'));
    }
    if (!allowed.has(req.auth.role)) {
      const label = roles.length === 1 ? `${roles[0]} role` : `one of: ${roles.join(', ')}`;
      return next(new HttpError(403, `Requires ${label}`));
    }
    return next();
  };
}

export const adminOnly = requireRole('admin');
export const adminOrCoach = requireRole('admin', 'coach');
