import { Request, Response, NextFunction } from 'express';
import { ApiError } from '../utils/ApiError';
import { AuthUser, UserRole } from '../types';
import { STAFF_ROLES } from '../utils/constants';

export const authorizeRoles = (...roles: UserRole[]) => {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!req.user) {
      throw ApiError.unauthorized('Authentication required');
    }
    if (!roles.includes(req.user.role)) {
      throw ApiError.forbidden('You do not have permission to access this resource');
    }
    next();
  };
};

export const isStaff = (user: AuthUser): boolean => STAFF_ROLES.includes(user.role);

/**
 * Staff may act on any student; a student only on their own record,
 * identified by the `:id` route parameter.
 */
export const authorizeStudentAccess = (req: Request, _res: Response, next: NextFunction) => {
  if (!req.user) {
    throw ApiError.unauthorized('Authentication required');
  }
  if (!isStaff(req.user) && req.user.studentId !== req.params.id) {
    throw ApiError.forbidden('You can only access your own student record');
  }
  next();
};
