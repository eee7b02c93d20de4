import { Request, Response, NextFunction } from 'express';
import { verifyAccessToken } from '../config/jwt';
import { ApiError } from '../utils/ApiError';

function getBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) return null;
  const token = authHeader.split(' ')[1];
  return token || null;
}

export const authenticate = (req: Request, _res: Response, next: NextFunction) => {
  const token = getBearerToken(req);
  if (!token) throw ApiError.unauthorized('No token provided');

  req.user = verifyAccessToken(token);
  next();
};

/**
 * Attaches the user when a valid token is present and lets anonymous
 * requests through.
 */
export const optionalAuthenticate = (req: Request, _res: Response, next: NextFunction) => {
  const token = getBearerToken(req);
  if (token) {
    req.user = verifyAccessToken(token);
  }
  next();
};
