import jwt, { SignOptions } from 'jsonwebtoken';
import { ApiError } from '../utils/ApiError';
import { UserRole } from '../types';
import { USER_ROLE_VALUES } from '../utils/constants';

const ACCESS_SECRET = process.env.JWT_ACCESS_SECRET || 'access_secret_fallback';
const ACCESS_EXPIRY = process.env.JWT_ACCESS_EXPIRY || '1h';

export interface TokenPayload {
  userId: string;
  email: string;
  role: UserRole;
  studentId?: string;
}

const signOpts = (exp: string | number): SignOptions => ({ expiresIn: exp as SignOptions['expiresIn'] });

const isUserRole = (value: unknown): value is UserRole =>
  typeof value === 'string' && USER_ROLE_VALUES.some((role) => role === value);

export const generateAccessToken = (payload: TokenPayload): string => {
  return jwt.sign(payload, ACCESS_SECRET, signOpts(ACCESS_EXPIRY));
};

export const verifyAccessToken = (token: string): TokenPayload => {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, ACCESS_SECRET);
  } catch (error) {
    throw ApiError.unauthorized('Invalid or expired access token');
  }

  if (
    typeof decoded === 'string' ||
    typeof decoded.userId !== 'string' ||
    typeof decoded.email !== 'string' ||
    !isUserRole(decoded.role)
  ) {
    throw ApiError.unauthorized('Malformed access token');
  }

  return {
    userId: decoded.userId,
    email: decoded.email,
    role: decoded.role,
    ...(typeof decoded.studentId === 'string' && { studentId: decoded.studentId }),
  };
};
