import { z } from 'zod';
import { MIN_PASSWORD_LENGTH, OTP_LENGTH, USER_ROLES } from '../utils/constants';

export const registerSchema = z.object({
  body: z.object({
    email: z.string().email('A valid email is required'),
    password: z.string().min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters`),
    role: z.nativeEnum(USER_ROLES).optional(),
    rollNo: z.string().trim().min(1).optional(),
    name: z.string().trim().min(1).optional(),
    branch: z.string().trim().min(1).optional(),
    isLateralEntry: z.boolean().optional(),
  }),
});

export const loginSchema = z.object({
  body: z.object({
    email: z.string().email('A valid email is required'),
    password: z.string().min(1, 'Password is required'),
  }),
});

export const verifyEmailSchema = z.object({
  body: z.object({
    email: z.string().email('A valid email is required'),
    code: z
      .string()
      .trim()
      .regex(new RegExp(`^\\d{${OTP_LENGTH}}$`), `Verification code must be ${OTP_LENGTH} digits`),
  }),
});

export const resendVerificationSchema = z.object({
  body: z.object({
    email: z.string().email('A valid email is required'),
  }),
});

export type RegisterBody = z.infer<typeof registerSchema>['body'];
export type LoginBody = z.infer<typeof loginSchema>['body'];
export type VerifyEmailBody = z.infer<typeof verifyEmailSchema>['body'];
export type ResendVerificationBody = z.infer<typeof resendVerificationSchema>['body'];
