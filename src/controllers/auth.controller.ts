import { Request, Response } from 'express';
import { ApiError } from '../utils/ApiError';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { authService } from '../services';
import { LoginBody, RegisterBody, ResendVerificationBody, VerifyEmailBody } from '../validators/auth.validator';

/**
 * @desc    Register a user. Anonymous callers become students; admins may create staff accounts
 * @route   POST /api/v1/auth/register
 * @access  Public
 */
export const register = asyncHandler(async (req: Request, res: Response) => {
  const body: RegisterBody = req.body;
  const result = await authService.register(body, req.user);
  const message = result.verificationRequired
    ? 'Registration successful. Check your email for the verification code'
    : 'Registration successful';
  res.status(201).json(ApiResponse.success(message, result));
});

/**
 * @desc    Login user
 * @route   POST /api/v1/auth/login
 * @access  Public
 */
export const login = asyncHandler(async (req: Request, res: Response) => {
  const { email, password }: LoginBody = req.body;
  const result = await authService.login(email, password);
  res.status(200).json(ApiResponse.success('Login successful', result));
});

/**
 * @desc    Verify email with the code sent at registration
 * @route   POST /api/v1/auth/verify-email
 * @access  Public
 */
export const verifyEmail = asyncHandler(async (req: Request, res: Response) => {
  const { email, code }: VerifyEmailBody = req.body;
  const result = await authService.verifyEmail(email, code);
  res.status(200).json(ApiResponse.success('Email verified successfully', result));
});

/**
 * @desc    Send a new verification code
 * @route   POST /api/v1/auth/resend-verification
 * @access  Public
 */
export const resendVerification = asyncHandler(async (req: Request, res: Response) => {
  const { email }: ResendVerificationBody = req.body;
  await authService.resendVerification(email);
  res.status(200).json(ApiResponse.success('If the account awaits verification, a new code has been sent'));
});

/**
 * @desc    Get current user
 * @route   GET /api/v1/auth/me
 * @access  Private
 */
export const getCurrentUser = asyncHandler(async (req: Request, res: Response) => {
  if (!req.user) throw ApiError.unauthorized('Authentication required');
  const user = await authService.me(req.user.userId);
  res.status(200).json(ApiResponse.success('User retrieved successfully', user));
});
