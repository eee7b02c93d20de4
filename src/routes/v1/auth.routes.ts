import { Router } from 'express';
import {
  register,
  login,
  verifyEmail,
  resendVerification,
  getCurrentUser,
} from '../../controllers/auth.controller';
import { authenticate, optionalAuthenticate } from '../../middleware/auth.middleware';
import { authLimiter } from '../../middleware/rateLimit.middleware';
import { validate } from '../../middleware/validate.middleware';
import {
  loginSchema,
  registerSchema,
  resendVerificationSchema,
  verifyEmailSchema,
} from '../../validators/auth.validator';

const router = Router();

/**
 * @swagger
 * /api/v1/auth/register:
 *   post:
 *     tags: [Authentication]
 *     summary: Register a new user
 *     description: Anonymous callers register as students and must give rollNo, name and branch. Self-registered accounts receive a 6-digit verification code by email and cannot log in until it is confirmed. An admin token allows creating coordinator and admin accounts, which start verified.
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required:
 *               - email
 *               - password
 *             properties:
 *               email:
 *                 type: string
 *               password:
 *                 type: string
 *               role:
 *                 type: string
 *                 enum: [admin, coordinator, student]
 *               rollNo:
 *                 type: string
 *               name:
 *                 type: string
 *               branch:
 *                 type: string
 *               isLateralEntry:
 *                 type: boolean
 *     responses:
 *       201:
 *         description: Registration successful
 */
router.post('/register', authLimiter, optionalAuthenticate, validate(registerSchema), register);

/**
 * @swagger
 * /api/v1/auth/login:
 *   post:
 *     tags: [Authentication]
 *     summary: Login user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required:
 *               - email
 *               - password
 *             properties:
 *               email:
 *                 type: string
 *               password:
 *                 type: string
 *     responses:
 *       200:
 *         description: Login successful
 *       401:
 *         description: Invalid email or password
 *       403:
 *         description: Email not verified
 */
router.post('/login', authLimiter, validate(loginSchema), login);

/**
 * @swagger
 * /api/v1/auth/verify-email:
 *   post:
 *     tags: [Authentication]
 *     summary: Verify email
 *     description: Confirms the code mailed at registration. Codes expire after 10 minutes and lock after 5 wrong attempts.
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required:
 *               - email
 *               - code
 *             properties:
 *               email:
 *                 type: string
 *               code:
 *                 type: string
 *     responses:
 *       200:
 *         description: Email verified successfully, returns an access token
 *       400:
 *         description: Invalid or expired verification code
 */
router.post('/verify-email', authLimiter, validate(verifyEmailSchema), verifyEmail);

/**
 * @swagger
 * /api/v1/auth/resend-verification:
 *   post:
 *     tags: [Authentication]
 *     summary: Resend verification code
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required:
 *               - email
 *             properties:
 *               email:
 *                 type: string
 *     responses:
 *       200:
 *         description: A new code was sent if the account awaits verification
 */
router.post('/resend-verification', authLimiter, validate(resendVerificationSchema), resendVerification);

/**
 * @swagger
 * /api/v1/auth/me:
 *   get:
 *     tags: [Authentication]
 *     summary: Get current user
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: User retrieved successfully
 */
router.get('/me', authenticate, getCurrentUser);

export default router;
