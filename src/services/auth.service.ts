import bcrypt from 'bcrypt';
import { generateAccessToken } from '../config/jwt';
import logger from '../config/logger';
import { PlacementRepository } from '../repositories/placement.repository';
import { AuthUser, Student, User, UserRole } from '../types';
import { ApiError } from '../utils/ApiError';
import {
  EMAIL_VERIFICATION_EXPIRY_MINUTES,
  MAX_VERIFICATION_ATTEMPTS,
  OTP_LENGTH,
  SALT_ROUNDS,
  USER_ROLES,
} from '../utils/constants';
import { generateOTP, hashToken, normalizeBranch, normalizeRollNo } from '../utils/helpers';
import { EmailService } from './email.service';

export interface RegisterInput {
  email: string;
  password: string;
  role?: UserRole;
  rollNo?: string;
  name?: string;
  branch?: string;
  isLateralEntry?: boolean;
}

export type PublicUser = Omit<
  User,
  'passwordHash' | 'emailVerificationToken' | 'emailVerificationExpiry' | 'emailVerificationAttempts'
>;

export interface AuthResult {
  user: PublicUser;
  accessToken: string;
}

export interface RegisterResult {
  user: PublicUser;
  // Only issued when the account is verified at creation.
  accessToken?: string;
  verificationRequired: boolean;
  emailSent: boolean;
}

const INVALID_CODE = 'Invalid or expired verification code';

const toPublicUser = ({
  passwordHash: _passwordHash,
  emailVerificationToken: _token,
  emailVerificationExpiry: _expiry,
  emailVerificationAttempts: _attempts,
  ...user
}: User): PublicUser => user;

const newVerificationCode = () => {
  const code = generateOTP(OTP_LENGTH);
  return {
    code,
    emailVerificationToken: hashToken(code),
    emailVerificationExpiry: new Date(Date.now() + EMAIL_VERIFICATION_EXPIRY_MINUTES * 60 * 1000),
  };
};

const saltRounds = (): number => {
  const configured = parseInt(process.env.BCRYPT_SALT_ROUNDS || '', 10);
  return Number.isInteger(configured) && configured > 0 ? configured : SALT_ROUNDS;
};

export class AuthService {
  constructor(
    private readonly repository: PlacementRepository,
    private readonly emailService: EmailService
  ) {}

  private issueToken(user: User): AuthResult {
    const accessToken = generateAccessToken({
      userId: user.id,
      email: user.email,
      role: user.role,
      ...(user.studentId && { studentId: user.studentId }),
    });
    return { user: toPublicUser(user), accessToken };
  }

  private async linkStudent(input: RegisterInput): Promise<Student> {
    if (!input.rollNo || !input.name || !input.branch) {
      throw ApiError.badRequest('Roll number, name and branch are required for student accounts');
    }
    const rollNo = normalizeRollNo(input.rollNo);
    const existing = await this.repository.findStudentByRollNo(rollNo);
    if (existing) {
      if (await this.repository.findUserByStudentId(existing.id)) {
        throw ApiError.conflict(`Student ${rollNo} already has an account`);
      }
      return existing;
    }
    return this.repository.createStudent({
      rollNo,
      name: input.name.trim(),
      branch: normalizeBranch(input.branch),
      ...(input.isLateralEntry !== undefined && { isLateralEntry: input.isLateralEntry }),
    });
  }

  /**
   * Creates an account. Only an authenticated admin may create staff
   * accounts; everyone else registers as a student and must confirm the
   * emailed code before logging in. Accounts an admin creates start verified.
   */
  async register(input: RegisterInput, requester?: AuthUser): Promise<RegisterResult> {
    const email = input.email.trim().toLowerCase();
    const createdByAdmin = requester?.role === USER_ROLES.ADMIN;
    const role = createdByAdmin ? input.role ?? USER_ROLES.STUDENT : USER_ROLES.STUDENT;

    if (await this.repository.findUserByEmail(email)) {
      throw ApiError.conflict('User with this email already exists');
    }

    const student = role === USER_ROLES.STUDENT ? await this.linkStudent(input) : undefined;
    const passwordHash = await bcrypt.hash(input.password, saltRounds());

    if (createdByAdmin) {
      const user = await this.repository.createUser({
        email,
        passwordHash,
        role,
        isEmailVerified: true,
        ...(student && { studentId: student.id }),
      });
      logger.info(`User created by admin: ${user.email} (${user.role})`);
      return { ...this.issueToken(user), verificationRequired: false, emailSent: false };
    }

    const { code, ...verification } = newVerificationCode();
    const user = await this.repository.createUser({
      email,
      passwordHash,
      role,
      isEmailVerified: false,
      ...verification,
      ...(student && { studentId: student.id }),
    });
    logger.info(`User registered: ${user.email} (${user.role}), awaiting verification`);
    const emailSent = await this.emailService.sendVerificationEmail(user, code);
    return { user: toPublicUser(user), verificationRequired: true, emailSent };
  }

  async login(email: string, password: string): Promise<AuthResult> {
    const user = await this.repository.findUserByEmail(email.trim().toLowerCase());
    if (!user || !(await bcrypt.compare(password, user.passwordHash))) {
      throw ApiError.unauthorized('Invalid email or password');
    }
    if (!user.isEmailVerified) {
      throw ApiError.forbidden('Please verify your email before logging in');
    }
    logger.info(`User logged in: ${user.email}`);
    return this.issueToken(user);
  }

  /**
   * Confirms the code mailed at registration and logs the user in. A code
   * stops working after it expires or after too many wrong guesses.
   */
  async verifyEmail(email: string, code: string): Promise<AuthResult> {
    const user = await this.repository.findUserByEmail(email.trim().toLowerCase());
    if (!user) throw ApiError.badRequest(INVALID_CODE);
    if (user.isEmailVerified) throw ApiError.badRequest('Email is already verified');

    const { emailVerificationToken, emailVerificationExpiry, emailVerificationAttempts } = user;
    if (!emailVerificationToken || !emailVerificationExpiry || emailVerificationExpiry.getTime() < Date.now()) {
      throw ApiError.badRequest(INVALID_CODE);
    }
    if (emailVerificationAttempts >= MAX_VERIFICATION_ATTEMPTS) {
      throw ApiError.badRequest('Too many attempts, request a new verification code');
    }
    if (hashToken(code.trim()) !== emailVerificationToken) {
      await this.repository.updateUser(user.id, { emailVerificationAttempts: emailVerificationAttempts + 1 });
      throw ApiError.badRequest(INVALID_CODE);
    }

    const verified = await this.repository.updateUser(user.id, {
      isEmailVerified: true,
      emailVerificationToken: null,
      emailVerificationExpiry: null,
      emailVerificationAttempts: 0,
    });
    logger.info(`Email verified: ${verified.email}`);
    return this.issueToken(verified);
  }

  /**
   * Mails a fresh code to an unverified account. Unknown and already
   * verified addresses are ignored so the endpoint does not reveal them.
   */
  async resendVerification(email: string): Promise<void> {
    const user = await this.repository.findUserByEmail(email.trim().toLowerCase());
    if (!user || user.isEmailVerified) return;

    const { code, ...verification } = newVerificationCode();
    const updated = await this.repository.updateUser(user.id, { ...verification, emailVerificationAttempts: 0 });
    await this.emailService.sendVerificationEmail(updated, code);
  }

  async me(userId: string): Promise<PublicUser> {
    const user = await this.repository.findUserById(userId);
    if (!user) throw ApiError.notFound('User not found');
    return toPublicUser(user);
  }
}
