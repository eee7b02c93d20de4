import mongoose, { Document, Schema } from 'mongoose';
import { UserRole } from '../types';
import { USER_ROLES, USER_ROLE_VALUES } from '../utils/constants';

export interface IUser extends Document {
  email: string;
  passwordHash: string;
  role: UserRole;
  student?: mongoose.Types.ObjectId;
  isEmailVerified: boolean;
  emailVerificationToken?: string;
  emailVerificationExpiry?: Date;
  emailVerificationAttempts: number;
  createdAt: Date;
  updatedAt: Date;
}

const userSchema = new Schema<IUser>(
  {
    email: {
      type: String,
      required: [true, 'Email is required'],
      unique: true,
      lowercase: true,
      trim: true,
      index: true,
    },
    passwordHash: {
      type: String,
      required: true,
    },
    role: {
      type: String,
      enum: USER_ROLE_VALUES,
      default: USER_ROLES.STUDENT,
      index: true,
    },
    student: {
      type: Schema.Types.ObjectId,
      ref: 'Student',
      unique: true,
      sparse: true,
    },
    isEmailVerified: {
      type: Boolean,
      default: false,
    },
    emailVerificationToken: String,
    emailVerificationExpiry: Date,
    emailVerificationAttempts: {
      type: Number,
      default: 0,
    },
  },
  {
    timestamps: true,
  }
);

const User = mongoose.model<IUser>('User', userSchema);

export default User;
