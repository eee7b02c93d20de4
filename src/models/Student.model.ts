import mongoose, { Document, Schema } from 'mongoose';
import { EligibilityStatus } from '../types';
import { ELIGIBILITY_STATUS, ELIGIBILITY_STATUS_VALUES } from '../utils/constants';

export interface IStudent extends Document {
  rollNo: string;
  name: string;
  branch: string;
  isLateralEntry: boolean;
  currentSemester: number;
  cgpa: number | null;
  totalBacklogs: number;
  resumeLink?: string;
  eligibilityStatus: EligibilityStatus;
  blockReason?: string;
  blockedByCompany?: mongoose.Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
}

const studentSchema = new Schema<IStudent>(
  {
    rollNo: {
      type: String,
      required: [true, 'Roll number is required'],
      unique: true,
      uppercase: true,
      trim: true,
      index: true,
    },
    name: {
      type: String,
      required: [true, 'Name is required'],
      trim: true,
    },
    branch: {
      type: String,
      required: [true, 'Branch is required'],
      uppercase: true,
      trim: true,
      index: true,
    },
    isLateralEntry: {
      type: Boolean,
      default: false,
    },
    currentSemester: {
      type: Number,
      default: 1,
      min: 1,
    },
    cgpa: {
      type: Number,
      default: null,
    },
    totalBacklogs: {
      type: Number,
      default: 0,
      min: 0,
    },
    resumeLink: String,
    eligibilityStatus: {
      type: String,
      enum: ELIGIBILITY_STATUS_VALUES,
      default: ELIGIBILITY_STATUS.ELIGIBLE,
      index: true,
    },
    blockReason: String,
    blockedByCompany: {
      type: Schema.Types.ObjectId,
      ref: 'Company',
    },
  },
  {
    timestamps: true,
  }
);

studentSchema.index({ branch: 1, rollNo: 1 });

const Student = mongoose.model<IStudent>('Student', studentSchema);

export default Student;
