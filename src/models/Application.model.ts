import mongoose, { Document, Schema } from 'mongoose';
import { ApplicationStatus } from '../types';
import { APPLICATION_STATUS, APPLICATION_STATUS_VALUES } from '../utils/constants';

export interface IApplication extends Document {
  student: mongoose.Types.ObjectId;
  company: mongoose.Types.ObjectId;
  status: ApplicationStatus;
  appliedAt: Date;
  exportedAt?: Date;
  closedReason?: string;
  updatedAt: Date;
}

const applicationSchema = new Schema<IApplication>(
  {
    student: {
      type: Schema.Types.ObjectId,
      ref: 'Student',
      required: true,
      index: true,
    },
    company: {
      type: Schema.Types.ObjectId,
      ref: 'Company',
      required: true,
      index: true,
    },
    status: {
      type: String,
      enum: APPLICATION_STATUS_VALUES,
      default: APPLICATION_STATUS.APPLIED,
      index: true,
    },
    appliedAt: {
      type: Date,
      default: Date.now,
    },
    exportedAt: Date,
    closedReason: String,
  },
  {
    timestamps: { createdAt: false, updatedAt: true },
  }
);

applicationSchema.index({ student: 1, company: 1 }, { unique: true });

const Application = mongoose.model<IApplication>('Application', applicationSchema);

export default Application;
