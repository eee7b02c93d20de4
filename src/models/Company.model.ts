import mongoose, { Document, Schema } from 'mongoose';
import { ExportColumn, SelectionPolicy } from '../types';
import { DEFAULT_MAX_BACKLOGS, SELECTION_POLICY, SELECTION_POLICY_VALUES } from '../utils/constants';

export interface ICompany extends Document {
  name: string;
  eligibleBranches: string[];
  minCgpa: number;
  maxBacklogs: number;
  selectionPolicy: SelectionPolicy;
  exportTemplate: ExportColumn[];
  createdAt: Date;
  updatedAt: Date;
}

const exportColumnSchema = new Schema<ExportColumn>(
  {
    header: { type: String, required: true, trim: true },
    source: { type: String, required: true, trim: true },
  },
  { _id: false }
);

const companySchema = new Schema<ICompany>(
  {
    name: {
      type: String,
      required: [true, 'Company name is required'],
      unique: true,
      trim: true,
    },
    eligibleBranches: {
      type: [String],
      default: ['ALL'],
    },
    minCgpa: {
      type: Number,
      default: 0,
      min: 0,
    },
    maxBacklogs: {
      type: Number,
      default: DEFAULT_MAX_BACKLOGS,
      min: 0,
    },
    selectionPolicy: {
      type: String,
      enum: SELECTION_POLICY_VALUES,
      default: SELECTION_POLICY.NON_BLOCKING,
    },
    exportTemplate: {
      type: [exportColumnSchema],
      default: [],
    },
  },
  {
    timestamps: true,
  }
);

const Company = mongoose.model<ICompany>('Company', companySchema);

export default Company;
