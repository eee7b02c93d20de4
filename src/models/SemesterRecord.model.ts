import mongoose, { Document, Schema } from 'mongoose';
import { MAX_GRADE_POINT, MAX_SEMESTER } from '../utils/constants';

export interface ISubjectGrade {
  subject: string;
  gradePoint: number;
  credits: number;
}

export interface ISemesterRecord extends Document {
  student: mongoose.Types.ObjectId;
  semesterNo: number;
  sgpa: number;
  credits: number;
  backlogCount: number;
  subjects: ISubjectGrade[];
  sourceFile?: string;
  importedAt: Date;
}

const subjectGradeSchema = new Schema<ISubjectGrade>(
  {
    subject: { type: String, required: true, trim: true },
    gradePoint: { type: Number, required: true, min: 0, max: MAX_GRADE_POINT },
    credits: { type: Number, required: true, min: 0 },
  },
  { _id: false }
);

const semesterRecordSchema = new Schema<ISemesterRecord>({
  student: {
    type: Schema.Types.ObjectId,
    ref: 'Student',
    required: true,
    index: true,
  },
  semesterNo: {
    type: Number,
    required: true,
    min: 1,
    max: MAX_SEMESTER,
  },
  sgpa: {
    type: Number,
    required: true,
    min: 0,
    max: MAX_GRADE_POINT,
  },
  credits: {
    type: Number,
    required: true,
    min: 0,
  },
  backlogCount: {
    type: Number,
    default: 0,
    min: 0,
  },
  subjects: {
    type: [subjectGradeSchema],
    default: [],
  },
  sourceFile: String,
  importedAt: {
    type: Date,
    default: Date.now,
  },
});

semesterRecordSchema.index({ student: 1, semesterNo: 1 }, { unique: true });

const SemesterRecord = mongoose.model<ISemesterRecord>('SemesterRecord', semesterRecordSchema);

export default SemesterRecord;
