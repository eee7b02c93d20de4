import mongoose, { Document, Schema } from 'mongoose';
import { BacklogTrigger } from '../types';
import { BACKLOG_TRIGGER } from '../utils/constants';

export interface IBacklogHistory extends Document {
  student: mongoose.Types.ObjectId;
  semesterNo?: number;
  oldBacklog: number;
  newBacklog: number;
  trigger: BacklogTrigger;
  actor: string;
  note?: string;
  createdAt: Date;
}

const backlogHistorySchema = new Schema<IBacklogHistory>(
  {
    student: {
      type: Schema.Types.ObjectId,
      ref: 'Student',
      required: true,
      index: true,
    },
    semesterNo: Number,
    oldBacklog: {
      type: Number,
      required: true,
    },
    newBacklog: {
      type: Number,
      required: true,
    },
    trigger: {
      type: String,
      enum: Object.values(BACKLOG_TRIGGER),
      required: true,
    },
    actor: {
      type: String,
      required: true,
    },
    note: String,
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
  }
);

backlogHistorySchema.index({ student: 1, createdAt: -1 });

// Audit entries are append-only.
backlogHistorySchema.pre(['updateOne', 'updateMany', 'findOneAndUpdate', 'deleteOne', 'deleteMany'], function (next) {
  next(new Error('Backlog history entries cannot be modified'));
});

const BacklogHistory = mongoose.model<IBacklogHistory>('BacklogHistory', backlogHistorySchema);

export default BacklogHistory;
