import mongoose, { Document, Schema } from 'mongoose';
import { NotificationStatus } from '../types';
import { NOTIFICATION_STATUS } from '../utils/constants';

export interface INotificationLog extends Document {
  user?: mongoose.Types.ObjectId;
  email: string;
  subject: string;
  body: string;
  status: NotificationStatus;
  errorMessage?: string;
  createdAt: Date;
}

const notificationLogSchema = new Schema<INotificationLog>(
  {
    user: {
      type: Schema.Types.ObjectId,
      ref: 'User',
      index: true,
    },
    email: {
      type: String,
      required: true,
    },
    subject: {
      type: String,
      required: true,
    },
    body: {
      type: String,
      required: true,
    },
    status: {
      type: String,
      enum: Object.values(NOTIFICATION_STATUS),
      default: NOTIFICATION_STATUS.PENDING,
    },
    errorMessage: {
      type: String,
      maxlength: 1024,
    },
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
  }
);

const NotificationLog = mongoose.model<INotificationLog>('NotificationLog', notificationLogSchema);

export default NotificationLog;
