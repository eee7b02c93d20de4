import { z } from 'zod';
import { SETTABLE_APPLICATION_STATUSES } from '../utils/constants';

export const applySchema = z.object({
  body: z.object({
    companyId: z.string().min(1, 'Company is required'),
    // Staff apply on behalf of a student; students always apply as themselves.
    studentId: z.string().min(1).optional(),
  }),
});

export const statusUpdateSchema = z.object({
  params: z.object({ id: z.string().min(1) }),
  body: z.object({
    status: z.enum(SETTABLE_APPLICATION_STATUSES, {
      errorMap: () => ({ message: `Status must be one of ${SETTABLE_APPLICATION_STATUSES.join(', ')}` }),
    }),
  }),
});

export type ApplyBody = z.infer<typeof applySchema>['body'];
export type StatusUpdateBody = z.infer<typeof statusUpdateSchema>['body'];
