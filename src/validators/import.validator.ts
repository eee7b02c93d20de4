import { z } from 'zod';
import { MAX_SEMESTER } from '../utils/constants';

// Multipart fields arrive as strings.
export const sgpaImportSchema = z.object({
  body: z.object({
    semesterNo: z.coerce.number().int().min(1).max(MAX_SEMESTER),
    branch: z.string().trim().min(1, 'Branch is required'),
    semesterCredits: z.preprocess(
      (value) => (value === '' ? undefined : value),
      z.coerce.number().positive('Semester credits must be greater than 0').optional()
    ),
  }),
});

export type SgpaImportBody = z.infer<typeof sgpaImportSchema>['body'];
