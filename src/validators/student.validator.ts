import { z } from 'zod';
import { ELIGIBILITY_STATUS, MAX_SEMESTER } from '../utils/constants';

const idParams = z.object({ id: z.string().min(1) });

export const createStudentSchema = z.object({
  body: z.object({
    rollNo: z.string().trim().min(1, 'Roll number is required'),
    name: z.string().trim().min(1, 'Name is required'),
    branch: z.string().trim().min(1, 'Branch is required'),
    isLateralEntry: z.boolean().optional(),
    currentSemester: z.number().int().min(1).max(MAX_SEMESTER).optional(),
    resumeLink: z.string().trim().url('Resume link must be a URL').optional(),
  }),
});

export const resumeLinkSchema = z.object({
  params: idParams,
  body: z.object({
    resumeLink: z.string().trim().url('Resume link must be a URL'),
  }),
});

export const eligibilityStatusSchema = z.object({
  params: idParams,
  body: z.object({
    status: z.nativeEnum(ELIGIBILITY_STATUS, { errorMap: () => ({ message: 'Invalid eligibility status' }) }),
    note: z.string().trim().max(500).optional(),
  }),
});

export const backlogUpdateSchema = z.object({
  params: idParams,
  body: z.object({
    semesterNo: z.number().int().min(1).max(MAX_SEMESTER),
    backlogCount: z.number().int().min(0, 'Backlog count cannot be negative'),
    note: z.string().trim().max(500).optional(),
  }),
});

export type CreateStudentBody = z.infer<typeof createStudentSchema>['body'];
export type ResumeLinkBody = z.infer<typeof resumeLinkSchema>['body'];
export type EligibilityStatusBody = z.infer<typeof eligibilityStatusSchema>['body'];
export type BacklogUpdateBody = z.infer<typeof backlogUpdateSchema>['body'];
