import { z } from 'zod';
import { MAX_GRADE_POINT, SELECTION_POLICY } from '../utils/constants';

const exportColumn = z.object({
  header: z.string(),
  source: z.string(),
});

const companyBody = z.object({
  name: z.string().trim().min(1, 'Company name is required'),
  eligibleBranches: z.array(z.string()).optional(),
  minCgpa: z.number().min(0).max(MAX_GRADE_POINT).optional(),
  maxBacklogs: z.number().int().min(0).optional(),
  selectionPolicy: z.nativeEnum(SELECTION_POLICY).optional(),
  exportTemplate: z.array(exportColumn).optional(),
});

export const createCompanySchema = z.object({
  body: companyBody,
});

export const updateCompanySchema = z.object({
  params: z.object({ id: z.string().min(1) }),
  body: companyBody.partial(),
});

export type CreateCompanyBody = z.infer<typeof createCompanySchema>['body'];
export type UpdateCompanyBody = z.infer<typeof updateCompanySchema>['body'];
