import { Application, Company, Student } from '../../src/types';
import { APPLICATION_STATUS, ELIGIBILITY_STATUS, SELECTION_POLICY } from '../../src/utils/constants';

const created = new Date('2025-07-01T09:00:00Z');

export const buildStudent = (overrides: Partial<Student> = {}): Student => ({
  id: 'stu-1',
  rollNo: '21CS001',
  name: 'Asha Rao',
  branch: 'CSE',
  isLateralEntry: false,
  currentSemester: 5,
  cgpa: 8.12,
  totalBacklogs: 0,
  resumeLink: 'https://example.com/resume/asha.pdf',
  eligibilityStatus: ELIGIBILITY_STATUS.ELIGIBLE,
  createdAt: created,
  updatedAt: created,
  ...overrides,
});

export const buildCompany = (overrides: Partial<Company> = {}): Company => ({
  id: 'com-1',
  name: 'Acme Systems',
  eligibleBranches: ['ALL'],
  minCgpa: 0,
  maxBacklogs: 999,
  selectionPolicy: SELECTION_POLICY.NON_BLOCKING,
  exportTemplate: [],
  createdAt: created,
  updatedAt: created,
  ...overrides,
});

export const buildApplication = (overrides: Partial<Application> = {}): Application => ({
  id: 'app-1',
  studentId: 'stu-1',
  companyId: 'com-1',
  status: APPLICATION_STATUS.APPLIED,
  appliedAt: new Date('2025-08-14T10:30:05Z'),
  updatedAt: new Date('2025-08-14T10:30:05Z'),
  ...overrides,
});
