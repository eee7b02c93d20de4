import {
  APPLICATION_STATUS,
  BACKLOG_TRIGGER,
  ELIGIBILITY_STATUS,
  NOTIFICATION_STATUS,
  SELECTION_POLICY,
  USER_ROLES,
} from '../utils/constants';

type ValueOf<T> = T[keyof T];

export type UserRole = ValueOf<typeof USER_ROLES>;
export type EligibilityStatus = ValueOf<typeof ELIGIBILITY_STATUS>;
export type SelectionPolicy = ValueOf<typeof SELECTION_POLICY>;
export type ApplicationStatus = ValueOf<typeof APPLICATION_STATUS>;
export type BacklogTrigger = ValueOf<typeof BACKLOG_TRIGGER>;
export type NotificationStatus = ValueOf<typeof NOTIFICATION_STATUS>;

export interface Student {
  id: string;
  rollNo: string;
  name: string;
  branch: string;
  isLateralEntry: boolean;
  currentSemester: number;
  /** `null` while no semester contributes to the average. */
  cgpa: number | null;
  totalBacklogs: number;
  resumeLink?: string;
  eligibilityStatus: EligibilityStatus;
  blockReason?: string;
  blockedByCompanyId?: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface SubjectGrade {
  subject: string;
  gradePoint: number;
  credits: number;
}

export interface SemesterRecord {
  id: string;
  studentId: string;
  semesterNo: number;
  sgpa: number;
  credits: number;
  backlogCount: number;
  subjects: SubjectGrade[];
  sourceFile?: string;
  importedAt: Date;
}

export interface BacklogHistoryEntry {
  id: string;
  studentId: string;
  semesterNo?: number;
  oldBacklog: number;
  newBacklog: number;
  trigger: BacklogTrigger;
  actor: string;
  note?: string;
  createdAt: Date;
}

export interface ExportColumn {
  header: string;
  source: string;
}

export interface Company {
  id: string;
  name: string;
  /** Upper-cased branch codes, or `['ALL']`. */
  eligibleBranches: string[];
  minCgpa: number;
  maxBacklogs: number;
  selectionPolicy: SelectionPolicy;
  exportTemplate: ExportColumn[];
  createdAt: Date;
  updatedAt: Date;
}

export interface Application {
  id: string;
  studentId: string;
  companyId: string;
  status: ApplicationStatus;
  appliedAt: Date;
  updatedAt: Date;
  exportedAt?: Date;
  closedReason?: string;
}

export interface User {
  id: string;
  email: string;
  passwordHash: string;
  role: UserRole;
  studentId?: string;
  isEmailVerified: boolean;
  // sha256 of the one-time code mailed at registration
  emailVerificationToken?: string;
  emailVerificationExpiry?: Date;
  emailVerificationAttempts: number;
  createdAt: Date;
}

export interface NotificationLog {
  id: string;
  userId?: string;
  email: string;
  subject: string;
  body: string;
  status: NotificationStatus;
  errorMessage?: string;
  createdAt: Date;
}

export interface AuthUser {
  userId: string;
  email: string;
  role: UserRole;
  studentId?: string;
}

export interface EmailOptions {
  to: string;
  subject: string;
  text: string;
  html?: string;
}
