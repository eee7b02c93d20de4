export const USER_ROLES = {
  ADMIN: 'admin',
  COORDINATOR: 'coordinator',
  STUDENT: 'student',
} as const;

export const ELIGIBILITY_STATUS = {
  ELIGIBLE: 'ELIGIBLE',
  EXTERNAL_INTERN: 'EXTERNAL_INTERN',
  CAMPUS_INTERN: 'CAMPUS_INTERN',
  EXTERNAL_PLACED: 'EXTERNAL_PLACED',
  BLOCKED_BY_POLICY: 'BLOCKED_BY_POLICY',
} as const;

export const SELECTION_POLICY = {
  BLOCKING: 'BLOCKING',
  NON_BLOCKING: 'NON_BLOCKING',
} as const;

export const APPLICATION_STATUS = {
  APPLIED: 'APPLIED',
  SHORTLISTED: 'SHORTLISTED',
  INTERVIEW: 'INTERVIEW',
  SELECTED: 'SELECTED',
  REJECTED: 'REJECTED',
  CLOSED: 'CLOSED',
} as const;

export const BACKLOG_TRIGGER = {
  IMPORT: 'IMPORT',
  MANUAL: 'MANUAL',
} as const;

export const NOTIFICATION_STATUS = {
  PENDING: 'PENDING',
  SENT: 'SENT',
  FAILED: 'FAILED',
  NOT_CONFIGURED: 'NOT_CONFIGURED',
} as const;

export const STAFF_ROLES: readonly string[] = [USER_ROLES.ADMIN, USER_ROLES.COORDINATOR];

export const USER_ROLE_VALUES = Object.values(USER_ROLES);
export const ELIGIBILITY_STATUS_VALUES = Object.values(ELIGIBILITY_STATUS);
export const SELECTION_POLICY_VALUES = Object.values(SELECTION_POLICY);
export const APPLICATION_STATUS_VALUES = Object.values(APPLICATION_STATUS);

// Statuses a coordinator may set by hand; CLOSED is only reached through the blocking policy.
export const SETTABLE_APPLICATION_STATUSES = [
  APPLICATION_STATUS.APPLIED,
  APPLICATION_STATUS.SHORTLISTED,
  APPLICATION_STATUS.INTERVIEW,
  APPLICATION_STATUS.SELECTED,
  APPLICATION_STATUS.REJECTED,
] as const;

export const OPEN_APPLICATION_STATUSES = [
  APPLICATION_STATUS.APPLIED,
  APPLICATION_STATUS.SHORTLISTED,
  APPLICATION_STATUS.INTERVIEW,
] as const;

export const LATERAL_ENTRY_FIRST_SEMESTER = 3;
export const MAX_SEMESTER = 12;
export const MAX_GRADE_POINT = 10;
export const DEFAULT_PASSING_GRADE_POINT = 4;
export const CGPA_NO_DATA_LABEL = 'N/A';

export const SALT_ROUNDS = 12;
export const MIN_PASSWORD_LENGTH = 8;
export const OTP_LENGTH = 6;
export const EMAIL_VERIFICATION_EXPIRY_MINUTES = 10;
export const MAX_VERIFICATION_ATTEMPTS = 5;
export const DEFAULT_MAX_BACKLOGS = 999;
export const EXCEL_SHEET_NAME_LIMIT = 31;
export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
