import {
  Application,
  ApplicationStatus,
  BacklogHistoryEntry,
  Company,
  EligibilityStatus,
  NotificationLog,
  NotificationStatus,
  SemesterRecord,
  Student,
  User,
} from '../types';

export type NewStudent = Pick<Student, 'rollNo' | 'name' | 'branch'> &
  Partial<Pick<Student, 'isLateralEntry' | 'currentSemester' | 'resumeLink' | 'eligibilityStatus' | 'blockReason'>>;

export interface StudentPatch {
  name?: string;
  branch?: string;
  isLateralEntry?: boolean;
  currentSemester?: number;
  cgpa?: number | null;
  totalBacklogs?: number;
  resumeLink?: string;
  eligibilityStatus?: EligibilityStatus;
  /** `null` clears the field. */
  blockReason?: string | null;
  blockedByCompanyId?: string | null;
}

export type SemesterRecordInput = Omit<SemesterRecord, 'id' | 'importedAt'>;

export type NewBacklogHistoryEntry = Omit<BacklogHistoryEntry, 'id' | 'createdAt'>;

export type NewCompany = Omit<Company, 'id' | 'createdAt' | 'updatedAt'>;
export type CompanyPatch = Partial<NewCompany>;

export interface NewApplication {
  studentId: string;
  companyId: string;
}

export interface ApplicationPatch {
  status?: ApplicationStatus;
  exportedAt?: Date;
  closedReason?: string | null;
}

export interface ApplicationFilter {
  studentId?: string;
  companyId?: string;
  statuses?: readonly ApplicationStatus[];
}

export type NewUser = Omit<User, 'id' | 'createdAt' | 'emailVerificationAttempts'>;

export interface UserPatch {
  isEmailVerified?: boolean;
  emailVerificationToken?: string | null;
  emailVerificationExpiry?: Date | null;
  emailVerificationAttempts?: number;
}

export type NewNotificationLog = Omit<NotificationLog, 'id' | 'createdAt'>;

/**
 * Persistence boundary for the placement domain. Services only talk to
 * storage through this interface; the production implementation is backed
 * by Mongoose.
 */
export interface PlacementRepository {
  createStudent(input: NewStudent): Promise<Student>;
  findStudentById(id: string): Promise<Student | null>;
  findStudentByRollNo(rollNo: string): Promise<Student | null>;
  findStudentsByIds(ids: readonly string[]): Promise<Student[]>;
  listStudents(filter?: { branch?: string }): Promise<Student[]>;
  updateStudent(id: string, patch: StudentPatch): Promise<Student>;

  listSemesterRecords(studentId: string): Promise<SemesterRecord[]>;
  findSemesterRecord(studentId: string, semesterNo: number): Promise<SemesterRecord | null>;
  /** Inserts the record, replacing any existing one for the same student and semester. */
  replaceSemesterRecord(input: SemesterRecordInput): Promise<SemesterRecord>;
  setSemesterBacklog(studentId: string, semesterNo: number, backlogCount: number): Promise<SemesterRecord>;

  appendBacklogHistory(entry: NewBacklogHistoryEntry): Promise<BacklogHistoryEntry>;
  /** Newest first. */
  listBacklogHistory(filter?: { studentId?: string }): Promise<BacklogHistoryEntry[]>;

  createCompany(input: NewCompany): Promise<Company>;
  findCompanyById(id: string): Promise<Company | null>;
  findCompanyByName(name: string): Promise<Company | null>;
  findCompaniesByIds(ids: readonly string[]): Promise<Company[]>;
  listCompanies(): Promise<Company[]>;
  updateCompany(id: string, patch: CompanyPatch): Promise<Company>;

  createApplication(input: NewApplication): Promise<Application>;
  findApplicationById(id: string): Promise<Application | null>;
  findApplication(studentId: string, companyId: string): Promise<Application | null>;
  listApplications(filter?: ApplicationFilter): Promise<Application[]>;
  updateApplication(id: string, patch: ApplicationPatch): Promise<Application>;
  /** Applies the same patch to every listed application. */
  updateApplications(ids: readonly string[], patch: ApplicationPatch): Promise<void>;

  createUser(input: NewUser): Promise<User>;
  findUserById(id: string): Promise<User | null>;
  findUserByEmail(email: string): Promise<User | null>;
  findUserByStudentId(studentId: string): Promise<User | null>;
  updateUser(id: string, patch: UserPatch): Promise<User>;

  createNotificationLog(input: NewNotificationLog): Promise<NotificationLog>;
  updateNotificationLog(id: string, status: NotificationStatus, errorMessage?: string): Promise<void>;
}
