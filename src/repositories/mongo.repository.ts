import mongoose, { isValidObjectId } from 'mongoose';
import StudentModel, { IStudent } from '../models/Student.model';
import SemesterRecordModel, { ISemesterRecord } from '../models/SemesterRecord.model';
import BacklogHistoryModel, { IBacklogHistory } from '../models/BacklogHistory.model';
import CompanyModel, { ICompany } from '../models/Company.model';
import ApplicationModel, { IApplication } from '../models/Application.model';
import UserModel, { IUser } from '../models/User.model';
import NotificationLogModel, { INotificationLog } from '../models/NotificationLog.model';
import {
  Application,
  BacklogHistoryEntry,
  Company,
  NotificationLog,
  NotificationStatus,
  SemesterRecord,
  Student,
  User,
} from '../types';
import { ApiError } from '../utils/ApiError';
import {
  ApplicationFilter,
  ApplicationPatch,
  CompanyPatch,
  NewApplication,
  NewBacklogHistoryEntry,
  NewCompany,
  NewNotificationLog,
  NewStudent,
  NewUser,
  PlacementRepository,
  SemesterRecordInput,
  StudentPatch,
  UserPatch,
} from './placement.repository';

const objectId = (id: string) => new mongoose.Types.ObjectId(id);

const validIds = (ids: readonly string[]) => ids.filter((id) => isValidObjectId(id)).map(objectId);

const toStudent = (doc: IStudent): Student => ({
  id: doc.id,
  rollNo: doc.rollNo,
  name: doc.name,
  branch: doc.branch,
  isLateralEntry: doc.isLateralEntry,
  currentSemester: doc.currentSemester,
  cgpa: doc.cgpa ?? null,
  totalBacklogs: doc.totalBacklogs,
  ...(doc.resumeLink && { resumeLink: doc.resumeLink }),
  eligibilityStatus: doc.eligibilityStatus,
  ...(doc.blockReason && { blockReason: doc.blockReason }),
  ...(doc.blockedByCompany && { blockedByCompanyId: doc.blockedByCompany.toString() }),
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toSemesterRecord = (doc: ISemesterRecord): SemesterRecord => ({
  id: doc.id,
  studentId: doc.student.toString(),
  semesterNo: doc.semesterNo,
  sgpa: doc.sgpa,
  credits: doc.credits,
  backlogCount: doc.backlogCount,
  subjects: doc.subjects.map((s) => ({ subject: s.subject, gradePoint: s.gradePoint, credits: s.credits })),
  ...(doc.sourceFile && { sourceFile: doc.sourceFile }),
  importedAt: doc.importedAt,
});

const toBacklogHistory = (doc: IBacklogHistory): BacklogHistoryEntry => ({
  id: doc.id,
  studentId: doc.student.toString(),
  ...(doc.semesterNo !== undefined && doc.semesterNo !== null && { semesterNo: doc.semesterNo }),
  oldBacklog: doc.oldBacklog,
  newBacklog: doc.newBacklog,
  trigger: doc.trigger,
  actor: doc.actor,
  ...(doc.note && { note: doc.note }),
  createdAt: doc.createdAt,
});

const toCompany = (doc: ICompany): Company => ({
  id: doc.id,
  name: doc.name,
  eligibleBranches: [...doc.eligibleBranches],
  minCgpa: doc.minCgpa,
  maxBacklogs: doc.maxBacklogs,
  selectionPolicy: doc.selectionPolicy,
  exportTemplate: doc.exportTemplate.map((c) => ({ header: c.header, source: c.source })),
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toApplication = (doc: IApplication): Application => ({
  id: doc.id,
  studentId: doc.student.toString(),
  companyId: doc.company.toString(),
  status: doc.status,
  appliedAt: doc.appliedAt,
  updatedAt: doc.updatedAt,
  ...(doc.exportedAt && { exportedAt: doc.exportedAt }),
  ...(doc.closedReason && { closedReason: doc.closedReason }),
});

const toUser = (doc: IUser): User => ({
  id: doc.id,
  email: doc.email,
  passwordHash: doc.passwordHash,
  role: doc.role,
  ...(doc.student && { studentId: doc.student.toString() }),
  isEmailVerified: doc.isEmailVerified,
  ...(doc.emailVerificationToken && { emailVerificationToken: doc.emailVerificationToken }),
  ...(doc.emailVerificationExpiry && { emailVerificationExpiry: doc.emailVerificationExpiry }),
  emailVerificationAttempts: doc.emailVerificationAttempts,
  createdAt: doc.createdAt,
});

const toNotificationLog = (doc: INotificationLog): NotificationLog => ({
  id: doc.id,
  ...(doc.user && { userId: doc.user.toString() }),
  email: doc.email,
  subject: doc.subject,
  body: doc.body,
  status: doc.status,
  ...(doc.errorMessage && { errorMessage: doc.errorMessage }),
  createdAt: doc.createdAt,
});

/**
 * Splits a patch into `$set` and `$unset` parts: `null` removes the field,
 * `undefined` leaves it untouched.
 */
const buildUpdate = (patch: Record<string, unknown>, keepNull: readonly string[] = []) => {
  const $set: Record<string, unknown> = {};
  const $unset: Record<string, 1> = {};
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    if (value === null && !keepNull.includes(key)) {
      $unset[key] = 1;
    } else {
      $set[key] = value;
    }
  }
  const update: Record<string, Record<string, unknown>> = {};
  if (Object.keys($set).length > 0) update.$set = $set;
  if (Object.keys($unset).length > 0) update.$unset = $unset;
  return update;
};

export class MongoPlacementRepository implements PlacementRepository {
  async createStudent(input: NewStudent): Promise<Student> {
    const doc = await StudentModel.create(input);
    return toStudent(doc);
  }

  async findStudentById(id: string): Promise<Student | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await StudentModel.findById(id);
    return doc ? toStudent(doc) : null;
  }

  async findStudentByRollNo(rollNo: string): Promise<Student | null> {
    const doc = await StudentModel.findOne({ rollNo });
    return doc ? toStudent(doc) : null;
  }

  async findStudentsByIds(ids: readonly string[]): Promise<Student[]> {
    const docs = await StudentModel.find({ _id: { $in: validIds(ids) } });
    return docs.map(toStudent);
  }

  async listStudents(filter: { branch?: string } = {}): Promise<Student[]> {
    const query = filter.branch ? { branch: filter.branch } : {};
    const docs = await StudentModel.find(query).sort({ branch: 1, rollNo: 1 });
    return docs.map(toStudent);
  }

  async updateStudent(id: string, patch: StudentPatch): Promise<Student> {
    if (!isValidObjectId(id)) throw ApiError.notFound('Student not found');
    const { blockedByCompanyId, ...rest } = patch;
    const update = buildUpdate(
      {
        ...rest,
        ...(blockedByCompanyId !== undefined && {
          blockedByCompany: blockedByCompanyId === null ? null : objectId(blockedByCompanyId),
        }),
      },
      ['cgpa']
    );
    const doc = await StudentModel.findByIdAndUpdate(id, update, { new: true, runValidators: true });
    if (!doc) throw ApiError.notFound('Student not found');
    return toStudent(doc);
  }

  async listSemesterRecords(studentId: string): Promise<SemesterRecord[]> {
    if (!isValidObjectId(studentId)) return [];
    const docs = await SemesterRecordModel.find({ student: studentId }).sort({ semesterNo: 1 });
    return docs.map(toSemesterRecord);
  }

  async findSemesterRecord(studentId: string, semesterNo: number): Promise<SemesterRecord | null> {
    if (!isValidObjectId(studentId)) return null;
    const doc = await SemesterRecordModel.findOne({ student: studentId, semesterNo });
    return doc ? toSemesterRecord(doc) : null;
  }

  async replaceSemesterRecord(input: SemesterRecordInput): Promise<SemesterRecord> {
    const { studentId, ...fields } = input;
    const doc = await SemesterRecordModel.findOneAndReplace(
      { student: studentId, semesterNo: input.semesterNo },
      { ...fields, student: objectId(studentId), importedAt: new Date() },
      { upsert: true, new: true, runValidators: true }
    );
    if (!doc) throw ApiError.internal('Failed to store semester record');
    return toSemesterRecord(doc);
  }

  async setSemesterBacklog(studentId: string, semesterNo: number, backlogCount: number): Promise<SemesterRecord> {
    if (!isValidObjectId(studentId)) throw ApiError.notFound('Semester record not found');
    const doc = await SemesterRecordModel.findOneAndUpdate(
      { student: studentId, semesterNo },
      { $set: { backlogCount } },
      { new: true, runValidators: true }
    );
    if (!doc) throw ApiError.notFound('Semester record not found');
    return toSemesterRecord(doc);
  }

  async appendBacklogHistory(entry: NewBacklogHistoryEntry): Promise<BacklogHistoryEntry> {
    const { studentId, ...fields } = entry;
    const doc = await BacklogHistoryModel.create({ ...fields, student: objectId(studentId) });
    return toBacklogHistory(doc);
  }

  async listBacklogHistory(filter: { studentId?: string } = {}): Promise<BacklogHistoryEntry[]> {
    if (filter.studentId !== undefined && !isValidObjectId(filter.studentId)) return [];
    const query = filter.studentId ? { student: filter.studentId } : {};
    const docs = await BacklogHistoryModel.find(query).sort({ createdAt: -1, _id: -1 });
    return docs.map(toBacklogHistory);
  }

  async createCompany(input: NewCompany): Promise<Company> {
    const doc = await CompanyModel.create(input);
    return toCompany(doc);
  }

  async findCompanyById(id: string): Promise<Company | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await CompanyModel.findById(id);
    return doc ? toCompany(doc) : null;
  }

  async findCompanyByName(name: string): Promise<Company | null> {
    const doc = await CompanyModel.findOne({ name });
    return doc ? toCompany(doc) : null;
  }

  async findCompaniesByIds(ids: readonly string[]): Promise<Company[]> {
    const docs = await CompanyModel.find({ _id: { $in: validIds(ids) } });
    return docs.map(toCompany);
  }

  async listCompanies(): Promise<Company[]> {
    const docs = await CompanyModel.find().sort({ name: 1 });
    return docs.map(toCompany);
  }

  async updateCompany(id: string, patch: CompanyPatch): Promise<Company> {
    if (!isValidObjectId(id)) throw ApiError.notFound('Company not found');
    const doc = await CompanyModel.findByIdAndUpdate(id, buildUpdate({ ...patch }), {
      new: true,
      runValidators: true,
    });
    if (!doc) throw ApiError.notFound('Company not found');
    return toCompany(doc);
  }

  async createApplication(input: NewApplication): Promise<Application> {
    const doc = await ApplicationModel.create({
      student: objectId(input.studentId),
      company: objectId(input.companyId),
    });
    return toApplication(doc);
  }

  async findApplicationById(id: string): Promise<Application | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await ApplicationModel.findById(id);
    return doc ? toApplication(doc) : null;
  }

  async findApplication(studentId: string, companyId: string): Promise<Application | null> {
    if (!isValidObjectId(studentId) || !isValidObjectId(companyId)) return null;
    const doc = await ApplicationModel.findOne({ student: studentId, company: companyId });
    return doc ? toApplication(doc) : null;
  }

  async listApplications(filter: ApplicationFilter = {}): Promise<Application[]> {
    // An id that cannot be an ObjectId matches nothing.
    if (filter.studentId !== undefined && !isValidObjectId(filter.studentId)) return [];
    if (filter.companyId !== undefined && !isValidObjectId(filter.companyId)) return [];

    const query: Record<string, unknown> = {};
    if (filter.studentId) query.student = filter.studentId;
    if (filter.companyId) query.company = filter.companyId;
    if (filter.statuses) query.status = { $in: filter.statuses };
    const docs = await ApplicationModel.find(query).sort({ appliedAt: -1 });
    return docs.map(toApplication);
  }

  async updateApplication(id: string, patch: ApplicationPatch): Promise<Application> {
    if (!isValidObjectId(id)) throw ApiError.notFound('Application not found');
    const doc = await ApplicationModel.findByIdAndUpdate(id, buildUpdate({ ...patch }), {
      new: true,
      runValidators: true,
    });
    if (!doc) throw ApiError.notFound('Application not found');
    return toApplication(doc);
  }

  async updateApplications(ids: readonly string[], patch: ApplicationPatch): Promise<void> {
    if (ids.length === 0) return;
    await ApplicationModel.updateMany({ _id: { $in: validIds(ids) } }, buildUpdate({ ...patch }));
  }

  async createUser(input: NewUser): Promise<User> {
    const { studentId, ...fields } = input;
    const doc = await UserModel.create({
      ...fields,
      ...(studentId && { student: objectId(studentId) }),
    });
    return toUser(doc);
  }

  async findUserById(id: string): Promise<User | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await UserModel.findById(id);
    return doc ? toUser(doc) : null;
  }

  async findUserByEmail(email: string): Promise<User | null> {
    const doc = await UserModel.findOne({ email: email.toLowerCase() });
    return doc ? toUser(doc) : null;
  }

  async findUserByStudentId(studentId: string): Promise<User | null> {
    if (!isValidObjectId(studentId)) return null;
    const doc = await UserModel.findOne({ student: studentId });
    return doc ? toUser(doc) : null;
  }

  async updateUser(id: string, patch: UserPatch): Promise<User> {
    if (!isValidObjectId(id)) throw ApiError.notFound('User not found');
    const doc = await UserModel.findByIdAndUpdate(id, buildUpdate({ ...patch }), { new: true });
    if (!doc) throw ApiError.notFound('User not found');
    return toUser(doc);
  }

  async createNotificationLog(input: NewNotificationLog): Promise<NotificationLog> {
    const { userId, ...fields } = input;
    const doc = await NotificationLogModel.create({
      ...fields,
      ...(userId && { user: objectId(userId) }),
    });
    return toNotificationLog(doc);
  }

  async updateNotificationLog(id: string, status: NotificationStatus, errorMessage?: string): Promise<void> {
    await NotificationLogModel.findByIdAndUpdate(id, {
      $set: { status, ...(errorMessage && { errorMessage: errorMessage.slice(0, 1024) }) },
    });
  }
}

const mongoRepository = new MongoPlacementRepository();

export default mongoRepository;
