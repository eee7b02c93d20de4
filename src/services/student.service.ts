import logger from '../config/logger';
import { PlacementRepository } from '../repositories/placement.repository';
import { EligibilityStatus, SemesterRecord, Student } from '../types';
import { ApiError } from '../utils/ApiError';
import { ELIGIBILITY_STATUS } from '../utils/constants';
import { normalizeBranch, normalizeRollNo } from '../utils/helpers';

export interface CreateStudentInput {
  rollNo: string;
  name: string;
  branch: string;
  isLateralEntry?: boolean;
  currentSemester?: number;
  resumeLink?: string;
  eligibilityStatus?: EligibilityStatus;
  blockReason?: string;
}

export interface StudentProfile {
  student: Student;
  semesterRecords: SemesterRecord[];
}

export class StudentService {
  constructor(private readonly repository: PlacementRepository) {}

  async createStudent(input: CreateStudentInput): Promise<Student> {
    const rollNo = normalizeRollNo(input.rollNo);
    const existing = await this.repository.findStudentByRollNo(rollNo);
    if (existing) throw ApiError.conflict(`Student ${rollNo} already exists`);

    const student = await this.repository.createStudent({
      ...input,
      rollNo,
      name: input.name.trim(),
      branch: normalizeBranch(input.branch),
    });
    logger.info(`Student ${student.rollNo} created`);
    return student;
  }

  async listStudents(branch?: string): Promise<Student[]> {
    return this.repository.listStudents(branch ? { branch: normalizeBranch(branch) } : {});
  }

  async getStudent(id: string): Promise<Student> {
    const student = await this.repository.findStudentById(id);
    if (!student) throw ApiError.notFound('Student not found');
    return student;
  }

  async getStudentProfile(id: string): Promise<StudentProfile> {
    const student = await this.getStudent(id);
    const semesterRecords = await this.repository.listSemesterRecords(id);
    return { student, semesterRecords };
  }

  async updateResumeLink(id: string, resumeLink: string): Promise<Student> {
    await this.getStudent(id);
    return this.repository.updateStudent(id, { resumeLink: resumeLink.trim() });
  }

  /**
   * Coordinator override of a student's eligibility. A manual block keeps
   * no blocking company, so later selection changes never lift it.
   */
  async updateEligibilityStatus(id: string, status: EligibilityStatus, note?: string): Promise<Student> {
    await this.getStudent(id);
    const reason = note?.trim();

    const updated = await this.repository.updateStudent(id, {
      eligibilityStatus: status,
      blockedByCompanyId: null,
      blockReason:
        status === ELIGIBILITY_STATUS.BLOCKED_BY_POLICY ? reason || 'Manually blocked by placement policy.' : reason || null,
    });
    logger.info(`Eligibility of ${updated.rollNo} set to ${status}`);
    return updated;
  }
}
