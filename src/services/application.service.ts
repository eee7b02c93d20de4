import logger from '../config/logger';
import { ApplicationFilter, PlacementRepository } from '../repositories/placement.repository';
import { Application, ApplicationStatus, Company, Student } from '../types';
import { ApiError } from '../utils/ApiError';
import {
  APPLICATION_STATUS,
  ELIGIBILITY_STATUS,
  OPEN_APPLICATION_STATUSES,
  SELECTION_POLICY,
} from '../utils/constants';
import { EmailService } from './email.service';

export interface EligibilityDecision {
  eligible: boolean;
  reason: string;
}

/**
 * Decides whether a student may apply to a company: eligibility status
 * first, then the company's branch, CGPA and backlog constraints.
 */
export const evaluateEligibility = (
  student: Student,
  company: Company,
  blockingCompany?: Company | null
): EligibilityDecision => {
  switch (student.eligibilityStatus) {
    case ELIGIBILITY_STATUS.EXTERNAL_PLACED:
      return { eligible: false, reason: 'Student is marked as already placed externally.' };
    case ELIGIBILITY_STATUS.EXTERNAL_INTERN:
      return { eligible: false, reason: 'Student is marked as already interned externally.' };
    case ELIGIBILITY_STATUS.CAMPUS_INTERN:
      return { eligible: false, reason: 'Student is marked as already interned via campus placement.' };
    case ELIGIBILITY_STATUS.BLOCKED_BY_POLICY:
      return {
        eligible: false,
        reason: student.blockReason || `Blocked after selection in ${blockingCompany?.name ?? 'a blocking company'}.`,
      };
    case ELIGIBILITY_STATUS.ELIGIBLE:
      break;
  }

  const branches = company.eligibleBranches;
  if (!branches.includes('ALL') && !branches.includes(student.branch.toUpperCase())) {
    return { eligible: false, reason: `${student.branch} is not eligible for ${company.name}` };
  }
  if (company.minCgpa > 0 && student.cgpa === null) {
    return { eligible: false, reason: `No CGPA on record; ${company.name} requires ${company.minCgpa}` };
  }
  if (student.cgpa !== null && student.cgpa < company.minCgpa) {
    return { eligible: false, reason: `CGPA ${student.cgpa} is below min ${company.minCgpa}` };
  }
  if (student.totalBacklogs > company.maxBacklogs) {
    return { eligible: false, reason: `Backlogs ${student.totalBacklogs} exceed max ${company.maxBacklogs}` };
  }
  return { eligible: true, reason: 'Eligible' };
};

export interface StatusUpdateResult {
  application: Application;
  student: Student;
  closedApplications: number;
  notified: boolean;
}

export class ApplicationService {
  constructor(
    private readonly repository: PlacementRepository,
    private readonly emailService: EmailService
  ) {}

  private async requireStudent(id: string): Promise<Student> {
    const student = await this.repository.findStudentById(id);
    if (!student) throw ApiError.notFound('Student not found');
    return student;
  }

  private async requireCompany(id: string): Promise<Company> {
    const company = await this.repository.findCompanyById(id);
    if (!company) throw ApiError.notFound('Company not found');
    return company;
  }

  private async decide(student: Student, company: Company): Promise<EligibilityDecision> {
    const blockingCompany = student.blockedByCompanyId
      ? await this.repository.findCompanyById(student.blockedByCompanyId)
      : null;
    return evaluateEligibility(student, company, blockingCompany);
  }

  async apply(studentId: string, companyId: string): Promise<Application> {
    const [student, company] = await Promise.all([this.requireStudent(studentId), this.requireCompany(companyId)]);

    const decision = await this.decide(student, company);
    if (!decision.eligible) {
      throw ApiError.badRequest(`Application blocked: ${decision.reason}`);
    }
    if (await this.repository.findApplication(student.id, company.id)) {
      throw ApiError.conflict('Student already applied to this company.');
    }
    if (!student.resumeLink) {
      throw ApiError.badRequest('No resume link found for this student. Add resume link first.');
    }

    const application = await this.repository.createApplication({ studentId: student.id, companyId: company.id });
    logger.info(`${student.rollNo} applied to ${company.name}`);
    return application;
  }

  async listApplications(filter: ApplicationFilter = {}): Promise<Application[]> {
    return this.repository.listApplications(filter);
  }

  async getApplication(id: string): Promise<Application> {
    const application = await this.repository.findApplicationById(id);
    if (!application) throw ApiError.notFound('Application not found');
    return application;
  }

  private async selectedBlockingApplications(studentId: string): Promise<Array<{ application: Application; company: Company }>> {
    const selected = await this.repository.listApplications({
      studentId,
      statuses: [APPLICATION_STATUS.SELECTED],
    });
    const companies = await this.repository.findCompaniesByIds(selected.map((a) => a.companyId));
    const byId = new Map(companies.map((c) => [c.id, c]));
    return selected.flatMap((application) => {
      const company = byId.get(application.companyId);
      return company && company.selectionPolicy === SELECTION_POLICY.BLOCKING ? [{ application, company }] : [];
    });
  }

  /**
   * Brings the student's eligibility in line with their blocking
   * selections: blocked while one exists, released when the last one is
   * withdrawn. Manual blocks carry no company and are left alone.
   */
  private async syncBlockingStatus(student: Student): Promise<Student> {
    const blocking = await this.selectedBlockingApplications(student.id);
    if (blocking.length > 0) {
      const latest = blocking.reduce((a, b) => (b.application.appliedAt > a.application.appliedAt ? b : a));
      return this.repository.updateStudent(student.id, {
        eligibilityStatus: ELIGIBILITY_STATUS.BLOCKED_BY_POLICY,
        blockedByCompanyId: latest.company.id,
        blockReason: `Selected in blocking company: ${latest.company.name}`,
      });
    }
    if (student.eligibilityStatus === ELIGIBILITY_STATUS.BLOCKED_BY_POLICY && student.blockedByCompanyId) {
      logger.info(`Blocking selection for ${student.rollNo} withdrawn, eligibility restored`);
      return this.repository.updateStudent(student.id, {
        eligibilityStatus: ELIGIBILITY_STATUS.ELIGIBLE,
        blockedByCompanyId: null,
        blockReason: null,
      });
    }
    return student;
  }

  async updateStatus(applicationId: string, status: ApplicationStatus, actor: string): Promise<StatusUpdateResult> {
    const application = await this.getApplication(applicationId);
    if (application.status === APPLICATION_STATUS.CLOSED) {
      throw ApiError.badRequest(`Application is closed: ${application.closedReason ?? 'closed by selection policy'}`);
    }
    if (status === APPLICATION_STATUS.CLOSED) {
      throw ApiError.badRequest('Applications are only closed by the selection policy');
    }

    const [student, company] = await Promise.all([
      this.requireStudent(application.studentId),
      this.requireCompany(application.companyId),
    ]);
    const blockingSelection = status === APPLICATION_STATUS.SELECTED && company.selectionPolicy === SELECTION_POLICY.BLOCKING;

    // A student holds at most one blocking selection
    if (blockingSelection) {
      const existing = (await this.selectedBlockingApplications(student.id)).find(
        (s) => s.application.id !== application.id
      );
      if (existing) {
        throw ApiError.conflict(`${student.rollNo} is already selected in blocking company ${existing.company.name}`);
      }
    }

    const updated = await this.repository.updateApplication(application.id, { status });

    let closedApplications = 0;
    if (blockingSelection) {
      const open = await this.repository.listApplications({
        studentId: student.id,
        statuses: OPEN_APPLICATION_STATUSES,
      });
      const toClose = open.filter((a) => a.id !== application.id).map((a) => a.id);
      await this.repository.updateApplications(toClose, {
        status: APPLICATION_STATUS.CLOSED,
        closedReason: `Closed after selection in blocking company ${company.name}`,
      });
      closedApplications = toClose.length;
      if (closedApplications > 0) {
        logger.info(`Closed ${closedApplications} open application(s) of ${student.rollNo} after selection in ${company.name}`);
      }
    }

    const syncedStudent = await this.syncBlockingStatus(student);
    logger.info(`Application ${application.id} of ${student.rollNo} at ${company.name} set to ${status} by ${actor}`);

    // Students imported without an account get no email
    const user = await this.repository.findUserByStudentId(student.id);
    const notified = user ? await this.emailService.sendApplicationStatusEmail(user, student, company, updated) : false;

    return { application: updated, student: syncedStudent, closedApplications, notified };
  }
}
