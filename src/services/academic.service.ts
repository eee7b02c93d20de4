import logger from '../config/logger';
import { PASSING_GRADE_POINT } from '../config/placement';
import { PlacementRepository } from '../repositories/placement.repository';
import { BacklogHistoryEntry, BacklogTrigger, SemesterRecord, Student, SubjectGrade } from '../types';
import { ApiError } from '../utils/ApiError';
import { BACKLOG_TRIGGER } from '../utils/constants';
import { normalizeBranch } from '../utils/helpers';
import { calculateCgpa, calculateTotalBacklogs, isSemesterCounted, summarizeSubjects } from './gpa.service';
import { ResultDocumentReader } from './pdfTable.service';
import { ExtractedResult, parseResultTables } from './resultTable.service';

export interface RecomputeContext {
  actor: string;
  trigger: BacklogTrigger;
  semesterNo?: number;
  note?: string;
}

export interface RecomputeOutcome {
  student: Student;
  historyEntry: BacklogHistoryEntry | null;
}

export interface ImportRequest {
  filePath: string;
  sourceFile?: string;
  semesterNo: number;
  branch: string;
  /** Credit weight for documents that only list an SGPA per student. */
  semesterCredits?: number;
  actor: string;
}

export interface ImportSkip {
  reason: string;
  rollNo?: string;
  table?: number;
  row?: number;
}

export interface ImportSummary {
  semesterNo: number;
  branch: string;
  totalRows: number;
  processed: number;
  skipped: number;
  createdStudents: number;
  skippedLateral: number;
  skippedBranch: number;
  backlogChanges: number;
  skippedRows: ImportSkip[];
}

interface StudentResults {
  rollNo: string;
  name: string;
  sgpa?: { value: number; backlogs: number };
  subjects: SubjectGrade[];
}

interface SemesterFigures {
  sgpa: number;
  credits: number;
  backlogCount: number;
  subjects: SubjectGrade[];
}

export interface AcademicServiceOptions {
  passingGradePoint?: number;
}

const groupByRollNo = (results: readonly ExtractedResult[], skips: ImportSkip[]): StudentResults[] => {
  const groups = new Map<string, StudentResults>();
  for (const result of results) {
    let group = groups.get(result.rollNo);
    if (!group) {
      group = { rollNo: result.rollNo, name: result.name, subjects: [] };
      groups.set(result.rollNo, group);
    }
    if (!group.name && result.name) group.name = result.name;

    if (result.layout === 'SUBJECT') {
      group.subjects.push({ subject: result.subject, gradePoint: result.gradePoint, credits: result.credits });
    } else if (group.sgpa) {
      skips.push({ rollNo: result.rollNo, reason: 'duplicate SGPA row' });
    } else {
      group.sgpa = { value: result.sgpa, backlogs: result.backlogs };
    }
  }
  return [...groups.values()].sort((a, b) => (a.rollNo < b.rollNo ? -1 : a.rollNo > b.rollNo ? 1 : 0));
};

export class AcademicService {
  private readonly passingGradePoint: number;

  constructor(
    private readonly repository: PlacementRepository,
    private readonly reader: ResultDocumentReader,
    options: AcademicServiceOptions = {}
  ) {
    this.passingGradePoint = options.passingGradePoint ?? PASSING_GRADE_POINT;
  }

  /**
   * Recomputes CGPA and backlog total from the stored semester records and
   * appends one audit entry when the backlog total moved.
   */
  async recomputeStudentMetrics(studentId: string, context: RecomputeContext): Promise<RecomputeOutcome> {
    const student = await this.repository.findStudentById(studentId);
    if (!student) throw ApiError.notFound('Student not found');

    const records = await this.repository.listSemesterRecords(studentId);
    const cgpa = calculateCgpa(records, student.isLateralEntry);
    const totalBacklogs = calculateTotalBacklogs(records);

    const updated = await this.repository.updateStudent(studentId, { cgpa, totalBacklogs });

    let historyEntry: BacklogHistoryEntry | null = null;
    if (totalBacklogs !== student.totalBacklogs) {
      historyEntry = await this.repository.appendBacklogHistory({
        studentId,
        ...(context.semesterNo !== undefined && { semesterNo: context.semesterNo }),
        oldBacklog: student.totalBacklogs,
        newBacklog: totalBacklogs,
        trigger: context.trigger,
        actor: context.actor,
        ...(context.note && { note: context.note }),
      });
      logger.info(
        `Backlogs for ${student.rollNo} changed ${student.totalBacklogs} -> ${totalBacklogs} (${context.trigger} by ${context.actor})`
      );
    }

    return { student: updated, historyEntry };
  }

  private figuresFor(group: StudentResults, semesterCredits: number | undefined): SemesterFigures | null {
    if (group.subjects.length > 0) {
      const summary = summarizeSubjects(group.subjects, this.passingGradePoint);
      return summary && { ...summary, subjects: group.subjects };
    }
    if (group.sgpa && semesterCredits !== undefined) {
      return { sgpa: group.sgpa.value, credits: semesterCredits, backlogCount: group.sgpa.backlogs, subjects: [] };
    }
    return null;
  }

  async importSemesterResults(request: ImportRequest): Promise<ImportSummary> {
    const branch = normalizeBranch(request.branch);
    const tables = await this.reader.readTables(request.filePath);
    const parsed = parseResultTables(tables);

    const skippedRows: ImportSkip[] = parsed.skipped.map((s) => ({ table: s.table, row: s.row, reason: s.reason }));
    const summary: ImportSummary = {
      semesterNo: request.semesterNo,
      branch,
      totalRows: parsed.totalRows,
      processed: 0,
      skipped: 0,
      createdStudents: 0,
      skippedLateral: 0,
      skippedBranch: 0,
      backlogChanges: 0,
      skippedRows,
    };

    if (parsed.results.length === 0) {
      summary.skipped = skippedRows.length;
      throw ApiError.badRequest(
        'No valid rows found. The document needs Roll and SGPA columns, or Roll, Subject, Grade Point and Credit columns.',
        summary
      );
    }

    const groups = groupByRollNo(parsed.results, skippedRows);
    const needsCredits = groups.some((g) => g.subjects.length === 0);
    const semesterCredits =
      request.semesterCredits !== undefined && request.semesterCredits > 0 ? request.semesterCredits : undefined;
    if (needsCredits && semesterCredits === undefined) {
      throw ApiError.badRequest('Semester credits must be greater than 0 for SGPA-only result sheets');
    }

    for (const group of groups) {
      const figures = this.figuresFor(group, semesterCredits);
      if (!figures) {
        skippedRows.push({ rollNo: group.rollNo, reason: 'no credited subjects' });
        continue;
      }

      let student = await this.repository.findStudentByRollNo(group.rollNo);
      // Unknown roll numbers join the import's branch
      if (!student) {
        student = await this.repository.createStudent({
          rollNo: group.rollNo,
          name: group.name || group.rollNo,
          branch,
          currentSemester: request.semesterNo,
        });
        summary.createdStudents += 1;
      }

      if (student.branch !== branch) {
        summary.skippedBranch += 1;
        skippedRows.push({ rollNo: group.rollNo, reason: `branch mismatch (student is in ${student.branch})` });
        continue;
      }
      if (!isSemesterCounted(request.semesterNo, student.isLateralEntry)) {
        summary.skippedLateral += 1;
        skippedRows.push({ rollNo: group.rollNo, reason: `lateral-entry student has no semester ${request.semesterNo}` });
        continue;
      }

      await this.repository.replaceSemesterRecord({
        studentId: student.id,
        semesterNo: request.semesterNo,
        ...figures,
        ...(request.sourceFile && { sourceFile: request.sourceFile }),
      });
      if (student.currentSemester < request.semesterNo) {
        await this.repository.updateStudent(student.id, { currentSemester: request.semesterNo });
      }

      const outcome = await this.recomputeStudentMetrics(student.id, {
        actor: request.actor,
        trigger: BACKLOG_TRIGGER.IMPORT,
        semesterNo: request.semesterNo,
      });
      if (outcome.historyEntry) summary.backlogChanges += 1;
      summary.processed += 1;
    }

    summary.skipped = skippedRows.length;
    logger.info(
      `Imported semester ${request.semesterNo} results for ${branch}: ${summary.processed} processed, ${summary.skipped} skipped, ${summary.createdStudents} new students`
    );
    return summary;
  }

  async updateSemesterBacklog(
    studentId: string,
    semesterNo: number,
    backlogCount: number,
    actor: string,
    note?: string
  ): Promise<RecomputeOutcome> {
    const student = await this.repository.findStudentById(studentId);
    if (!student) throw ApiError.notFound('Student not found');
    const record = await this.repository.findSemesterRecord(studentId, semesterNo);
    if (!record) throw ApiError.notFound('Semester record not found. Import SGPA first.');

    await this.repository.setSemesterBacklog(studentId, semesterNo, backlogCount);
    return this.recomputeStudentMetrics(studentId, {
      actor,
      trigger: BACKLOG_TRIGGER.MANUAL,
      semesterNo,
      ...(note && { note }),
    });
  }

  async getSemesterRecords(studentId: string): Promise<SemesterRecord[]> {
    return this.repository.listSemesterRecords(studentId);
  }

  async getBacklogHistory(studentId?: string): Promise<BacklogHistoryEntry[]> {
    if (studentId !== undefined) {
      const student = await this.repository.findStudentById(studentId);
      if (!student) throw ApiError.notFound('Student not found');
      return this.repository.listBacklogHistory({ studentId });
    }
    return this.repository.listBacklogHistory();
  }
}
