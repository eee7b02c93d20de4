import { AcademicService } from '../src/services/academic.service';
import { ResultDocumentReader } from '../src/services/pdfTable.service';
import { TextTable } from '../src/services/resultTable.service';
import { MemoryRepository } from './utils/memoryRepository';

class StubReader implements ResultDocumentReader {
  tables: TextTable[] = [];
  readonly paths: string[] = [];

  async readTables(filePath: string): Promise<TextTable[]> {
    this.paths.push(filePath);
    return this.tables;
  }
}

const ACTOR = 'coordinator@test.local';

const sgpaSheet = (...rows: string[][]): TextTable => [['Roll No', 'Name', 'SGPA', 'Backlogs'], ...rows];

describe('AcademicService', () => {
  let repository: MemoryRepository;
  let reader: StubReader;
  let service: AcademicService;

  const importSgpa = (semesterNo: number, semesterCredits?: number, branch = 'cse') =>
    service.importSemesterResults({
      filePath: `/tmp/sem${semesterNo}.pdf`,
      sourceFile: `sem${semesterNo}.pdf`,
      semesterNo,
      branch,
      ...(semesterCredits !== undefined && { semesterCredits }),
      actor: ACTOR,
    });

  const student = async (rollNo: string) => {
    const found = await repository.findStudentByRollNo(rollNo);
    if (!found) throw new Error(`student ${rollNo} not stored`);
    return found;
  };

  beforeEach(() => {
    repository = new MemoryRepository();
    reader = new StubReader();
    service = new AcademicService(repository, reader, { passingGradePoint: 4 });
  });

  describe('importSemesterResults', () => {
    beforeEach(() => {
      reader.tables = [sgpaSheet(['21CS001', 'Asha Rao', '8.0', '0'], ['21cs002', 'Vikram Shah', '6.5', '2'])];
    });

    it('creates unknown students and recomputes their metrics', async () => {
      const summary = await importSgpa(1, 20);

      expect(reader.paths).toEqual(['/tmp/sem1.pdf']);
      expect(summary).toEqual({
        semesterNo: 1,
        branch: 'CSE',
        totalRows: 2,
        processed: 2,
        skipped: 0,
        createdStudents: 2,
        skippedLateral: 0,
        skippedBranch: 0,
        backlogChanges: 1,
        skippedRows: [],
      });

      const asha = await student('21CS001');
      expect(asha).toMatchObject({ name: 'Asha Rao', branch: 'CSE', cgpa: 8, totalBacklogs: 0, currentSemester: 1 });
      const vikram = await student('21CS002');
      expect(vikram).toMatchObject({ cgpa: 6.5, totalBacklogs: 2 });

      const records = await service.getSemesterRecords(vikram.id);
      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({ semesterNo: 1, sgpa: 6.5, credits: 20, backlogCount: 2, sourceFile: 'sem1.pdf' });

      const history = await service.getBacklogHistory();
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({
        studentId: vikram.id,
        semesterNo: 1,
        oldBacklog: 0,
        newBacklog: 2,
        trigger: 'IMPORT',
        actor: ACTOR,
      });
    });

    it('is idempotent when the same sheet is imported again', async () => {
      await importSgpa(1, 20);
      const summary = await importSgpa(1, 20);

      expect(summary).toMatchObject({ processed: 2, createdStudents: 0, backlogChanges: 0 });
      expect((await student('21CS001')).cgpa).toBe(8);
      expect(await service.getBacklogHistory()).toHaveLength(1);
      expect(await service.getSemesterRecords((await student('21CS001')).id)).toHaveLength(1);
    });

    it('accumulates semesters into the CGPA and raises the current semester', async () => {
      await importSgpa(1, 20);
      reader.tables = [sgpaSheet(['21CS001', 'Asha Rao', '7.0', '1'])];
      await importSgpa(2, 20);

      const asha = await student('21CS001');
      expect(asha).toMatchObject({ cgpa: 7.5, totalBacklogs: 1, currentSemester: 2 });

      const history = await service.getBacklogHistory(asha.id);
      expect(history.map((h) => [h.oldBacklog, h.newBacklog, h.semesterNo])).toEqual([[0, 1, 2]]);
    });

    it('skips lateral-entry students before semester 3 and other branches', async () => {
      await repository.createStudent({ rollNo: '21CS050', name: 'Lata Iyer', branch: 'CSE', isLateralEntry: true });
      await repository.createStudent({ rollNo: '21EC001', name: 'Ehsan Ali', branch: 'ECE' });
      reader.tables = [
        sgpaSheet(
          ['21CS001', 'Asha Rao', '8.0', '0'],
          ['21CS050', 'Lata Iyer', '9.0', '0'],
          ['21EC001', 'Ehsan Ali', '7.5', '0']
        ),
      ];

      const summary = await importSgpa(2, 20);

      expect(summary).toMatchObject({ processed: 1, skipped: 2, skippedLateral: 1, skippedBranch: 1, createdStudents: 1 });
      expect(summary.skippedRows).toEqual([
        { rollNo: '21CS050', reason: 'lateral-entry student has no semester 2' },
        { rollNo: '21EC001', reason: 'branch mismatch (student is in ECE)' },
      ]);
      expect((await student('21CS050')).cgpa).toBeNull();
      expect(await service.getSemesterRecords((await student('21EC001')).id)).toEqual([]);
    });

    it('counts failed subjects as backlogs for subject sheets', async () => {
      reader.tables = [
        [
          ['Roll No', 'Name', 'Subject', 'Grade Point', 'Credits'],
          ['21CS001', 'Asha Rao', 'Algorithms', '9', '4'],
          ['21CS001', 'Asha Rao', 'Networks', '3', '4'],
          ['21CS001', 'Asha Rao', 'Networks Lab', '11', '1'],
        ],
      ];

      const summary = await importSgpa(3);

      expect(summary).toMatchObject({ totalRows: 3, processed: 1, skipped: 1, backlogChanges: 1 });
      expect(summary.skippedRows).toEqual([{ table: 1, row: 3, reason: 'invalid grade point "11"' }]);
      const asha = await student('21CS001');
      expect(asha).toMatchObject({ cgpa: 6, totalBacklogs: 1 });
      const [record] = await service.getSemesterRecords(asha.id);
      expect(record).toMatchObject({ sgpa: 6, credits: 8, backlogCount: 1 });
      expect(record.subjects).toEqual([
        { subject: 'Algorithms', gradePoint: 9, credits: 4 },
        { subject: 'Networks', gradePoint: 3, credits: 4 },
      ]);
    });

    it('requires semester credits for SGPA sheets', async () => {
      await expect(importSgpa(1)).rejects.toMatchObject({
        statusCode: 400,
        message: 'Semester credits must be greater than 0 for SGPA-only result sheets',
      });
      await expect(importSgpa(1, 0)).rejects.toMatchObject({ statusCode: 400 });
      expect(await repository.listStudents()).toEqual([]);
    });

    it('rejects a document without usable rows and reports why', async () => {
      reader.tables = [sgpaSheet(['x', 'Nobody', '8.0', '0']), [['Grade', 'Range']]];

      await expect(importSgpa(1, 20)).rejects.toMatchObject({
        statusCode: 400,
        details: {
          totalRows: 1,
          processed: 0,
          skipped: 1,
          skippedRows: [{ table: 1, row: 1, reason: 'invalid roll number "x"' }],
        },
      });
    });
  });

  describe('updateSemesterBacklog', () => {
    beforeEach(async () => {
      reader.tables = [sgpaSheet(['21CS001', 'Asha Rao', '8.0', '0'])];
      await importSgpa(1, 20);
    });

    it('recomputes the total and records a manual entry', async () => {
      const asha = await student('21CS001');

      const outcome = await service.updateSemesterBacklog(asha.id, 1, 2, 'admin@test.local', 'Re-evaluation result');

      expect(outcome.student.totalBacklogs).toBe(2);
      expect(outcome.historyEntry).toMatchObject({
        semesterNo: 1,
        oldBacklog: 0,
        newBacklog: 2,
        trigger: 'MANUAL',
        actor: 'admin@test.local',
        note: 'Re-evaluation result',
      });
    });

    it('writes no history when the total does not change', async () => {
      const asha = await student('21CS001');
      const outcome = await service.updateSemesterBacklog(asha.id, 1, 0, 'admin@test.local');
      expect(outcome.historyEntry).toBeNull();
      expect(await service.getBacklogHistory(asha.id)).toEqual([]);
    });

    it('returns 404 for a semester without a record', async () => {
      const asha = await student('21CS001');
      await expect(service.updateSemesterBacklog(asha.id, 4, 1, 'admin@test.local')).rejects.toMatchObject({
        statusCode: 404,
        message: 'Semester record not found. Import SGPA first.',
      });
      await expect(service.updateSemesterBacklog('missing', 1, 1, 'admin@test.local')).rejects.toMatchObject({
        statusCode: 404,
      });
    });

    it('lists history newest first', async () => {
      const asha = await student('21CS001');
      await service.updateSemesterBacklog(asha.id, 1, 1, 'admin@test.local');
      await service.updateSemesterBacklog(asha.id, 1, 3, 'admin@test.local');

      const history = await service.getBacklogHistory(asha.id);
      expect(history.map((h) => h.newBacklog)).toEqual([3, 1]);
    });
  });
});
