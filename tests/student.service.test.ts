import { StudentService } from '../src/services/student.service';
import { MemoryRepository } from './utils/memoryRepository';

describe('StudentService', () => {
  let repository: MemoryRepository;
  let service: StudentService;

  beforeEach(() => {
    repository = new MemoryRepository();
    service = new StudentService(repository);
  });

  it('normalizes roll number and branch', async () => {
    const student = await service.createStudent({ rollNo: ' 21 cs 001 ', name: ' Asha Rao ', branch: 'cse' });
    expect(student).toMatchObject({ rollNo: '21CS001', name: 'Asha Rao', branch: 'CSE', cgpa: null, totalBacklogs: 0 });
    await expect(service.createStudent({ rollNo: '21cs001', name: 'Other', branch: 'CSE' })).rejects.toMatchObject({
      statusCode: 409,
    });
  });

  it('filters the list by branch', async () => {
    await service.createStudent({ rollNo: '21EC001', name: 'Ehsan Ali', branch: 'ECE' });
    await service.createStudent({ rollNo: '21CS002', name: 'Vikram Shah', branch: 'CSE' });
    await service.createStudent({ rollNo: '21CS001', name: 'Asha Rao', branch: 'CSE' });

    expect((await service.listStudents('cse')).map((s) => s.rollNo)).toEqual(['21CS001', '21CS002']);
    expect(await service.listStudents()).toHaveLength(3);
  });

  it('gives a manual block a default reason and no blocking company', async () => {
    const student = await service.createStudent({ rollNo: '21CS001', name: 'Asha Rao', branch: 'CSE' });
    await repository.updateStudent(student.id, { blockedByCompanyId: 'com-9' });

    const blocked = await service.updateEligibilityStatus(student.id, 'BLOCKED_BY_POLICY');
    expect(blocked.blockReason).toBe('Manually blocked by placement policy.');
    expect(blocked.blockedByCompanyId).toBeUndefined();

    const placed = await service.updateEligibilityStatus(student.id, 'EXTERNAL_PLACED', 'Joined Initech');
    expect(placed).toMatchObject({ eligibilityStatus: 'EXTERNAL_PLACED', blockReason: 'Joined Initech' });

    const eligible = await service.updateEligibilityStatus(student.id, 'ELIGIBLE');
    expect(eligible.blockReason).toBeUndefined();
  });

  it('returns the profile with semester records', async () => {
    const student = await service.createStudent({ rollNo: '21CS001', name: 'Asha Rao', branch: 'CSE' });
    await repository.replaceSemesterRecord({
      studentId: student.id,
      semesterNo: 1,
      sgpa: 8,
      credits: 20,
      backlogCount: 0,
      subjects: [],
    });
    const profile = await service.getStudentProfile(student.id);
    expect(profile.semesterRecords.map((r) => r.semesterNo)).toEqual([1]);
    await expect(service.getStudentProfile('missing')).rejects.toMatchObject({ statusCode: 404 });
  });
});
