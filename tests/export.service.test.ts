import * as XLSX from 'xlsx';
import { ExportService, toSheetName } from '../src/services/export.service';
import { InvalidTemplateError } from '../src/services/exportTemplate.service';
import { ApiError } from '../src/utils/ApiError';
import { MemoryRepository } from './utils/memoryRepository';

const readSheets = (buffer: Buffer): Record<string, unknown[][]> => {
  const workbook = XLSX.read(buffer, { type: 'buffer' });
  const sheets: Record<string, unknown[][]> = {};
  for (const name of workbook.SheetNames) {
    sheets[name] = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[name], { header: 1 });
  }
  return sheets;
};

describe('toSheetName', () => {
  it('strips characters Excel rejects and limits the length', () => {
    expect(toSheetName('R&D: Labs [India]/West', new Set())).toBe('R&D Labs India West');
    expect(toSheetName('A'.repeat(40), new Set())).toBe('A'.repeat(31));
  });

  it('suffixes names already taken', () => {
    expect(toSheetName('Acme', new Set(['acme']))).toBe('Acme (2)');
    expect(toSheetName('Acme', new Set(['acme', 'acme (2)']))).toBe('Acme (3)');
  });
});

describe('ExportService', () => {
  let repository: MemoryRepository;
  let service: ExportService;

  const seed = async () => {
    const asha = await repository.createStudent({ rollNo: '21CS001', name: 'Asha Rao', branch: 'CSE' });
    const vikram = await repository.createStudent({ rollNo: '21CS002', name: 'Vikram Shah', branch: 'CSE' });
    await repository.updateStudent(asha.id, { cgpa: 8.4, totalBacklogs: 0 });

    const acme = await repository.createCompany({
      name: 'Acme',
      eligibleBranches: ['ALL'],
      minCgpa: 0,
      maxBacklogs: 999,
      selectionPolicy: 'NON_BLOCKING',
      exportTemplate: [
        { header: 'Roll', source: 'student.roll_no' },
        { header: 'CGPA', source: 'student.cgpa' },
        { header: 'Status', source: 'application.status' },
      ],
    });
    const globex = await repository.createCompany({
      name: 'Globex',
      eligibleBranches: ['ALL'],
      minCgpa: 0,
      maxBacklogs: 999,
      selectionPolicy: 'BLOCKING',
      exportTemplate: [{ header: 'Phone', source: 'student.phone' }],
    });

    await repository.createApplication({ studentId: vikram.id, companyId: acme.id });
    await repository.createApplication({ studentId: asha.id, companyId: acme.id });
    await repository.createApplication({ studentId: asha.id, companyId: globex.id });
    return { acme, globex };
  };

  beforeEach(() => {
    repository = new MemoryRepository();
    service = new ExportService(repository);
  });

  it('exports one company with template columns', async () => {
    const { acme } = await seed();

    const result = await service.exportCompany(acme.id);

    expect(result.filename).toMatch(/^Acme_applications_\d{14}\.xlsx$/);
    expect(result.sheets).toEqual([{ companyId: acme.id, sheetName: 'Acme', rowCount: 2 }]);
    expect(readSheets(result.buffer)).toEqual({
      Acme: [
        ['Roll', 'CGPA', 'Status'],
        ['21CS001', 8.4, 'APPLIED'],
        ['21CS002', 'N/A', 'APPLIED'],
      ],
    });

    const applications = await repository.listApplications({ companyId: acme.id });
    expect([...result.applicationIds].sort()).toEqual(applications.map((a) => a.id).sort());
    expect(applications.every((a) => a.exportedAt === undefined)).toBe(true);
  });

  it('stamps applications once the workbook is delivered', async () => {
    const { acme } = await seed();
    const result = await service.exportCompany(acme.id);

    await service.markExported(result.applicationIds);

    const stamped = await repository.listApplications({ companyId: acme.id });
    expect(stamped).toHaveLength(2);
    expect(stamped.every((a) => a.exportedAt instanceof Date)).toBe(true);
  });

  it('fails a single export with an invalid template', async () => {
    const { globex } = await seed();
    await expect(service.exportCompany(globex.id)).rejects.toBeInstanceOf(InvalidTemplateError);
    await expect(service.exportCompany(globex.id)).rejects.toMatchObject({ statusCode: 422 });

    const applications = await repository.listApplications({ companyId: globex.id });
    expect(applications[0].exportedAt).toBeUndefined();
  });

  it('returns 404 for an unknown company', async () => {
    await expect(service.exportCompany('missing')).rejects.toMatchObject({ statusCode: 404 });
  });

  it('exports every company it can and reports the rest', async () => {
    const { acme, globex } = await seed();

    const result = await service.exportAllCompanies();

    expect(result.sheets).toEqual([{ companyId: acme.id, sheetName: 'Acme', rowCount: 2 }]);
    expect(result.failures).toEqual([
      {
        companyId: globex.id,
        companyName: 'Globex',
        message: 'Invalid export template for Globex: unknown source key "student.phone"',
      },
    ]);
    expect(Object.keys(readSheets(result.buffer))).toEqual(['Acme']);
    const acmeApplications = await repository.listApplications({ companyId: acme.id });
    expect([...result.applicationIds].sort()).toEqual(acmeApplications.map((a) => a.id).sort());
  });

  it('fails when every company template is invalid', async () => {
    const { acme } = await seed();
    await repository.updateCompany(acme.id, { exportTemplate: [{ header: 'Phone', source: 'student.phone' }] });

    await expect(service.exportAllCompanies()).rejects.toBeInstanceOf(ApiError);
    await expect(service.exportAllCompanies()).rejects.toMatchObject({
      statusCode: 422,
      message: 'No company could be exported',
    });
  });

  it('returns 404 when there are no companies at all', async () => {
    await expect(service.exportAllCompanies()).rejects.toMatchObject({
      statusCode: 404,
      message: 'No companies to export',
    });
  });
});
