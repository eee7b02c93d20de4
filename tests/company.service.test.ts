import { CompanyService, normalizeBranches } from '../src/services/company.service';
import { MemoryRepository } from './utils/memoryRepository';

test('normalizeBranches upper-cases, dedupes and collapses ALL', () => {
  expect(normalizeBranches([' cse', 'ECE', 'cse', ''])).toEqual(['CSE', 'ECE']);
  expect(normalizeBranches(['cse', 'all'])).toEqual(['ALL']);
  expect(normalizeBranches(undefined)).toEqual(['ALL']);
});

describe('CompanyService', () => {
  let service: CompanyService;

  beforeEach(() => {
    service = new CompanyService(new MemoryRepository());
  });

  it('applies defaults on create', async () => {
    const company = await service.createCompany({ name: '  Acme  ' });
    expect(company).toMatchObject({
      name: 'Acme',
      eligibleBranches: ['ALL'],
      minCgpa: 0,
      maxBacklogs: 999,
      selectionPolicy: 'NON_BLOCKING',
      exportTemplate: [],
    });
  });

  it('validates the export template when saving', async () => {
    await expect(
      service.createCompany({
        name: 'Acme',
        exportTemplate: [
          { header: 'Roll', source: 'student.roll_no' },
          { header: 'Roll ', source: 'student.phone' },
        ],
      })
    ).rejects.toMatchObject({
      statusCode: 400,
      message: 'Invalid export template: duplicate header "Roll"; unknown source key "student.phone"',
    });
  });

  it('rejects duplicate names on create and update', async () => {
    await service.createCompany({ name: 'Acme' });
    const globex = await service.createCompany({ name: 'Globex' });
    await expect(service.createCompany({ name: 'Acme' })).rejects.toMatchObject({ statusCode: 409 });
    await expect(service.updateCompany(globex.id, { name: 'Acme' })).rejects.toMatchObject({ statusCode: 409 });
  });

  it('updates only the given fields', async () => {
    const acme = await service.createCompany({ name: 'Acme', minCgpa: 6 });
    const updated = await service.updateCompany(acme.id, {
      selectionPolicy: 'BLOCKING',
      eligibleBranches: ['it'],
      exportTemplate: [{ header: ' Roll ', source: 'student.roll_no' }],
    });
    expect(updated).toMatchObject({
      name: 'Acme',
      minCgpa: 6,
      selectionPolicy: 'BLOCKING',
      eligibleBranches: ['IT'],
      exportTemplate: [{ header: 'Roll', source: 'student.roll_no' }],
    });
  });

  it('returns 404 for an unknown company', async () => {
    await expect(service.getCompany('missing')).rejects.toMatchObject({ statusCode: 404 });
  });
});
