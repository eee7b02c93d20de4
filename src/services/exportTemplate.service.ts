import { Application, Company, ExportColumn, Student } from '../types';
import { ApiError } from '../utils/ApiError';
import { CGPA_NO_DATA_LABEL } from '../utils/constants';
import { formatTimestamp } from '../utils/helpers';

export interface ExportRecord {
  student: Student;
  company: Company;
  application?: Application;
}

export type CellValue = string | number;

interface ExportField {
  description: string;
  resolve: (record: ExportRecord) => CellValue;
}

export const EXPORT_FIELDS = {
  'student.roll_no': { description: 'Roll number', resolve: ({ student }) => student.rollNo },
  'student.name': { description: 'Student name', resolve: ({ student }) => student.name },
  'student.branch': { description: 'Branch', resolve: ({ student }) => student.branch },
  'student.cgpa': {
    description: 'Cumulative GPA, or N/A without graded semesters',
    resolve: ({ student }) => student.cgpa ?? CGPA_NO_DATA_LABEL,
  },
  'student.backlogs': { description: 'Total backlogs', resolve: ({ student }) => student.totalBacklogs },
  'student.lateral_entry': {
    description: 'YES for lateral-entry students',
    resolve: ({ student }) => (student.isLateralEntry ? 'YES' : 'NO'),
  },
  'student.current_semester': { description: 'Current semester', resolve: ({ student }) => student.currentSemester },
  'student.resume_link': { description: 'Resume link', resolve: ({ student }) => student.resumeLink ?? '' },
  'student.eligibility_status': {
    description: 'Placement eligibility status',
    resolve: ({ student }) => student.eligibilityStatus,
  },
  'application.status': { description: 'Application status', resolve: ({ application }) => application?.status ?? '' },
  'application.applied_at': {
    description: 'Application time (UTC)',
    resolve: ({ application }) => (application ? formatTimestamp(application.appliedAt) : ''),
  },
  'company.name': { description: 'Company name', resolve: ({ company }) => company.name },
  'company.selection_policy': { description: 'Selection policy', resolve: ({ company }) => company.selectionPolicy },
  'resume.link': { description: 'Resume link', resolve: ({ student }) => student.resumeLink ?? '' },
} satisfies Record<string, ExportField>;

export type ExportSourceKey = keyof typeof EXPORT_FIELDS;

export const isExportSourceKey = (key: string): key is ExportSourceKey =>
  Object.prototype.hasOwnProperty.call(EXPORT_FIELDS, key);

export const DEFAULT_EXPORT_TEMPLATE: readonly ExportColumn[] = [
  { header: 'Roll No', source: 'student.roll_no' },
  { header: 'Name', source: 'student.name' },
  { header: 'Branch', source: 'student.branch' },
  { header: 'CGPA', source: 'student.cgpa' },
  { header: 'Backlogs', source: 'student.backlogs' },
  { header: 'Applied At', source: 'application.applied_at' },
];

export class InvalidTemplateError extends ApiError {
  readonly problems: string[];

  constructor(companyName: string, problems: string[]) {
    super(422, `Invalid export template for ${companyName}: ${problems.join('; ')}`, true, '', { problems });
    this.name = 'InvalidTemplateError';
    this.problems = problems;
  }
}

export const listExportFields = (): Array<{ key: string; description: string }> =>
  Object.entries(EXPORT_FIELDS).map(([key, field]) => ({ key, description: field.description }));

export const findTemplateProblems = (template: readonly ExportColumn[]): string[] => {
  const problems: string[] = [];
  const seen = new Set<string>();
  template.forEach((column, index) => {
    const header = column.header.trim();
    if (!header) {
      problems.push(`column ${index + 1} has an empty header`);
    } else if (seen.has(header)) {
      problems.push(`duplicate header "${header}"`);
    }
    seen.add(header);
    if (!isExportSourceKey(column.source)) {
      problems.push(`unknown source key "${column.source}"`);
    }
  });
  return problems;
};

export const effectiveTemplate = (company: Company): readonly ExportColumn[] =>
  company.exportTemplate.length > 0 ? company.exportTemplate : DEFAULT_EXPORT_TEMPLATE;

export const resolveExportRow = (template: readonly ExportColumn[], record: ExportRecord): CellValue[] => {
  return template.map((column) => {
    if (!isExportSourceKey(column.source)) {
      throw new InvalidTemplateError(record.company.name, [`unknown source key "${column.source}"`]);
    }
    return EXPORT_FIELDS[column.source].resolve(record);
  });
};

export interface ExportTable {
  headers: string[];
  rows: CellValue[][];
}

const compareRecords = (a: ExportRecord, b: ExportRecord): number => {
  if (a.student.rollNo !== b.student.rollNo) return a.student.rollNo < b.student.rollNo ? -1 : 1;
  const aId = a.application?.id ?? '';
  const bId = b.application?.id ?? '';
  if (aId === bId) return 0;
  return aId < bId ? -1 : 1;
};

/**
 * Resolves one company's records through its template. Columns follow the
 * template; rows are ordered by roll number so repeated exports match.
 */
export const buildExportTable = (company: Company, records: readonly ExportRecord[]): ExportTable => {
  const template = effectiveTemplate(company);
  const problems = findTemplateProblems(template);
  if (problems.length > 0) {
    throw new InvalidTemplateError(company.name, problems);
  }

  return {
    headers: template.map((c) => c.header.trim()),
    rows: [...records].sort(compareRecords).map((record) => resolveExportRow(template, record)),
  };
};
