import * as XLSX from 'xlsx';
import logger from '../config/logger';
import { PlacementRepository } from '../repositories/placement.repository';
import { Company } from '../types';
import { ApiError } from '../utils/ApiError';
import { EXCEL_SHEET_NAME_LIMIT } from '../utils/constants';
import { compactTimestamp, sanitizeFilename } from '../utils/helpers';
import { buildExportTable, ExportRecord, ExportTable, InvalidTemplateError } from './exportTemplate.service';

export interface ExportedSheet {
  companyId: string;
  sheetName: string;
  rowCount: number;
}

export interface CompanyExportFailure {
  companyId: string;
  companyName: string;
  message: string;
}

export interface WorkbookExport {
  buffer: Buffer;
  filename: string;
  sheets: ExportedSheet[];
  failures: CompanyExportFailure[];
  /** Applications in the workbook; stamped through `markExported` once it is delivered. */
  applicationIds: string[];
}

export const toSheetName = (name: string, taken: ReadonlySet<string>): string => {
  const base = name.replace(/[\\/?*[\]:]/g, ' ').replace(/\s+/g, ' ').trim() || 'Sheet';
  let candidate = base.slice(0, EXCEL_SHEET_NAME_LIMIT);
  let counter = 2;
  while (taken.has(candidate.toLowerCase())) {
    const suffix = ` (${counter++})`;
    candidate = `${base.slice(0, EXCEL_SHEET_NAME_LIMIT - suffix.length)}${suffix}`;
  }
  return candidate;
};

export class ExportService {
  constructor(private readonly repository: PlacementRepository) {}

  private async collectRecords(company: Company): Promise<ExportRecord[]> {
    const applications = await this.repository.listApplications({ companyId: company.id });
    const students = await this.repository.findStudentsByIds([...new Set(applications.map((a) => a.studentId))]);
    const byId = new Map(students.map((s) => [s.id, s]));

    const records: ExportRecord[] = [];
    for (const application of applications) {
      const student = byId.get(application.studentId);
      if (!student) {
        logger.warn(`Application ${application.id} references missing student ${application.studentId}`);
        continue;
      }
      records.push({ student, company, application });
    }
    return records;
  }

  private async buildCompanyTable(company: Company): Promise<{ table: ExportTable; applicationIds: string[] }> {
    const records = await this.collectRecords(company);
    const table = buildExportTable(company, records);
    const applicationIds = records.flatMap((r) => (r.application ? [r.application.id] : []));
    return { table, applicationIds };
  }

  async markExported(applicationIds: readonly string[]): Promise<void> {
    await this.repository.updateApplications(applicationIds, { exportedAt: new Date() });
  }

  private writeWorkbook(workbook: XLSX.WorkBook): Buffer {
    return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  }

  async exportCompany(companyId: string): Promise<WorkbookExport> {
    const company = await this.repository.findCompanyById(companyId);
    if (!company) throw ApiError.notFound('Company not found');

    const { table, applicationIds } = await this.buildCompanyTable(company);
    const workbook = XLSX.utils.book_new();
    const sheetName = toSheetName(company.name, new Set());
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([table.headers, ...table.rows]), sheetName);
    const buffer = this.writeWorkbook(workbook);
    logger.info(`Exported ${table.rows.length} application(s) for ${company.name}`);

    return {
      buffer,
      filename: sanitizeFilename(`${company.name}_applications_${compactTimestamp(new Date())}.xlsx`),
      sheets: [{ companyId: company.id, sheetName, rowCount: table.rows.length }],
      failures: [],
      applicationIds,
    };
  }

  /**
   * One sheet per company. A company whose template does not resolve is
   * left out and reported; the others are still exported.
   */
  async exportAllCompanies(): Promise<WorkbookExport> {
    const companies = await this.repository.listCompanies();
    if (companies.length === 0) throw ApiError.notFound('No companies to export');

    const workbook = XLSX.utils.book_new();
    const taken = new Set<string>();
    const sheets: ExportedSheet[] = [];
    const failures: CompanyExportFailure[] = [];
    const exportedIds: string[] = [];

    for (const company of companies) {
      try {
        const { table, applicationIds } = await this.buildCompanyTable(company);
        const sheetName = toSheetName(company.name, taken);
        taken.add(sheetName.toLowerCase());
        XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([table.headers, ...table.rows]), sheetName);
        sheets.push({ companyId: company.id, sheetName, rowCount: table.rows.length });
        exportedIds.push(...applicationIds);
      } catch (error) {
        if (!(error instanceof InvalidTemplateError)) throw error;
        logger.warn(error.message);
        failures.push({ companyId: company.id, companyName: company.name, message: error.message });
      }
    }

    if (sheets.length === 0) {
      throw ApiError.unprocessable('No company could be exported', { failures });
    }

    const buffer = this.writeWorkbook(workbook);
    logger.info(`Exported ${sheets.length} company sheet(s), ${failures.length} failed`);

    return {
      buffer,
      filename: `placement_applications_${compactTimestamp(new Date())}.xlsx`,
      sheets,
      failures,
      applicationIds: exportedIds,
    };
  }
}
