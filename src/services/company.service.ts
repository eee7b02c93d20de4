import logger from '../config/logger';
import { CompanyPatch, PlacementRepository } from '../repositories/placement.repository';
import { Company, ExportColumn, SelectionPolicy } from '../types';
import { ApiError } from '../utils/ApiError';
import { DEFAULT_MAX_BACKLOGS, SELECTION_POLICY } from '../utils/constants';
import { normalizeBranch } from '../utils/helpers';
import { findTemplateProblems } from './exportTemplate.service';

export interface CompanyInput {
  name: string;
  eligibleBranches?: string[];
  minCgpa?: number;
  maxBacklogs?: number;
  selectionPolicy?: SelectionPolicy;
  exportTemplate?: ExportColumn[];
}

export const normalizeBranches = (branches: readonly string[] | undefined): string[] => {
  const cleaned = (branches ?? []).map(normalizeBranch).filter(Boolean);
  if (cleaned.length === 0 || cleaned.includes('ALL')) return ['ALL'];
  return [...new Set(cleaned)];
};

const normalizeTemplate = (template: readonly ExportColumn[]): ExportColumn[] => {
  const columns = template.map((c) => ({ header: c.header.trim(), source: c.source.trim() }));
  const problems = findTemplateProblems(columns);
  if (problems.length > 0) {
    throw ApiError.badRequest(`Invalid export template: ${problems.join('; ')}`, { problems });
  }
  return columns;
};

export class CompanyService {
  constructor(private readonly repository: PlacementRepository) {}

  async createCompany(input: CompanyInput): Promise<Company> {
    const name = input.name.trim();
    if (await this.repository.findCompanyByName(name)) {
      throw ApiError.conflict(`Company ${name} already exists`);
    }

    const company = await this.repository.createCompany({
      name,
      eligibleBranches: normalizeBranches(input.eligibleBranches),
      minCgpa: input.minCgpa ?? 0,
      maxBacklogs: input.maxBacklogs ?? DEFAULT_MAX_BACKLOGS,
      selectionPolicy: input.selectionPolicy ?? SELECTION_POLICY.NON_BLOCKING,
      exportTemplate: normalizeTemplate(input.exportTemplate ?? []),
    });
    logger.info(`Company ${company.name} created (${company.selectionPolicy})`);
    return company;
  }

  async updateCompany(id: string, input: Partial<CompanyInput>): Promise<Company> {
    const company = await this.getCompany(id);

    const patch: CompanyPatch = {};
    if (input.name !== undefined) {
      const name = input.name.trim();
      const clash = await this.repository.findCompanyByName(name);
      if (clash && clash.id !== company.id) throw ApiError.conflict(`Company ${name} already exists`);
      patch.name = name;
    }
    if (input.eligibleBranches !== undefined) patch.eligibleBranches = normalizeBranches(input.eligibleBranches);
    if (input.minCgpa !== undefined) patch.minCgpa = input.minCgpa;
    if (input.maxBacklogs !== undefined) patch.maxBacklogs = input.maxBacklogs;
    if (input.selectionPolicy !== undefined) patch.selectionPolicy = input.selectionPolicy;
    if (input.exportTemplate !== undefined) patch.exportTemplate = normalizeTemplate(input.exportTemplate);

    return this.repository.updateCompany(id, patch);
  }

  async getCompany(id: string): Promise<Company> {
    const company = await this.repository.findCompanyById(id);
    if (!company) throw ApiError.notFound('Company not found');
    return company;
  }

  async listCompanies(): Promise<Company[]> {
    return this.repository.listCompanies();
  }
}
