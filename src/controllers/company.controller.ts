import { Request, Response } from 'express';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { companyService } from '../services';
import { listExportFields } from '../services/exportTemplate.service';
import { CreateCompanyBody, UpdateCompanyBody } from '../validators/company.validator';

// List companies
export const listCompanies = asyncHandler(async (_req: Request, res: Response) => {
  const companies = await companyService.listCompanies();
  res.status(200).json(ApiResponse.success('Companies retrieved successfully', companies, { total: companies.length }));
});

// Get company by ID
export const getCompany = asyncHandler(async (req: Request, res: Response) => {
  const company = await companyService.getCompany(req.params.id);
  res.status(200).json(ApiResponse.success('Company retrieved successfully', company));
});

// Create company
export const createCompany = asyncHandler(async (req: Request, res: Response) => {
  const body: CreateCompanyBody = req.body;
  const company = await companyService.createCompany(body);
  res.status(201).json(ApiResponse.success('Company created successfully', company));
});

// Update company
export const updateCompany = asyncHandler(async (req: Request, res: Response) => {
  const body: UpdateCompanyBody = req.body;
  const company = await companyService.updateCompany(req.params.id, body);
  res.status(200).json(ApiResponse.success('Company updated successfully', company));
});

// Source keys available to export templates
export const getExportFields = asyncHandler(async (_req: Request, res: Response) => {
  res.status(200).json(ApiResponse.success('Export fields retrieved successfully', listExportFields()));
});
