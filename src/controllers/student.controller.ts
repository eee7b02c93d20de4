import { Request, Response } from 'express';
import { ApiError } from '../utils/ApiError';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { academicService, studentService } from '../services';
import {
  BacklogUpdateBody,
  CreateStudentBody,
  EligibilityStatusBody,
  ResumeLinkBody,
} from '../validators/student.validator';

/**
 * @desc    List students, optionally filtered by branch
 * @route   GET /api/v1/students
 * @access  Private (Admin, Coordinator)
 */
export const listStudents = asyncHandler(async (req: Request, res: Response) => {
  const branch = typeof req.query.branch === 'string' ? req.query.branch : undefined;
  const students = await studentService.listStudents(branch);
  res.status(200).json(ApiResponse.success('Students retrieved successfully', students, { total: students.length }));
});

/**
 * @desc    Create a student
 * @route   POST /api/v1/students
 * @access  Private (Admin, Coordinator)
 */
export const createStudent = asyncHandler(async (req: Request, res: Response) => {
  const body: CreateStudentBody = req.body;
  const student = await studentService.createStudent(body);
  res.status(201).json(ApiResponse.success('Student created successfully', student));
});

/**
 * @desc    Get a student with their semester records
 * @route   GET /api/v1/students/:id
 * @access  Private (Staff, or the student)
 */
export const getStudent = asyncHandler(async (req: Request, res: Response) => {
  const profile = await studentService.getStudentProfile(req.params.id);
  res.status(200).json(ApiResponse.success('Student retrieved successfully', profile));
});

/**
 * @desc    Set the resume link
 * @route   PUT /api/v1/students/:id/resume-link
 * @access  Private (Staff, or the student)
 */
export const updateResumeLink = asyncHandler(async (req: Request, res: Response) => {
  const { resumeLink }: ResumeLinkBody = req.body;
  const student = await studentService.updateResumeLink(req.params.id, resumeLink);
  res.status(200).json(ApiResponse.success('Resume link updated successfully', student));
});

/**
 * @desc    Set eligibility status
 * @route   PUT /api/v1/students/:id/eligibility-status
 * @access  Private (Admin, Coordinator)
 */
export const updateEligibilityStatus = asyncHandler(async (req: Request, res: Response) => {
  const { status, note }: EligibilityStatusBody = req.body;
  const student = await studentService.updateEligibilityStatus(req.params.id, status, note);
  res.status(200).json(ApiResponse.success('Eligibility status updated successfully', student));
});

/**
 * @desc    Edit one semester's backlog count and recompute totals
 * @route   PUT /api/v1/students/:id/backlog
 * @access  Private (Admin, Coordinator)
 */
export const updateBacklog = asyncHandler(async (req: Request, res: Response) => {
  if (!req.user) throw ApiError.unauthorized('Authentication required');
  const { semesterNo, backlogCount, note }: BacklogUpdateBody = req.body;
  const outcome = await academicService.updateSemesterBacklog(
    req.params.id,
    semesterNo,
    backlogCount,
    req.user.email,
    note
  );
  res.status(200).json(ApiResponse.success('Backlog updated successfully', outcome));
});

/**
 * @desc    Backlog audit trail of one student, newest first
 * @route   GET /api/v1/students/:id/backlog-history
 * @access  Private (Staff, or the student)
 */
export const getBacklogHistory = asyncHandler(async (req: Request, res: Response) => {
  const history = await academicService.getBacklogHistory(req.params.id);
  res.status(200).json(ApiResponse.success('Backlog history retrieved successfully', history));
});
