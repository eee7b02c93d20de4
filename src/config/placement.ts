import path from 'path';
import { DEFAULT_PASSING_GRADE_POINT } from '../utils/constants';

const parsePassingGradePoint = (raw: string | undefined): number => {
  const value = Number(raw);
  return raw !== undefined && raw.trim() !== '' && Number.isFinite(value) ? value : DEFAULT_PASSING_GRADE_POINT;
};

/** Subjects graded strictly below this count as backlogs. */
export const PASSING_GRADE_POINT = parsePassingGradePoint(process.env.PASSING_GRADE_POINT);

export const UPLOAD_DIR = path.resolve(process.cwd(), process.env.UPLOAD_DIR || 'uploads');
export const PDF_IMPORT_DIR = path.join(UPLOAD_DIR, 'pdf_imports');
