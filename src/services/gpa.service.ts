import { SubjectGrade } from '../types';
import { LATERAL_ENTRY_FIRST_SEMESTER } from '../utils/constants';
import { roundTo } from '../utils/helpers';

export interface GradedSemester {
  semesterNo: number;
  sgpa: number;
  credits: number;
}

/**
 * Lateral-entry students join in semester 3; anything recorded for an
 * earlier semester is not theirs to count.
 */
export const isSemesterCounted = (semesterNo: number, isLateralEntry: boolean): boolean => {
  return !isLateralEntry || semesterNo >= LATERAL_ENTRY_FIRST_SEMESTER;
};

/**
 * Credit-weighted average of the counted semesters, rounded to two places.
 * Returns `null` when no semester with positive credits is counted.
 */
export const calculateCgpa = (records: readonly GradedSemester[], isLateralEntry: boolean): number | null => {
  const usable = records.filter((r) => isSemesterCounted(r.semesterNo, isLateralEntry) && r.credits > 0);
  const totalCredits = usable.reduce((sum, r) => sum + r.credits, 0);
  if (totalCredits <= 0) return null;
  const weightedSum = usable.reduce((sum, r) => sum + r.sgpa * r.credits, 0);
  return roundTo(weightedSum / totalCredits, 2);
};

export const calculateTotalBacklogs = (records: ReadonlyArray<{ backlogCount: number }>): number => {
  return records.reduce((sum, r) => sum + Math.max(0, r.backlogCount), 0);
};

export const countFailedSubjects = (subjects: readonly SubjectGrade[], passingGradePoint: number): number => {
  return subjects.filter((s) => s.gradePoint < passingGradePoint).length;
};

export interface SubjectSummary {
  sgpa: number;
  credits: number;
  backlogCount: number;
}

/**
 * Folds one semester's subject grades into its SGPA, credit total and
 * backlog count. Returns `null` when the subjects carry no credits.
 */
export const summarizeSubjects = (
  subjects: readonly SubjectGrade[],
  passingGradePoint: number
): SubjectSummary | null => {
  const credits = subjects.reduce((sum, s) => sum + s.credits, 0);
  if (credits <= 0) return null;
  const weighted = subjects.reduce((sum, s) => sum + s.gradePoint * s.credits, 0);
  return {
    sgpa: roundTo(weighted / credits, 2),
    credits: roundTo(credits, 2),
    backlogCount: countFailedSubjects(subjects, passingGradePoint),
  };
};
