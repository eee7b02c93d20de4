import { MAX_GRADE_POINT } from '../utils/constants';
import { normalizeRollNo } from '../utils/helpers';

export type TextTable = string[][];

export type ResultLayout = 'SGPA' | 'SUBJECT';

export interface SgpaResult {
  layout: 'SGPA';
  rollNo: string;
  name: string;
  sgpa: number;
  backlogs: number;
}

export interface SubjectResult {
  layout: 'SUBJECT';
  rollNo: string;
  name: string;
  subject: string;
  gradePoint: number;
  credits: number;
}

export type ExtractedResult = SgpaResult | SubjectResult;

export interface SkippedRow {
  table: number;
  row: number;
  reason: string;
}

export interface ParsedResultTables {
  results: ExtractedResult[];
  skipped: SkippedRow[];
  totalRows: number;
  tablesRecognized: number;
}

interface ColumnMap {
  layout: ResultLayout;
  roll: number;
  name?: number;
  sgpa?: number;
  backlog?: number;
  subject?: number;
  gradePoint?: number;
  credits?: number;
}

// At least five characters, e.g. 21CS001 or 21/CS/001
const ROLL_NO_PATTERN = /^[A-Z0-9][A-Z0-9/-]{4,}$/;
const GRADE_PATTERN = /^\d{1,2}(?:\.\d{1,2})?$/;
const CREDIT_PATTERN = /^\d+(?:\.\d+)?$/;

const findColumn = (header: string[], test: (cell: string) => boolean, exclude: Array<number | undefined> = []) => {
  const index = header.findIndex((cell, i) => !exclude.includes(i) && test(cell));
  return index === -1 ? undefined : index;
};

export const detectColumns = (headerRow: readonly string[]): ColumnMap | null => {
  const header = headerRow.map((c) => c.trim().toLowerCase());
  const roll = findColumn(header, (c) => c.includes('roll') || c.includes('enroll'));
  if (roll === undefined) return null;

  const sgpa = findColumn(header, (c) => c.includes('sgpa'));
  const subject = findColumn(header, (c) => c.includes('subject') || c.includes('course'), [roll]);
  const name = findColumn(header, (c) => c.includes('name'), [roll, subject]);

  if (sgpa !== undefined) {
    return {
      layout: 'SGPA',
      roll,
      sgpa,
      name,
      backlog: findColumn(header, (c) => c.includes('backlog') || /\bkt\b/.test(c)),
    };
  }

  const gradePoint = findColumn(header, (c) => /grade\s*points?|\bgp\b/.test(c));
  const credits = findColumn(header, (c) => c.includes('credit'));
  if (subject !== undefined && gradePoint !== undefined && credits !== undefined) {
    return { layout: 'SUBJECT', roll, name, subject, gradePoint, credits };
  }
  return null;
};

export const isResultHeader = (row: readonly string[]): boolean => detectColumns(row) !== null;

const cellAt = (row: readonly string[], index: number | undefined): string => {
  if (index === undefined || index >= row.length) return '';
  return (row[index] ?? '').trim();
};

const parseGrade = (raw: string): number | null => {
  if (!GRADE_PATTERN.test(raw)) return null;
  const value = Number(raw);
  return value <= MAX_GRADE_POINT ? value : null;
};

type RowOutcome = { result: ExtractedResult } | { reason: string };

const parseRow = (row: readonly string[], columns: ColumnMap): RowOutcome => {
  const rawRoll = cellAt(row, columns.roll);
  if (!rawRoll) return { reason: 'missing roll number' };
  const rollNo = normalizeRollNo(rawRoll);
  if (!ROLL_NO_PATTERN.test(rollNo)) return { reason: `invalid roll number "${rawRoll}"` };
  const name = cellAt(row, columns.name);

  if (columns.layout === 'SGPA') {
    const rawSgpa = cellAt(row, columns.sgpa);
    if (!rawSgpa) return { reason: 'missing SGPA' };
    const sgpa = parseGrade(rawSgpa);
    if (sgpa === null) return { reason: `invalid SGPA "${rawSgpa}"` };
    const rawBacklog = cellAt(row, columns.backlog);
    // No backlog column means none reported
    const backlogs = /^\d+$/.test(rawBacklog) ? parseInt(rawBacklog, 10) : 0;
    return { result: { layout: 'SGPA', rollNo, name, sgpa, backlogs } };
  }

  const subject = cellAt(row, columns.subject);
  if (!subject) return { reason: 'missing subject' };
  const rawGrade = cellAt(row, columns.gradePoint);
  const gradePoint = parseGrade(rawGrade);
  if (gradePoint === null) return { reason: `invalid grade point "${rawGrade}"` };
  const rawCredits = cellAt(row, columns.credits);
  const credits = CREDIT_PATTERN.test(rawCredits) ? Number(rawCredits) : 0;
  if (credits <= 0) return { reason: `invalid credits "${rawCredits}"` };
  return { result: { layout: 'SUBJECT', rollNo, name, subject, gradePoint, credits } };
};

/**
 * Turns extracted text tables into result tuples. The first row of each
 * table is its header; tables whose header is not a recognised result
 * layout are ignored. Unusable rows are reported, never fatal.
 */
export const parseResultTables = (tables: readonly TextTable[]): ParsedResultTables => {
  const parsed: ParsedResultTables = { results: [], skipped: [], totalRows: 0, tablesRecognized: 0 };

  tables.forEach((table, tableIndex) => {
    if (table.length < 2) return;
    const columns = detectColumns(table[0]);
    if (!columns) return;
    parsed.tablesRecognized += 1;

    table.slice(1).forEach((row, rowIndex) => {
      if (row.every((cell) => !cell || !cell.trim())) return;
      parsed.totalRows += 1;
      const outcome = parseRow(row, columns);
      if ('result' in outcome) {
        parsed.results.push(outcome.result);
      } else {
        parsed.skipped.push({ table: tableIndex + 1, row: rowIndex + 1, reason: outcome.reason });
      }
    });
  });

  return parsed;
};
