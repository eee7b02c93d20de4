import {
  calculateCgpa,
  calculateTotalBacklogs,
  countFailedSubjects,
  isSemesterCounted,
  summarizeSubjects,
} from '../src/services/gpa.service';

describe('calculateCgpa', () => {
  it('weights each semester by its credits', () => {
    const records = [
      { semesterNo: 1, sgpa: 8.0, credits: 20 },
      { semesterNo: 2, sgpa: 7.0, credits: 20 },
    ];
    expect(calculateCgpa(records, false)).toBe(7.5);
  });

  it('ignores semesters before 3 for lateral-entry students', () => {
    const records = [
      { semesterNo: 2, sgpa: 9.0, credits: 20 },
      { semesterNo: 3, sgpa: 7.0, credits: 20 },
    ];
    expect(calculateCgpa(records, true)).toBe(7.0);
    expect(calculateCgpa(records, false)).toBe(8.0);
  });

  it('returns null when nothing counts', () => {
    expect(calculateCgpa([], false)).toBeNull();
    expect(calculateCgpa([{ semesterNo: 1, sgpa: 8.2, credits: 22 }], true)).toBeNull();
    expect(calculateCgpa([{ semesterNo: 4, sgpa: 8.2, credits: 0 }], false)).toBeNull();
  });

  it('skips records without positive credits', () => {
    const records = [
      { semesterNo: 1, sgpa: 6.0, credits: 0 },
      { semesterNo: 2, sgpa: 8.0, credits: -5 },
      { semesterNo: 3, sgpa: 9.0, credits: 24 },
    ];
    expect(calculateCgpa(records, false)).toBe(9);
  });

  it('rounds to two decimals', () => {
    const records = [
      { semesterNo: 1, sgpa: 8.0, credits: 20 },
      { semesterNo: 2, sgpa: 7.0, credits: 20 },
      { semesterNo: 3, sgpa: 7.0, credits: 20 },
    ];
    expect(calculateCgpa(records, false)).toBe(7.33);
  });
});

test('isSemesterCounted only drops early semesters of lateral entries', () => {
  expect(isSemesterCounted(1, false)).toBe(true);
  expect(isSemesterCounted(2, true)).toBe(false);
  expect(isSemesterCounted(3, true)).toBe(true);
});

test('calculateTotalBacklogs sums non-negative counts', () => {
  expect(calculateTotalBacklogs([{ backlogCount: 2 }, { backlogCount: 0 }, { backlogCount: 1 }])).toBe(3);
  expect(calculateTotalBacklogs([{ backlogCount: -4 }, { backlogCount: 1 }])).toBe(1);
  expect(calculateTotalBacklogs([])).toBe(0);
});

describe('subject grades', () => {
  const subjects = [
    { subject: 'Mathematics', gradePoint: 9, credits: 4 },
    { subject: 'Physics', gradePoint: 3, credits: 3 },
    { subject: 'Workshop', gradePoint: 4, credits: 1 },
  ];

  it('counts grades below the passing point as backlogs', () => {
    expect(countFailedSubjects(subjects, 4)).toBe(1);
    expect(countFailedSubjects(subjects, 5)).toBe(2);
  });

  it('summarizes a semester', () => {
    // (36 + 9 + 4) / 8 = 6.125
    expect(summarizeSubjects(subjects, 4)).toEqual({ sgpa: 6.13, credits: 8, backlogCount: 1 });
  });

  it('returns null without credits', () => {
    expect(summarizeSubjects([], 4)).toBeNull();
  });
});
