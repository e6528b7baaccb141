import {
  calculateCgpa,
  classify,
  evaluateProgramStanding,
  NO_ACTIVE_OR_COMPLETED_PROGRAM,
  NO_SEMESTERS_FOUND,
  NO_VALID_GRADES,
  roundTo2,
  standingLabel,
  type SemesterInput,
} from './cgpa.js';
import { attempt, program, semester } from '../test/builders.js';

describe('calculateCgpa', () => {
  const semesters: SemesterInput[] = [
    { id: 1, term: '2023-08', attempts: [attempt({ grade: 'A', credits: 3 }), attempt({ grade: 'C', credits: 3 })] },
    { id: 2, term: '2024-02', attempts: [attempt({ grade: 'B+', credits: 4 }), attempt({ grade: 'F', credits: 2 })] },
  ];

  it('folds a running CGPA over semesters', () => {
    const { records, finalCgpa } = calculateCgpa(semesters);

    expect(records).toHaveLength(2);
    expect(records[0].gpa).toBeCloseTo((4 * 3 + 2.33 * 3) / 6, 10);
    expect(records[0].cgpa).toBeCloseTo(records[0].gpa, 10);
    expect(records[1].gpa).toBeCloseTo((3.67 * 4) / 6, 10);
    expect(finalCgpa).toBeCloseTo((12 + 6.99 + 14.68) / 12, 10);
    expect(records[1].creditsCompleted).toBe(4);
  });

  it('gives the same result when replayed', () => {
    const first = calculateCgpa(semesters).records.map(r => r.cgpa);
    const second = calculateCgpa(semesters).records.map(r => r.cgpa);
    expect(second).toEqual(first);
  });

  it('returns 0 with no semesters', () => {
    expect(calculateCgpa([])).toEqual({ records: [], finalCgpa: 0 });
  });
});

describe('classify', () => {
  it('classifies a CGPA of exactly 3.50 as Distinction', () => {
    expect(classify(3.5)).toBe('Distinction');
  });

  it('rounds before comparing to thresholds', () => {
    expect(classify(3.499)).toBe('Distinction');
    expect(classify(2.996)).toBe('Merit');
    expect(classify(1.694)).toBe('Failed');
    expect(classify(1.696)).toBe('Pass');
  });

  it('uses the band thresholds', () => {
    expect(classify(4)).toBe('Distinction');
    expect(classify(3.2)).toBe('Merit');
    expect(classify(2.1)).toBe('Pass');
    expect(classify(0.5)).toBe('Failed');
  });

  it('reports no valid grades for a CGPA of exactly 0', () => {
    expect(classify(0)).toBe(NO_VALID_GRADES);
  });

  it('roundTo2 rounds to two places', () => {
    expect(roundTo2(2.532)).toBe(2.53);
    expect(roundTo2(3.499)).toBe(3.5);
  });
});

describe('evaluateProgramStanding', () => {
  it('classifies the selected program', () => {
    const standing = evaluateProgramStanding([
      program(1, [semester(1, [attempt({ grade: 'A' })])]),
    ]);

    expect(standing.kind).toBe('classified');
    expect(standingLabel(standing)).toBe('Distinction');
  });

  it('reports no valid grades when only EXP and NM were recorded', () => {
    const standing = evaluateProgramStanding([
      program(1, [
        semester(1, [attempt({ grade: 'EXP' }), attempt({ grade: 'NM' })]),
        semester(2, [attempt({ grade: 'nm' })]),
      ]),
    ]);

    expect(standing.kind).toBe('no-valid-grades');
    if (standing.kind === 'no-valid-grades') {
      expect(standing.records[1].cgpa).toBe(0);
    }
    expect(standingLabel(standing)).toBe(NO_VALID_GRADES);
  });

  it('reports no semesters when all of them are excluded', () => {
    const standing = evaluateProgramStanding([
      program(1, [semester(1, [attempt()], { status: 'Deferred' }), semester(2, [attempt()], { status: 'Withdrawn' })]),
    ]);
    expect(standing.kind).toBe('no-semesters');
    expect(standingLabel(standing)).toBe(NO_SEMESTERS_FOUND);
  });

  it('reports a student with no active or completed program', () => {
    const standing = evaluateProgramStanding([program(1, [], { status: 'Changed' })]);
    expect(standing).toEqual({ kind: 'no-active-or-completed-program' });
    expect(standingLabel(standing)).toBe(NO_ACTIVE_OR_COMPLETED_PROGRAM);
  });

  it('ignores dropped attempts and excluded semesters', () => {
    const standing = evaluateProgramStanding([
      program(1, [
        semester(1, [attempt({ grade: 'B', credits: 3 }), attempt({ grade: 'F', credits: 3, status: 'Drop' })]),
        semester(2, [attempt({ grade: 'F', credits: 3 })], { status: 'Deleted' }),
      ]),
    ]);

    expect(standing.kind).toBe('classified');
    if (standing.kind === 'classified') {
      expect(standing.cgpa).toBeCloseTo(3.33, 10);
      expect(standing.classification).toBe('Merit');
      expect(standing.records).toHaveLength(1);
    }
  });
});
