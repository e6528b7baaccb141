/**
 * Program CGPA Engine
 * Running CGPA across a program's semesters and the final classification
 */

import { countedSemesters, selectProgram } from './programSelection.js';
import { summarizeSemester, type AggregateOptions } from './semesterAggregator.js';
import type { GradedAttempt, StudentProgram } from '../types.js';

export type Classification = 'Distinction' | 'Merit' | 'Pass' | 'Failed';

export const NO_VALID_GRADES = 'No Valid Grades';
export const NO_SEMESTERS_FOUND = 'No Semesters Found';
export const NO_ACTIVE_OR_COMPLETED_PROGRAM = 'No Active or Completed Program';

const CLASSIFICATION_THRESHOLDS: ReadonlyArray<{ min: number; label: Classification }> = [
  { min: 3.5, label: 'Distinction' },
  { min: 3.0, label: 'Merit' },
  { min: 1.7, label: 'Pass' },
];

export interface SemesterInput {
  id: number;
  term?: string;
  attempts: readonly GradedAttempt[];
}

export interface SemesterRecord {
  semesterId: number;
  term?: string;
  gpa: number;
  cgpa: number;
  creditsAttempted: number;
  creditsCompleted: number;
}

export interface CgpaResult {
  records: SemesterRecord[];
  finalCgpa: number;
}

export type ProgramStanding =
  | {
      kind: 'classified';
      program: StudentProgram;
      cgpa: number;
      classification: Classification;
      records: SemesterRecord[];
    }
  | { kind: 'no-valid-grades'; program: StudentProgram; records: SemesterRecord[] }
  | { kind: 'no-semesters'; program: StudentProgram }
  | { kind: 'no-active-or-completed-program' };

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Fold semesters left to right. Callers pass semesters already
 * filtered and in sequence order.
 */
export function calculateCgpa(
  semesters: readonly SemesterInput[],
  options: AggregateOptions = {}
): CgpaResult {
  let cumulativePoints = 0;
  let cumulativeCredits = 0;
  const records: SemesterRecord[] = [];

  for (const semester of semesters) {
    const summary = summarizeSemester(semester.attempts, options);
    cumulativePoints += summary.points;
    cumulativeCredits += summary.creditsForGpa;

    records.push({
      semesterId: semester.id,
      term: semester.term,
      gpa: summary.gpa,
      cgpa: cumulativeCredits > 0 ? cumulativePoints / cumulativeCredits : 0,
      creditsAttempted: summary.creditsAttempted,
      creditsCompleted: summary.creditsCompleted,
    });
  }

  const last = records[records.length - 1];
  return { records, finalCgpa: last ? last.cgpa : 0 };
}

/**
 * Classification of a CGPA. Rounds to 2 places before comparing,
 * so 3.499 is a Distinction just as the printed 3.50 is.
 */
export function classify(cgpa: number): Classification | typeof NO_VALID_GRADES {
  if (cgpa === 0) return NO_VALID_GRADES;

  const rounded = roundTo2(cgpa);
  for (const threshold of CLASSIFICATION_THRESHOLDS) {
    if (rounded >= threshold.min) return threshold.label;
  }
  return 'Failed';
}

export function evaluateProgramStanding(
  programs: readonly StudentProgram[],
  options: AggregateOptions = {}
): ProgramStanding {
  const program = selectProgram(programs);
  if (!program) return { kind: 'no-active-or-completed-program' };

  const semesters = countedSemesters(program);
  if (semesters.length === 0) return { kind: 'no-semesters', program };

  const { records, finalCgpa } = calculateCgpa(semesters, options);
  const classification = classify(finalCgpa);
  if (classification === NO_VALID_GRADES) {
    return { kind: 'no-valid-grades', program, records };
  }

  return { kind: 'classified', program, cgpa: finalCgpa, classification, records };
}

/**
 * Student-facing label for any standing
 */
export function standingLabel(standing: ProgramStanding): string {
  switch (standing.kind) {
    case 'classified':
      return standing.classification;
    case 'no-valid-grades':
      return NO_VALID_GRADES;
    case 'no-semesters':
      return NO_SEMESTERS_FOUND;
    case 'no-active-or-completed-program':
      return NO_ACTIVE_OR_COMPLETED_PROGRAM;
  }
}
