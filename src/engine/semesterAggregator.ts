/**
 * Semester Aggregator
 * Grade points, credits and GPA for one semester's attempts
 */

import { InvalidGradeError } from '../errors.js';
import { defaultClassifier, NO_MARK, type GradeClassifier } from '../grades/classifier.js';
import { logger } from '../logger.js';
import type { GradedAttempt } from '../types.js';

const EXCLUDED_ATTEMPT_STATUSES: ReadonlySet<string> = new Set(['delete', 'drop']);

export interface SemesterSummary {
  points: number;
  creditsAttempted: number;
  creditsCompleted: number;
  /** Credits in the GPA denominator: parseable, non-NM attempts */
  creditsForGpa: number;
  gpa: number;
  /** Some attempt is still graded NM */
  hasNoMarks: boolean;
}

export interface AggregateOptions {
  classifier?: GradeClassifier;
  /** Called for each attempt skipped because its grade is not in the catalog */
  onInvalidGrade?: (attempt: GradedAttempt, error: InvalidGradeError) => void;
}

export function isExcludedAttempt(status: string): boolean {
  return EXCLUDED_ATTEMPT_STATUSES.has(status.trim().toLowerCase());
}

function logInvalidGrade(attempt: GradedAttempt, error: InvalidGradeError) {
  logger.warn('Aggregator', `Skipping attempt: ${error.message}`, { status: attempt.status, credits: attempt.credits });
}

export function summarizeSemester(
  attempts: readonly GradedAttempt[],
  options: AggregateOptions = {}
): SemesterSummary {
  const classifier = options.classifier ?? defaultClassifier;
  const onInvalidGrade = options.onInvalidGrade ?? logInvalidGrade;

  let points = 0;
  let creditsAttempted = 0;
  let creditsCompleted = 0;
  let creditsForGpa = 0;
  let hasNoMarks = false;

  for (const attempt of attempts) {
    if (isExcludedAttempt(attempt.status)) continue;
    if (attempt.grade.trim() === '') continue;

    const result = classifier.classify(attempt.grade);
    if (!result.ok) {
      onInvalidGrade(attempt, result.error);
      continue;
    }

    const grade = result.symbol;
    creditsAttempted += attempt.credits;

    if (grade === NO_MARK) {
      hasNoMarks = true;
      continue;
    }

    creditsForGpa += attempt.credits;
    const gradePoints = classifier.gradePoints(grade);
    if (gradePoints !== undefined) {
      points += gradePoints * attempt.credits;
    }
    if (classifier.isPassing(grade)) {
      creditsCompleted += attempt.credits;
    }
  }

  return {
    points,
    creditsAttempted,
    creditsCompleted,
    creditsForGpa,
    gpa: creditsForGpa > 0 ? points / creditsForGpa : 0,
    hasNoMarks,
  };
}
