/**
 * Update grades
 * Recomputes each attempt's grade from its recorded marks and writes back
 * the ones that disagree with the stored grade.
 */

import type { RegistryDatabase } from '../db/database.js';
import { defaultClassifier, type GradeClassifier } from '../grades/classifier.js';
import { logger } from '../logger.js';
import type { GradeCorrection } from '../types.js';

const NUMERIC_MARKS = /^-?\d+(\.\d+)?$/;
const FALLBACK_GRADE = 'F';

export interface UpdateGradesSummary {
  checked: number;
  skipped: number;
  mismatched: number;
  updated: number;
}

export interface UpdateGradesOptions {
  dryRun?: boolean;
  classifier?: GradeClassifier;
}

/**
 * Grade earned by a marks string. Fractions round up (64.2 -> 65 -> B-);
 * totals outside every range fall back to F. Non-numeric marks ("", "NM")
 * give undefined.
 */
export function recomputeGrade(rawMarks: string, classifier: GradeClassifier = defaultClassifier): string | undefined {
  const trimmed = rawMarks.trim();
  if (!NUMERIC_MARKS.test(trimmed)) return undefined;
  return classifier.gradeFromMarks(Math.ceil(Number(trimmed))) ?? FALLBACK_GRADE;
}

export function updateGrades(db: RegistryDatabase, options: UpdateGradesOptions = {}): UpdateGradesSummary {
  const classifier = options.classifier ?? defaultClassifier;
  const attempts = db.getMarkedAttempts();
  const summary: UpdateGradesSummary = { checked: 0, skipped: 0, mismatched: 0, updated: 0 };
  const corrections: GradeCorrection[] = [];

  logger.info('Grades', `Checking ${attempts.length} module attempts`);

  for (const attempt of attempts) {
    const expected = recomputeGrade(attempt.marks, classifier);
    if (expected === undefined) {
      logger.debug('Grades', `Attempt ${attempt.id} has no numeric marks, skipping`);
      summary.skipped++;
      continue;
    }

    summary.checked++;
    const stored = attempt.grade.trim().toUpperCase();
    if (stored === expected) continue;

    logger.warn(
      'Grades',
      `Student ${attempt.stdNo} ${attempt.moduleCode}: marks ${attempt.marks.trim()} give ${expected}, stored ${stored || '(blank)'}`
    );
    summary.mismatched++;
    corrections.push({ id: attempt.id, grade: expected });
  }

  if (corrections.length > 0 && !options.dryRun) {
    summary.updated = db.updateAttemptGrades(corrections);
    logger.info('Grades', `✓ Updated ${summary.updated} grades`);
  }

  logger.summary('Grade Update', {
    'Checked': summary.checked,
    'Skipped': summary.skipped,
    'Mismatched': summary.mismatched,
    'Updated': summary.updated,
  });

  return summary;
}
