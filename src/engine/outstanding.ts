/**
 * Outstanding-Requirements Resolver
 * Compares a program structure's visible modules with what the student attempted
 */

import { countedAttempts, selectProgram } from './programSelection.js';
import { defaultClassifier, type GradeClassifier } from '../grades/classifier.js';
import { normalizeModuleName } from '../parsers/moduleNameParser.js';
import type {
  CurriculumRequirement,
  ModuleAttempt,
  OutstandingResult,
  StudentProgram,
} from '../types.js';

export type OutstandingLookup =
  | { ok: true; program: StudentProgram; outstanding: OutstandingResult }
  | { ok: false; reason: 'NoActiveProgram' };

function groupByModuleName(attempts: readonly ModuleAttempt[]): Map<string, ModuleAttempt[]> {
  const byName = new Map<string, ModuleAttempt[]>();
  for (const attempt of attempts) {
    const key = normalizeModuleName(attempt.moduleName);
    const list = byName.get(key);
    if (list) {
      list.push(attempt);
    } else {
      byName.set(key, [attempt]);
    }
  }
  return byName;
}

/**
 * Outstanding modules for one program.
 *
 * A requirement with no attempts is never attempted. One that was
 * attempted exactly once and not passed is failed-never-repeated.
 * Two or more failed attempts are not reported.
 */
export function resolveOutstanding(
  program: StudentProgram,
  requirements: readonly CurriculumRequirement[],
  attempts: readonly ModuleAttempt[] = countedAttempts(program),
  classifier: GradeClassifier = defaultClassifier
): OutstandingResult {
  const attemptsByName = groupByModuleName(attempts);
  const failedNeverRepeated: CurriculumRequirement[] = [];
  const neverAttempted: CurriculumRequirement[] = [];

  for (const requirement of requirements) {
    if (requirement.hidden) continue;

    const matching = attemptsByName.get(requirement.normalizedName) ?? [];
    if (matching.length === 0) {
      neverAttempted.push(requirement);
      continue;
    }

    const passed = matching.some(attempt => {
      const grade = classifier.tryNormalize(attempt.grade);
      return grade !== undefined && classifier.isPassing(grade);
    });

    if (!passed && matching.length === 1) {
      failedNeverRepeated.push(requirement);
    }
  }

  return { failedNeverRepeated, neverAttempted };
}

/**
 * Outstanding modules for a student's selected program.
 * Structure requirements are loaded for that program only.
 */
export function resolveStudentOutstanding(
  programs: readonly StudentProgram[],
  loadRequirements: (structureId: number) => CurriculumRequirement[],
  classifier: GradeClassifier = defaultClassifier
): OutstandingLookup {
  const program = selectProgram(programs);
  if (!program) return { ok: false, reason: 'NoActiveProgram' };

  const requirements = loadRequirements(program.structureId);
  const outstanding = resolveOutstanding(program, requirements, countedAttempts(program), classifier);
  return { ok: true, program, outstanding };
}

export function hasOutstanding(outstanding: OutstandingResult): boolean {
  return outstanding.failedNeverRepeated.length > 0 || outstanding.neverAttempted.length > 0;
}
