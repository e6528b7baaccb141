/**
 * Program Selection
 * Which enrollment counts, and which of its semesters and attempts
 */

import { isExcludedAttempt } from './semesterAggregator.js';
import type { ModuleAttempt, StudentProgram, StudentSemester } from '../types.js';

const EXCLUDED_SEMESTER_STATUSES: ReadonlySet<string> = new Set([
  'deleted',
  'deferred',
  'droppedout',
  'withdrawn',
]);

export function isExcludedSemester(status: string): boolean {
  return EXCLUDED_SEMESTER_STATUSES.has(status.trim().toLowerCase());
}

function newestWithStatus(programs: readonly StudentProgram[], status: string): StudentProgram | undefined {
  return [...programs]
    .filter(p => p.status === status)
    .sort((a, b) => b.id - a.id)[0];
}

/**
 * The newest Active program, else the newest Completed one
 */
export function selectProgram(programs: readonly StudentProgram[]): StudentProgram | undefined {
  return newestWithStatus(programs, 'Active') ?? newestWithStatus(programs, 'Completed');
}

/**
 * Semesters that take part in CGPA and curriculum checks, in sequence order
 */
export function countedSemesters(program: StudentProgram): StudentSemester[] {
  return program.semesters
    .filter(s => !isExcludedSemester(s.status))
    .sort((a, b) => a.id - b.id);
}

/**
 * Every non-dropped, non-deleted attempt across the counted semesters
 */
export function countedAttempts(program: StudentProgram): ModuleAttempt[] {
  return countedSemesters(program).flatMap(semester =>
    semester.attempts.filter(attempt => !isExcludedAttempt(attempt.status))
  );
}
