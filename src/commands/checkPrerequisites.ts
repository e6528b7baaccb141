/**
 * Check prerequisites
 * Lists registration requests in the active term that include a module
 * whose prerequisites the student has not passed.
 */

import type { ActiveTerm, RegistryDatabase } from '../db/database.js';
import { findFailedPrerequisites, type FailedPrerequisites } from '../engine/prerequisites.js';
import { logger } from '../logger.js';
import type { RegistrationRequest, Student } from '../types.js';

export interface PrerequisiteIssue {
  request: RegistrationRequest;
  student: Student | undefined;
  failures: FailedPrerequisites[];
}

export type PrerequisiteReport =
  | { kind: 'no-active-term' }
  | { kind: 'checked'; term: ActiveTerm; requests: number; issues: PrerequisiteIssue[] };

export function checkPrerequisites(db: RegistryDatabase): PrerequisiteReport {
  const term = db.getActiveTerm();
  if (!term) {
    logger.error('Prerequisites', 'No active term found');
    return { kind: 'no-active-term' };
  }

  const requests = db.getRegistrationRequests(term.id);
  logger.info('Prerequisites', `${requests.length} registration requests in ${term.name}`);

  const issues: PrerequisiteIssue[] = [];
  for (const request of requests) {
    // Prerequisites may have been passed under an earlier program
    const history = db.getStudentPrograms(request.stdNo)
      .flatMap(program => program.semesters)
      .flatMap(semester => semester.attempts);

    const failures = findFailedPrerequisites(
      request.modules,
      moduleId => db.getPrerequisites(moduleId),
      history
    );
    if (failures.length > 0) {
      issues.push({ request, student: db.getStudent(request.stdNo), failures });
    }
  }

  return { kind: 'checked', term, requests: requests.length, issues };
}

export function formatPrerequisiteReport(report: PrerequisiteReport): string[] {
  if (report.kind === 'no-active-term') return ['❌ No active term found'];
  if (report.issues.length === 0) return ['✅ No prerequisite issues found in pending requests'];

  const lines = [`⚠️  ${report.issues.length} students with prerequisite issues`];
  report.issues.forEach((issue, index) => {
    const name = issue.student?.name ?? 'Unknown student';
    lines.push('');
    lines.push(`${index + 1}/${report.issues.length}) ${name} (${issue.request.stdNo}), request ${issue.request.id}`);
    for (const failure of issue.failures) {
      lines.push(`  Module: ${failure.module.code} - ${failure.module.name}`);
      for (const prereq of failure.prerequisites) {
        lines.push(`    ↳ ${prereq.code} - ${prereq.name}`);
      }
    }
  });
  return lines;
}
