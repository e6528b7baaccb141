/**
 * Prerequisite checks for registration requests
 */

import { isExcludedAttempt } from './semesterAggregator.js';
import { defaultClassifier, type GradeClassifier } from '../grades/classifier.js';
import { normalizeModuleCode } from '../parsers/moduleNameParser.js';
import type { ModuleAttempt, PrerequisiteModule, RequestedModule } from '../types.js';

export interface FailedPrerequisites {
  module: RequestedModule;
  prerequisites: PrerequisiteModule[];
}

/**
 * Codes of modules the student has passed. An attempt counts when it was not
 * dropped or deleted and its grade is in the catalog and neither failing nor PP.
 */
export function passedModuleCodes(
  attempts: readonly ModuleAttempt[],
  classifier: GradeClassifier = defaultClassifier
): Set<string> {
  const passed = new Set<string>();
  for (const attempt of attempts) {
    if (isExcludedAttempt(attempt.status)) continue;
    const grade = classifier.tryNormalize(attempt.grade);
    if (grade !== undefined && !classifier.isFailingOrSupplementary(grade)) {
      passed.add(normalizeModuleCode(attempt.moduleCode));
    }
  }
  return passed;
}

export function findFailedPrerequisites(
  requested: readonly RequestedModule[],
  prerequisitesOf: (moduleId: number) => PrerequisiteModule[],
  history: readonly ModuleAttempt[],
  classifier: GradeClassifier = defaultClassifier
): FailedPrerequisites[] {
  const passed = passedModuleCodes(history, classifier);
  const failures: FailedPrerequisites[] = [];

  for (const module of requested) {
    const missing = prerequisitesOf(module.moduleId).filter(
      prereq => !passed.has(normalizeModuleCode(prereq.code))
    );
    if (missing.length > 0) {
      failures.push({ module, prerequisites: missing });
    }
  }

  return failures;
}
