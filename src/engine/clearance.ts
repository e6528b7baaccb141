/**
 * Academic clearance decision from an outstanding-modules result
 */

import { hasOutstanding } from './outstanding.js';
import type { ClearanceDecision, CurriculumRequirement, OutstandingResult } from '../types.js';

function listModules(modules: readonly CurriculumRequirement[]): string {
  return modules.map(m => `${m.code} - ${m.originalName}`).join(', ');
}

export function outstandingReasons(outstanding: OutstandingResult): string[] {
  const reasons: string[] = [];
  if (outstanding.failedNeverRepeated.length > 0) {
    reasons.push(`Failed modules never repeated: ${listModules(outstanding.failedNeverRepeated)}`);
  }
  if (outstanding.neverAttempted.length > 0) {
    reasons.push(`Required modules never attempted: ${listModules(outstanding.neverAttempted)}`);
  }
  return reasons;
}

export function decideClearance(outstanding: OutstandingResult): ClearanceDecision {
  if (!hasOutstanding(outstanding)) {
    return { status: 'approved', message: null };
  }

  const reasons = outstandingReasons(outstanding).join('; ');
  return {
    status: 'pending',
    message:
      `Academic requirements not met. ${reasons}. ` +
      'Please ensure all program modules are completed successfully before applying for graduation.',
  };
}
