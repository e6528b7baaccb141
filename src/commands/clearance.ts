/**
 * Academic clearance evaluation for a single student (read-only)
 */

import type { RegistryDatabase } from '../db/database.js';
import { decideClearance } from '../engine/clearance.js';
import { resolveStudentOutstanding } from '../engine/outstanding.js';
import type { ClearanceDecision, OutstandingResult, StudentProgram } from '../types.js';

export type ClearanceEvaluation =
  | { kind: 'no-active-program'; stdNo: number }
  | {
      kind: 'evaluated';
      stdNo: number;
      program: StudentProgram;
      outstanding: OutstandingResult;
      decision: ClearanceDecision;
    };

export function evaluateClearance(db: RegistryDatabase, stdNo: number): ClearanceEvaluation {
  const lookup = resolveStudentOutstanding(
    db.getStudentPrograms(stdNo),
    structureId => db.getVisibleRequirements(structureId)
  );
  if (!lookup.ok) return { kind: 'no-active-program', stdNo };

  return {
    kind: 'evaluated',
    stdNo,
    program: lookup.program,
    outstanding: lookup.outstanding,
    decision: decideClearance(lookup.outstanding),
  };
}

export function formatClearance(evaluation: ClearanceEvaluation): string[] {
  if (evaluation.kind === 'no-active-program') {
    return [`⚠️  Student ${evaluation.stdNo}: no active or completed program, clearance not evaluated`];
  }

  const { outstanding, decision, program } = evaluation;
  const lines = [`📋 Student ${evaluation.stdNo} - ${program.programName}`];

  if (outstanding.failedNeverRepeated.length > 0) {
    lines.push('  Failed, never repeated:');
    for (const m of outstanding.failedNeverRepeated) {
      lines.push(`    ↳ ${m.code} - ${m.originalName} (semester ${m.semesterNumber})`);
    }
  }
  if (outstanding.neverAttempted.length > 0) {
    lines.push('  Never attempted:');
    for (const m of outstanding.neverAttempted) {
      lines.push(`    ↳ ${m.code} - ${m.originalName} (semester ${m.semesterNumber})`);
    }
  }

  lines.push(decision.status === 'approved' ? '  ✅ approved' : `  ⏳ pending: ${decision.message ?? ''}`);
  return lines;
}
