/**
 * Transcript: per-semester GPA/CGPA and the student's classification
 */

import type { RegistryDatabase } from '../db/database.js';
import { evaluateProgramStanding, roundTo2, standingLabel, type ProgramStanding } from '../engine/cgpa.js';
import type { Student } from '../types.js';

export interface TranscriptReport {
  stdNo: number;
  student: Student | undefined;
  standing: ProgramStanding;
  label: string;
}

export function buildTranscript(db: RegistryDatabase, stdNo: number): TranscriptReport {
  const standing = evaluateProgramStanding(db.getStudentPrograms(stdNo));
  return {
    stdNo,
    student: db.getStudent(stdNo),
    standing,
    label: standingLabel(standing),
  };
}

export function formatTranscript(report: TranscriptReport): string[] {
  const lines = [`🎓 ${report.student?.name ?? 'Unknown student'} (${report.stdNo})`];
  const { standing } = report;

  if (standing.kind === 'no-active-or-completed-program') {
    lines.push(`  ${report.label}`);
    return lines;
  }

  lines.push(`  Program: ${standing.program.programName} [${standing.program.status}]`);
  if (standing.kind === 'no-semesters') {
    lines.push(`  ${report.label}`);
    return lines;
  }

  lines.push('');
  lines.push(`  ${'Term'.padEnd(10)} ${'GPA'.padStart(6)} ${'CGPA'.padStart(6)} ${'Credits'.padStart(8)} ${'Earned'.padStart(7)}`);
  for (const record of standing.records) {
    lines.push(
      `  ${(record.term ?? String(record.semesterId)).padEnd(10)} ` +
      `${roundTo2(record.gpa).toFixed(2).padStart(6)} ` +
      `${roundTo2(record.cgpa).toFixed(2).padStart(6)} ` +
      `${String(record.creditsAttempted).padStart(8)} ` +
      `${String(record.creditsCompleted).padStart(7)}`
    );
  }
  lines.push('');

  if (standing.kind === 'classified') {
    lines.push(`  CGPA: ${roundTo2(standing.cgpa).toFixed(2)} - ${standing.classification}`);
  } else {
    lines.push(`  ${report.label}`);
  }
  return lines;
}
