/**
 * Export graduating students
 * A student qualifies through an approved academic clearance, or by being
 * active in one of the graduation terms with no outstanding requirements.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { RegistryDatabase } from '../db/database.js';
import { evaluateProgramStanding, roundTo2, standingLabel } from '../engine/cgpa.js';
import { hasOutstanding, resolveStudentOutstanding } from '../engine/outstanding.js';
import { logger } from '../logger.js';

export const CRITERIA_APPROVED_CLEARANCE = 'Approved Clearance';
export const CRITERIA_TERM_NO_ISSUES = 'Graduation Term + No Issues';

export interface GraduatingStudent {
  stdNo: number;
  name: string;
  programName: string;
  cgpa: number | null;
  classification: string;
  criteriaMet: string;
}

export interface GraduatingExport {
  students: GraduatingStudent[];
  byProgram: Record<string, number>;
  failed: number;
}

export interface ExportOptions {
  graduationTerms: readonly string[];
}

export function collectGraduatingStudents(db: RegistryDatabase, options: ExportOptions): GraduatingExport {
  const criteria = new Map<number, string[]>();
  const addCriterion = (stdNo: number, criterion: string) => {
    const list = criteria.get(stdNo);
    if (list) {
      list.push(criterion);
    } else {
      criteria.set(stdNo, [criterion]);
    }
  };

  const approved = db.getApprovedAcademicStudents();
  logger.info('Export', `${approved.length} students with approved academic clearance`);
  for (const stdNo of approved) addCriterion(stdNo, CRITERIA_APPROVED_CLEARANCE);

  const candidates = db.getActiveStudentsInTerms(options.graduationTerms);
  logger.info('Export', `${candidates.length} active students in terms ${options.graduationTerms.join(', ')}`);
  const failedStudents = new Set<number>();
  const recordFailure = (stdNo: number, err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    logger.error('Export', `Error processing student ${stdNo}: ${message}`);
    failedStudents.add(stdNo);
  };

  for (const stdNo of candidates) {
    try {
      const lookup = resolveStudentOutstanding(
        db.getStudentPrograms(stdNo),
        structureId => db.getVisibleRequirements(structureId)
      );
      if (lookup.ok && !hasOutstanding(lookup.outstanding)) {
        addCriterion(stdNo, CRITERIA_TERM_NO_ISSUES);
      }
    } catch (err) {
      recordFailure(stdNo, err);
    }
  }

  const students: GraduatingStudent[] = [];
  const programCounts = new Map<string, number>();

  const ordered = [...criteria.keys()].sort((a, b) => a - b);
  for (const stdNo of ordered) {
    if (failedStudents.has(stdNo)) continue;
    try {
      const student = db.getStudent(stdNo);
      if (!student) {
        logger.warn('Export', `Student ${stdNo} not found, skipping`);
        continue;
      }

      const programs = db.getStudentPrograms(stdNo);
      const active = programs.filter(p => p.status === 'Active').sort((a, b) => b.id - a.id)[0];
      if (!active) {
        logger.debug('Export', `Student ${stdNo} has no active program, skipping`);
        continue;
      }

      const standing = evaluateProgramStanding(programs);
      students.push({
        stdNo,
        name: student.name,
        programName: active.programName,
        cgpa: standing.kind === 'classified' ? roundTo2(standing.cgpa) : null,
        classification: standingLabel(standing),
        criteriaMet: (criteria.get(stdNo) ?? []).join(' & '),
      });
      programCounts.set(active.programName, (programCounts.get(active.programName) ?? 0) + 1);
    } catch (err) {
      recordFailure(stdNo, err);
    }
  }

  return { students, byProgram: Object.fromEntries(programCounts), failed: failedStudents.size };
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * graduating_students_YYYYMMDD_HHMMSS.json in local time
 */
export function exportFileName(at: Date): string {
  const date = `${at.getFullYear()}${pad2(at.getMonth() + 1)}${pad2(at.getDate())}`;
  const time = `${pad2(at.getHours())}${pad2(at.getMinutes())}${pad2(at.getSeconds())}`;
  return `graduating_students_${date}_${time}.json`;
}

export function writeGraduatingExport(result: GraduatingExport, exportDir: string, at: Date = new Date()): string {
  mkdirSync(exportDir, { recursive: true });
  const filePath = join(exportDir, exportFileName(at));
  writeFileSync(filePath, JSON.stringify({
    exportedAt: at.toISOString(),
    total: result.students.length,
    byProgram: result.byProgram,
    students: result.students,
  }, null, 2));
  logger.info('Export', `✓ Exported ${result.students.length} students to ${filePath}`);
  return filePath;
}
