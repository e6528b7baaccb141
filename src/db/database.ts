/**
 * Database Module
 * Local SQLite mirror of the registry: student data store and curriculum store
 */

import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { logger } from '../logger.js';
import { normalizeModuleName } from '../parsers/moduleNameParser.js';
import {
  AttemptRow,
  ClearanceRow,
  CountRow,
  MarkedAttemptRow,
  ModuleRefRow,
  PendingClearanceRow,
  ProgramRow,
  RegistrationRequestRow,
  RequirementRow,
  SemesterRow,
  StdNoRow,
  StudentRow,
  TermRow,
  parseRow,
  parseRows,
} from './rows.js';
import type { RegistrySnapshot } from './snapshot.js';
import type {
  ClearanceDecision,
  CurriculumRequirement,
  GradeCorrection,
  MarkedAttempt,
  ModuleAttempt,
  PendingAcademicClearance,
  PrerequisiteModule,
  RegistrationRequest,
  Student,
  StudentProgram,
  StudentSemester,
} from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface RegistryStats {
  students: number;
  programs: number;
  modules: number;
  attempts: number;
  pendingClearances: number;
}

export interface ActiveTerm {
  id: number;
  name: string;
  semester: number;
}

export class RegistryDatabase {
  private db: Database.Database;

  constructor(dbPath: string = 'registry.db') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    // Snapshot import uses INSERT OR REPLACE, which would cascade-delete
    // children if foreign keys were enforced
    this.db.pragma('foreign_keys = OFF');
  }

  /**
   * Initialize database with schema
   */
  initialize(): void {
    const schemaPath = join(__dirname, 'schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');
    this.db.exec(schema);
    logger.debug('Database', 'Schema initialized');
  }

  // ============ Student data store ============

  getStudent(stdNo: number): Student | undefined {
    const row: unknown = this.db.prepare(`
      SELECT std_no, name, national_id FROM students WHERE std_no = ?
    `).get(stdNo);
    if (row === undefined) return undefined;

    const parsed = parseRow(StudentRow, row, 'students');
    return { stdNo: parsed.std_no, name: parsed.name, nationalId: parsed.national_id };
  }

  /**
   * All programs of a student with their semesters and attempts, oldest first
   */
  getStudentPrograms(stdNo: number): StudentProgram[] {
    const programRows = parseRows(ProgramRow, this.db.prepare(`
      SELECT sp.id, sp.std_no, sp.structure_id, sp.status,
             p.code AS program_code, p.name AS program_name
      FROM student_programs sp
      LEFT JOIN structures s ON s.id = sp.structure_id
      LEFT JOIN programs p ON p.id = s.program_id
      WHERE sp.std_no = ?
      ORDER BY sp.id
    `).all(stdNo), 'student_programs');

    return programRows.map(row => ({
      id: row.id,
      stdNo: row.std_no,
      structureId: row.structure_id,
      status: row.status,
      programCode: row.program_code ?? '',
      programName: row.program_name ?? 'Unknown Program',
      semesters: this.getProgramSemesters(row.id),
    }));
  }

  private getProgramSemesters(studentProgramId: number): StudentSemester[] {
    const semesterRows = parseRows(SemesterRow, this.db.prepare(`
      SELECT id, student_program_id, term, semester_number, status
      FROM student_semesters
      WHERE student_program_id = ?
      ORDER BY id
    `).all(studentProgramId), 'student_semesters');

    const attemptRows = parseRows(AttemptRow, this.db.prepare(`
      SELECT sm.id, sm.student_semester_id, sm.semester_module_id, sm.status,
             sm.marks, sm.grade, smod.credits,
             m.code AS module_code, m.name AS module_name
      FROM student_modules sm
      JOIN student_semesters ss ON ss.id = sm.student_semester_id
      JOIN semester_modules smod ON smod.id = sm.semester_module_id
      LEFT JOIN modules m ON m.id = smod.module_id
      WHERE ss.student_program_id = ?
      ORDER BY sm.id
    `).all(studentProgramId), 'student_modules');

    const attemptsBySemester = new Map<number, ModuleAttempt[]>();
    for (const row of attemptRows) {
      const attempt: ModuleAttempt = {
        id: row.id,
        semesterModuleId: row.semester_module_id,
        moduleCode: row.module_code ?? '',
        moduleName: row.module_name ?? '',
        status: row.status,
        marks: row.marks,
        grade: row.grade,
        credits: row.credits,
      };
      const list = attemptsBySemester.get(row.student_semester_id);
      if (list) {
        list.push(attempt);
      } else {
        attemptsBySemester.set(row.student_semester_id, [attempt]);
      }
    }

    return semesterRows.map(row => ({
      id: row.id,
      term: row.term,
      semesterNumber: row.semester_number,
      status: row.status,
      attempts: attemptsBySemester.get(row.id) ?? [],
    }));
  }

  /**
   * Every attempt with its recorded marks and grade, by id
   */
  getMarkedAttempts(): MarkedAttempt[] {
    const rows = parseRows(MarkedAttemptRow, this.db.prepare(`
      SELECT sm.id, sp.std_no, m.code AS module_code, sm.marks, sm.grade
      FROM student_modules sm
      JOIN student_semesters ss ON ss.id = sm.student_semester_id
      JOIN student_programs sp ON sp.id = ss.student_program_id
      JOIN semester_modules smod ON smod.id = sm.semester_module_id
      LEFT JOIN modules m ON m.id = smod.module_id
      ORDER BY sm.id
    `).all(), 'student_modules');

    return rows.map(row => ({
      id: row.id,
      stdNo: row.std_no,
      moduleCode: row.module_code ?? '',
      marks: row.marks,
      grade: row.grade,
    }));
  }

  /**
   * Write corrected grades in one transaction
   */
  updateAttemptGrades(corrections: readonly GradeCorrection[]): number {
    const update = this.db.prepare(`UPDATE student_modules SET grade = ? WHERE id = ?`);
    const transaction = this.db.transaction((items: readonly GradeCorrection[]) => {
      let changed = 0;
      for (const item of items) {
        changed += update.run(item.grade, item.id).changes;
      }
      return changed;
    });
    return transaction(corrections);
  }

  /**
   * Std numbers of students with an Active program that has a semester in one of the terms
   */
  getActiveStudentsInTerms(terms: readonly string[]): number[] {
    if (terms.length === 0) return [];
    const placeholders = terms.map(() => '?').join(', ');
    const rows = parseRows(StdNoRow, this.db.prepare(`
      SELECT DISTINCT sp.std_no
      FROM student_semesters ss
      JOIN student_programs sp ON sp.id = ss.student_program_id
      WHERE sp.status = 'Active' AND ss.term IN (${placeholders})
      ORDER BY sp.std_no
    `).all(...terms), 'student_programs');
    return rows.map(row => row.std_no);
  }

  // ============ Curriculum structure store ============

  /**
   * Visible modules of a structure, ordered by semester number
   */
  getVisibleRequirements(structureId: number): CurriculumRequirement[] {
    const rows = parseRows(RequirementRow, this.db.prepare(`
      SELECT m.id AS module_id, m.code, m.name, smod.type, smod.credits,
             smod.hidden, ss.semester_number
      FROM structure_semesters ss
      JOIN semester_modules smod ON smod.semester_id = ss.id
      JOIN modules m ON m.id = smod.module_id
      WHERE ss.structure_id = ? AND smod.hidden = 0
      ORDER BY ss.semester_number, smod.id
    `).all(structureId), 'semester_modules');

    return rows.map(row => ({
      moduleId: row.module_id,
      code: row.code,
      originalName: row.name,
      normalizedName: normalizeModuleName(row.name),
      type: row.type,
      semesterNumber: row.semester_number,
      credits: row.credits,
      hidden: row.hidden,
    }));
  }

  getPrerequisites(moduleId: number): PrerequisiteModule[] {
    const rows = parseRows(ModuleRefRow, this.db.prepare(`
      SELECT m.id, m.code, m.name
      FROM module_prerequisites mp
      JOIN modules m ON m.id = mp.prerequisite_id
      WHERE mp.module_id = ?
      ORDER BY m.code
    `).all(moduleId), 'module_prerequisites');

    return rows.map(row => ({ moduleId: row.id, code: row.code, name: row.name }));
  }

  // ============ Registration ============

  getActiveTerm(): ActiveTerm | undefined {
    const row: unknown = this.db.prepare(`
      SELECT id, name, is_active, semester FROM terms WHERE is_active = 1 ORDER BY id DESC LIMIT 1
    `).get();
    if (row === undefined) return undefined;

    const parsed = parseRow(TermRow, row, 'terms');
    return { id: parsed.id, name: parsed.name, semester: parsed.semester };
  }

  getRegistrationRequests(termId: number): RegistrationRequest[] {
    const requests = parseRows(RegistrationRequestRow, this.db.prepare(`
      SELECT id, std_no, term_id FROM registration_requests WHERE term_id = ? ORDER BY id
    `).all(termId), 'registration_requests');

    const moduleStmt = this.db.prepare(`
      SELECT m.id, m.code, m.name
      FROM requested_modules rm
      JOIN modules m ON m.id = rm.module_id
      WHERE rm.registration_request_id = ?
      ORDER BY m.code
    `);

    return requests.map(row => ({
      id: row.id,
      stdNo: row.std_no,
      termId: row.term_id,
      modules: parseRows(ModuleRefRow, moduleStmt.all(row.id), 'requested_modules')
        .map(m => ({ moduleId: m.id, code: m.code, name: m.name })),
    }));
  }

  // ============ Clearance ============

  getPendingAcademicClearances(): PendingAcademicClearance[] {
    const rows = parseRows(PendingClearanceRow, this.db.prepare(`
      SELECT gr.id AS graduation_request_id, c.id AS clearance_id, sp.std_no
      FROM graduation_requests gr
      JOIN graduation_clearance gc ON gc.graduation_request_id = gr.id
      JOIN clearance c ON c.id = gc.clearance_id
      JOIN student_programs sp ON sp.id = gr.student_program_id
      WHERE c.department = 'academic' AND c.status = 'pending'
      ORDER BY gr.id
    `).all(), 'clearance');

    return rows.map(row => ({
      graduationRequestId: row.graduation_request_id,
      clearanceId: row.clearance_id,
      stdNo: row.std_no,
    }));
  }

  getApprovedAcademicStudents(): number[] {
    const rows = parseRows(StdNoRow, this.db.prepare(`
      SELECT DISTINCT sp.std_no
      FROM graduation_requests gr
      JOIN graduation_clearance gc ON gc.graduation_request_id = gr.id
      JOIN clearance c ON c.id = gc.clearance_id
      JOIN student_programs sp ON sp.id = gr.student_program_id
      WHERE c.department = 'academic' AND c.status = 'approved'
      ORDER BY sp.std_no
    `).all(), 'clearance');
    return rows.map(row => row.std_no);
  }

  /**
   * Apply a clearance decision. Approval records the response date;
   * a pending decision only refreshes the message.
   */
  applyClearanceDecision(clearanceId: number, decision: ClearanceDecision, respondedAt: number): void {
    if (decision.status === 'approved') {
      this.db.prepare(`
        UPDATE clearance SET status = 'approved', message = NULL, response_date = ? WHERE id = ?
      `).run(respondedAt, clearanceId);
    } else {
      this.db.prepare(`
        UPDATE clearance SET message = ? WHERE id = ?
      `).run(decision.message, clearanceId);
    }
  }

  getClearance(clearanceId: number): { status: string; message: string | null; responseDate: number | null } | undefined {
    const row: unknown = this.db.prepare(`
      SELECT status, message, response_date FROM clearance WHERE id = ?
    `).get(clearanceId);
    if (row === undefined) return undefined;

    const parsed = parseRow(ClearanceRow, row, 'clearance');
    return { status: parsed.status, message: parsed.message, responseDate: parsed.response_date };
  }

  // ============ Import ============

  /**
   * Write a validated snapshot in one transaction
   */
  importSnapshot(snapshot: RegistrySnapshot): number {
    const statements = {
      program: this.db.prepare(`INSERT OR REPLACE INTO programs (id, code, name, level) VALUES (?, ?, ?, ?)`),
      structure: this.db.prepare(`INSERT OR REPLACE INTO structures (id, code, program_id) VALUES (?, ?, ?)`),
      module: this.db.prepare(`INSERT OR REPLACE INTO modules (id, code, name, status) VALUES (?, ?, ?, ?)`),
      structureSemester: this.db.prepare(`
        INSERT OR REPLACE INTO structure_semesters (id, structure_id, semester_number, name, total_credits)
        VALUES (?, ?, ?, ?, ?)
      `),
      semesterModule: this.db.prepare(`
        INSERT OR REPLACE INTO semester_modules (id, module_id, semester_id, type, credits, hidden)
        VALUES (?, ?, ?, ?, ?, ?)
      `),
      prerequisite: this.db.prepare(`
        INSERT OR IGNORE INTO module_prerequisites (module_id, prerequisite_id) VALUES (?, ?)
      `),
      student: this.db.prepare(`INSERT OR REPLACE INTO students (std_no, name, national_id) VALUES (?, ?, ?)`),
      studentProgram: this.db.prepare(`
        INSERT OR REPLACE INTO student_programs (id, std_no, structure_id, status) VALUES (?, ?, ?, ?)
      `),
      studentSemester: this.db.prepare(`
        INSERT OR REPLACE INTO student_semesters (id, student_program_id, term, semester_number, status)
        VALUES (?, ?, ?, ?, ?)
      `),
      studentModule: this.db.prepare(`
        INSERT OR REPLACE INTO student_modules (id, student_semester_id, semester_module_id, status, marks, grade)
        VALUES (?, ?, ?, ?, ?, ?)
      `),
      term: this.db.prepare(`INSERT OR REPLACE INTO terms (id, name, is_active, semester) VALUES (?, ?, ?, ?)`),
      registrationRequest: this.db.prepare(`
        INSERT OR REPLACE INTO registration_requests (id, std_no, term_id) VALUES (?, ?, ?)
      `),
      requestedModule: this.db.prepare(`
        INSERT OR IGNORE INTO requested_modules (registration_request_id, module_id) VALUES (?, ?)
      `),
      graduationRequest: this.db.prepare(`
        INSERT OR REPLACE INTO graduation_requests (id, student_program_id) VALUES (?, ?)
      `),
      clearance: this.db.prepare(`
        INSERT OR REPLACE INTO clearance (id, department, status, message) VALUES (?, ?, ?, ?)
      `),
      graduationClearance: this.db.prepare(`
        INSERT OR IGNORE INTO graduation_clearance (graduation_request_id, clearance_id) VALUES (?, ?)
      `),
    };

    const transaction = this.db.transaction((s: RegistrySnapshot) => {
      let written = 0;
      for (const p of s.programs) { statements.program.run(p.id, p.code, p.name, p.level ?? null); written++; }
      for (const st of s.structures) { statements.structure.run(st.id, st.code, st.programId); written++; }
      for (const m of s.modules) { statements.module.run(m.id, m.code, m.name, m.status); written++; }
      for (const ss of s.structureSemesters) {
        statements.structureSemester.run(ss.id, ss.structureId, ss.semesterNumber, ss.name, ss.totalCredits);
        written++;
      }
      for (const sm of s.semesterModules) {
        statements.semesterModule.run(sm.id, sm.moduleId, sm.semesterId, sm.type, sm.credits, sm.hidden ? 1 : 0);
        written++;
      }
      for (const pr of s.prerequisites) { statements.prerequisite.run(pr.moduleId, pr.prerequisiteId); written++; }
      for (const st of s.students) { statements.student.run(st.stdNo, st.name, st.nationalId); written++; }
      for (const sp of s.studentPrograms) {
        statements.studentProgram.run(sp.id, sp.stdNo, sp.structureId, sp.status);
        written++;
      }
      for (const ss of s.studentSemesters) {
        statements.studentSemester.run(ss.id, ss.studentProgramId, ss.term, ss.semesterNumber, ss.status);
        written++;
      }
      for (const sm of s.studentModules) {
        statements.studentModule.run(sm.id, sm.studentSemesterId, sm.semesterModuleId, sm.status, sm.marks, sm.grade);
        written++;
      }
      for (const t of s.terms) { statements.term.run(t.id, t.name, t.isActive ? 1 : 0, t.semester); written++; }
      for (const r of s.registrationRequests) { statements.registrationRequest.run(r.id, r.stdNo, r.termId); written++; }
      for (const rm of s.requestedModules) {
        statements.requestedModule.run(rm.registrationRequestId, rm.moduleId);
        written++;
      }
      for (const g of s.graduationRequests) { statements.graduationRequest.run(g.id, g.studentProgramId); written++; }
      for (const c of s.clearances) {
        statements.clearance.run(c.id, c.department, c.status, c.message);
        statements.graduationClearance.run(c.graduationRequestId, c.id);
        written++;
      }
      return written;
    });

    const written = transaction(snapshot);
    logger.info('Database', `Imported ${written} records`);
    return written;
  }

  /**
   * Get statistics
   */
  getStats(): RegistryStats {
    const count = (sql: string) => parseRow(CountRow, this.db.prepare(sql).get(), 'stats').count;
    return {
      students: count('SELECT COUNT(*) AS count FROM students'),
      programs: count('SELECT COUNT(*) AS count FROM programs'),
      modules: count('SELECT COUNT(*) AS count FROM modules'),
      attempts: count('SELECT COUNT(*) AS count FROM student_modules'),
      pendingClearances: count(`SELECT COUNT(*) AS count FROM clearance WHERE department = 'academic' AND status = 'pending'`),
    };
  }

  /**
   * Close database
   */
  close(): void {
    this.db.close();
  }
}
