/**
 * Registry snapshot format
 * One JSON document holding every table the engine reads, validated before import
 */

import { z } from 'zod';
import { RecordParseError } from '../errors.js';
import { MODULE_STATUSES, MODULE_TYPES, PROGRAM_STATUSES, SEMESTER_STATUSES } from '../types.js';

const id = z.number().int().positive();

const ProgramSchema = z.object({
  id,
  code: z.string().min(1),
  name: z.string().min(1),
  level: z.enum(['certificate', 'diploma', 'degree']).optional(),
});

const StructureSchema = z.object({
  id,
  code: z.string().min(1),
  programId: id,
});

const ModuleSchema = z.object({
  id,
  code: z.string().min(1),
  name: z.string().min(1),
  status: z.string().default('Active'),
});

const StructureSemesterSchema = z.object({
  id,
  structureId: id,
  semesterNumber: z.number().int().min(0),
  name: z.string(),
  totalCredits: z.number().min(0),
});

const SemesterModuleSchema = z.object({
  id,
  moduleId: id,
  semesterId: id,
  type: z.enum(MODULE_TYPES),
  credits: z.number().min(0),
  hidden: z.boolean().default(false),
});

const PrerequisiteSchema = z.object({
  moduleId: id,
  prerequisiteId: id,
});

const StudentSchema = z.object({
  stdNo: id,
  name: z.string().min(1),
  nationalId: z.string(),
});

const StudentProgramSchema = z.object({
  id,
  stdNo: id,
  structureId: id,
  status: z.enum(PROGRAM_STATUSES),
});

const StudentSemesterSchema = z.object({
  id,
  studentProgramId: id,
  term: z.string().min(1),
  semesterNumber: z.number().int().min(0).nullable().default(null),
  status: z.enum(SEMESTER_STATUSES),
});

const StudentModuleSchema = z.object({
  id,
  studentSemesterId: id,
  semesterModuleId: id,
  status: z.enum(MODULE_STATUSES),
  marks: z.string().default(''),
  grade: z.string().default(''),
});

const TermSchema = z.object({
  id,
  name: z.string().min(1),
  isActive: z.boolean().default(false),
  semester: z.number().int().min(0),
});

const RegistrationRequestSchema = z.object({
  id,
  stdNo: id,
  termId: id,
});

const RequestedModuleSchema = z.object({
  registrationRequestId: id,
  moduleId: id,
});

const GraduationRequestSchema = z.object({
  id,
  studentProgramId: id,
});

const ClearanceSchema = z.object({
  id,
  graduationRequestId: id,
  department: z.string().min(1),
  status: z.enum(['pending', 'approved', 'rejected']).default('pending'),
  message: z.string().nullable().default(null),
});

export const SnapshotSchema = z.object({
  programs: z.array(ProgramSchema).default([]),
  structures: z.array(StructureSchema).default([]),
  modules: z.array(ModuleSchema).default([]),
  structureSemesters: z.array(StructureSemesterSchema).default([]),
  semesterModules: z.array(SemesterModuleSchema).default([]),
  prerequisites: z.array(PrerequisiteSchema).default([]),
  students: z.array(StudentSchema).default([]),
  studentPrograms: z.array(StudentProgramSchema).default([]),
  studentSemesters: z.array(StudentSemesterSchema).default([]),
  studentModules: z.array(StudentModuleSchema).default([]),
  terms: z.array(TermSchema).default([]),
  registrationRequests: z.array(RegistrationRequestSchema).default([]),
  requestedModules: z.array(RequestedModuleSchema).default([]),
  graduationRequests: z.array(GraduationRequestSchema).default([]),
  clearances: z.array(ClearanceSchema).default([]),
});

export type RegistrySnapshot = z.infer<typeof SnapshotSchema>;
export type SnapshotInput = z.input<typeof SnapshotSchema>;

/**
 * Validate a parsed JSON document as a snapshot
 * @throws RecordParseError naming the first offending record and field
 */
export function parseSnapshot(raw: unknown): RegistrySnapshot {
  const parsed = SnapshotSchema.safeParse(raw);
  if (parsed.success) return parsed.data;

  const issue = parsed.error.issues[0];
  const [table = 'snapshot', index, ...rest] = issue.path;
  const record = index === undefined ? String(table) : `${String(table)}[${String(index)}]`;
  const field = rest.length > 0 ? rest.join('.') : '(root)';
  throw new RecordParseError(record, field, issue.message);
}
