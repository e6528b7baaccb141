/**
 * Row parsing for SQLite results
 * better-sqlite3 hands back untyped rows; each is checked here before the
 * engine sees it.
 */

import { z } from 'zod';
import { RecordParseError } from '../errors.js';

const flag = z.union([z.literal(0), z.literal(1)]).transform(value => value === 1);

export const ProgramRow = z.object({
  id: z.number().int(),
  std_no: z.number().int(),
  structure_id: z.number().int(),
  status: z.string(),
  program_code: z.string().nullable(),
  program_name: z.string().nullable(),
});

export const SemesterRow = z.object({
  id: z.number().int(),
  student_program_id: z.number().int(),
  term: z.string(),
  semester_number: z.number().int().nullable(),
  status: z.string(),
});

export const AttemptRow = z.object({
  id: z.number().int(),
  student_semester_id: z.number().int(),
  semester_module_id: z.number().int(),
  status: z.string(),
  marks: z.string(),
  grade: z.string(),
  credits: z.number().min(0),
  module_code: z.string().nullable(),
  module_name: z.string().nullable(),
});

export const MarkedAttemptRow = z.object({
  id: z.number().int(),
  std_no: z.number().int(),
  module_code: z.string().nullable(),
  marks: z.string(),
  grade: z.string(),
});

export const RequirementRow = z.object({
  module_id: z.number().int(),
  code: z.string(),
  name: z.string(),
  type: z.string(),
  credits: z.number().min(0),
  hidden: flag,
  semester_number: z.number().int(),
});

export const StudentRow = z.object({
  std_no: z.number().int(),
  name: z.string(),
  national_id: z.string(),
});

export const PendingClearanceRow = z.object({
  graduation_request_id: z.number().int(),
  clearance_id: z.number().int(),
  std_no: z.number().int(),
});

export const ClearanceRow = z.object({
  status: z.string(),
  message: z.string().nullable(),
  response_date: z.number().int().nullable(),
});

export const TermRow = z.object({
  id: z.number().int(),
  name: z.string(),
  is_active: flag,
  semester: z.number().int(),
});

export const RegistrationRequestRow = z.object({
  id: z.number().int(),
  std_no: z.number().int(),
  term_id: z.number().int(),
});

export const ModuleRefRow = z.object({
  id: z.number().int(),
  code: z.string(),
  name: z.string(),
});

export const StdNoRow = z.object({
  std_no: z.number().int(),
});

export const CountRow = z.object({
  count: z.number().int(),
});

/**
 * Parse one row against its schema
 * @throws RecordParseError naming the table and the first bad column
 */
export function parseRow<T extends z.ZodTypeAny>(schema: T, row: unknown, record: string): z.output<T> {
  const parsed = schema.safeParse(row);
  if (parsed.success) return parsed.data;

  const issue = parsed.error.issues[0];
  const field = issue.path.length > 0 ? issue.path.join('.') : '(row)';
  throw new RecordParseError(record, field, issue.message);
}

export function parseRows<T extends z.ZodTypeAny>(schema: T, rows: unknown[], record: string): z.output<T>[] {
  return rows.map(row => parseRow(schema, row, record));
}
