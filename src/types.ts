/**
 * Registry Type Definitions
 */

// ============ Grade Types ============

export type GradeCategory =
  | 'distinction'
  | 'merit'
  | 'pass'
  | 'pass-provisional'
  | 'fail'
  | 'administrative';

export interface MarkRange {
  min: number;
  max: number;
}

export interface GradeDefinition {
  symbol: string;          // "A+", "PP", "DNS"
  points?: number;         // absent for EXP, DEF, NM
  category: GradeCategory;
  description: string;     // "Pass with Distinction"
  markRange?: MarkRange;   // only for grades derivable from a score
}

// ============ Student Record Types ============

export const PROGRAM_STATUSES = ['Active', 'Completed', 'Changed', 'Deleted', 'Inactive'] as const;
export type ProgramStatus = (typeof PROGRAM_STATUSES)[number];

export const SEMESTER_STATUSES = [
  'Active',
  'Outstanding',
  'Deferred',
  'Deleted',
  'DNR',
  'DroppedOut',
  'Withdrawn',
  'Enrolled',
  'Exempted',
  'Inactive',
  'Repeat',
] as const;
export type SemesterStatus = (typeof SEMESTER_STATUSES)[number];

export const MODULE_STATUSES = [
  'Add',
  'Compulsory',
  'Delete',
  'Drop',
  'Exempted',
  'Ineligible',
  'Repeat1',
  'Repeat2',
  'Repeat3',
  'Repeat4',
  'Repeat5',
  'Repeat6',
  'Repeat7',
  'Resit1',
  'Resit2',
  'Resit3',
  'Resit4',
  'Supplementary',
] as const;
export type ModuleStatus = (typeof MODULE_STATUSES)[number];

export const MODULE_TYPES = ['Major', 'Minor', 'Core', 'Delete', 'Elective'] as const;
export type ModuleType = (typeof MODULE_TYPES)[number];

/** The fields the aggregator reads from one attempt */
export interface GradedAttempt {
  grade: string;           // raw symbol as stored, e.g. " b+"
  status: string;          // "Compulsory", "Repeat1", "Drop"
  credits: number;         // credit value attached when the module was taken
}

export interface ModuleAttempt extends GradedAttempt {
  id: number;
  semesterModuleId: number;
  moduleCode: string;      // "DIOP1110"
  moduleName: string;      // "Media & Society II"
  marks: string;           // raw marks string, "72" or "NM"
}

/** An attempt as the grade recalculation sees it */
export interface MarkedAttempt {
  id: number;
  stdNo: number;
  moduleCode: string;
  marks: string;
  grade: string;
}

export interface GradeCorrection {
  id: number;
  grade: string;
}

export interface StudentSemester {
  id: number;              // ordering key, chronological
  term: string;            // "2024-07"
  semesterNumber: number | null;
  status: string;
  attempts: ModuleAttempt[];
}

export interface StudentProgram {
  id: number;
  stdNo: number;
  structureId: number;
  programCode: string;
  programName: string;
  status: string;
  semesters: StudentSemester[];
}

export interface Student {
  stdNo: number;
  name: string;
  nationalId: string;
}

// ============ Curriculum Types ============

export interface CurriculumRequirement {
  moduleId: number;
  code: string;
  originalName: string;    // "Media & Society II"
  normalizedName: string;  // "media and society 2"
  type: string;
  semesterNumber: number;
  credits: number;
  hidden: boolean;
}

export interface OutstandingResult {
  failedNeverRepeated: CurriculumRequirement[];
  neverAttempted: CurriculumRequirement[];
}

// ============ Clearance Types ============

export type ClearanceStatus = 'pending' | 'approved' | 'rejected';

export interface ClearanceDecision {
  status: Extract<ClearanceStatus, 'pending' | 'approved'>;
  message: string | null;
}

export interface PendingAcademicClearance {
  graduationRequestId: number;
  clearanceId: number;
  stdNo: number;
}

// ============ Registration Types ============

export interface RequestedModule {
  moduleId: number;
  code: string;
  name: string;
}

export interface RegistrationRequest {
  id: number;
  stdNo: number;
  termId: number;
  modules: RequestedModule[];
}

export interface PrerequisiteModule {
  moduleId: number;
  code: string;
  name: string;
}
