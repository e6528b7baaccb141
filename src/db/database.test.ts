import { RegistryDatabase } from './database.js';
import { parseSnapshot } from './snapshot.js';
import { openFixtureDatabase } from '../test/registry.js';

describe('RegistryDatabase', () => {
  let db: RegistryDatabase;

  beforeEach(() => {
    db = openFixtureDatabase();
  });

  afterEach(() => {
    db.close();
  });

  it('counts imported rows', () => {
    expect(db.getStats()).toEqual({
      students: 3,
      programs: 2,
      modules: 6,
      attempts: 10,
      pendingClearances: 2,
    });
  });

  it('reads a student', () => {
    expect(db.getStudent(901000002)).toEqual({ stdNo: 901000002, name: 'Test Student Two', nationalId: '000002' });
    expect(db.getStudent(1)).toBeUndefined();
  });

  it('loads programs with semesters and attempts', () => {
    const programs = db.getStudentPrograms(901000003);

    expect(programs.map(p => [p.id, p.status, p.programName])).toEqual([
      [3, 'Changed', 'Diploma in Business Management'],
      [4, 'Active', 'BSc in Information Technology'],
    ]);
    expect(programs[1].semesters).toHaveLength(1);
    expect(programs[1].semesters[0].attempts).toEqual([
      {
        id: 1009,
        semesterModuleId: 100,
        moduleCode: 'DCOM1110',
        moduleName: 'Computing Concepts & Design I',
        status: 'Compulsory',
        marks: '20',
        grade: 'F',
        credits: 3,
      },
      {
        id: 1010,
        semesterModuleId: 101,
        moduleCode: 'DIOP1110',
        moduleName: 'Media & Society II',
        status: 'Compulsory',
        marks: '57',
        grade: 'C',
        credits: 3,
      },
    ]);
  });

  it('returns visible requirements in semester order', () => {
    const requirements = db.getVisibleRequirements(1);

    expect(requirements.map(r => r.code)).toEqual(['DCOM1110', 'DIOP1110', 'DRPR4110', 'DCOM1210']);
    expect(requirements[1]).toEqual({
      moduleId: 11,
      code: 'DIOP1110',
      originalName: 'Media & Society II',
      normalizedName: 'media and society 2',
      type: 'Major',
      semesterNumber: 1,
      credits: 3,
      hidden: false,
    });
  });

  it('reads prerequisites', () => {
    expect(db.getPrerequisites(13)).toEqual([
      { moduleId: 10, code: 'DCOM1110', name: 'Computing Concepts & Design I' },
    ]);
    expect(db.getPrerequisites(10)).toEqual([]);
  });

  it('finds active students in the given terms', () => {
    expect(db.getActiveStudentsInTerms(['2024-07'])).toEqual([901000001, 901000002]);
    expect(db.getActiveStudentsInTerms(['2023-02'])).toEqual([]);
    expect(db.getActiveStudentsInTerms([])).toEqual([]);
  });

  it('reads the active term and its registration requests', () => {
    expect(db.getActiveTerm()).toEqual({ id: 1, name: '2025-02', semester: 1 });

    const requests = db.getRegistrationRequests(1);
    expect(requests.map(r => r.stdNo)).toEqual([901000003, 901000001]);
    expect(requests[0].modules).toEqual([
      { moduleId: 13, code: 'DCOM1210', name: 'Computing Concepts & Design II' },
    ]);
  });

  it('lists pending academic clearances only', () => {
    expect(db.getPendingAcademicClearances()).toEqual([
      { graduationRequestId: 1, clearanceId: 1, stdNo: 901000001 },
      { graduationRequestId: 2, clearanceId: 2, stdNo: 901000002 },
    ]);
    expect(db.getApprovedAcademicStudents()).toEqual([]);
  });

  it('applies clearance decisions', () => {
    db.applyClearanceDecision(2, { status: 'pending', message: 'Academic requirements not met.' }, 1700000000);
    expect(db.getClearance(2)).toEqual({ status: 'pending', message: 'Academic requirements not met.', responseDate: null });

    db.applyClearanceDecision(2, { status: 'approved', message: null }, 1700000000);
    expect(db.getClearance(2)).toEqual({ status: 'approved', message: null, responseDate: 1700000000 });
    expect(db.getApprovedAcademicStudents()).toEqual([901000002]);
  });

  it('replaces rows on a second import', () => {
    const written = db.importSnapshot(parseSnapshot({
      students: [{ stdNo: 901000001, name: 'Renamed Student', nationalId: '000001' }],
    }));

    expect(written).toBe(1);
    expect(db.getStudent(901000001)?.name).toBe('Renamed Student');
    expect(db.getStats().students).toBe(3);
  });

  it('falls back to Unknown Program when the structure is missing', () => {
    const raw = new RegistryDatabase(':memory:');
    raw.initialize();
    raw.importSnapshot(parseSnapshot({
      students: [{ stdNo: 5, name: 'Test Student', nationalId: '5' }],
      studentPrograms: [{ id: 1, stdNo: 5, structureId: 99, status: 'Active' }],
      studentSemesters: [{ id: 1, studentProgramId: 1, term: '2024-02', status: 'Active' }],
    }));

    expect(raw.getStudentPrograms(5)).toEqual([
      {
        id: 1,
        stdNo: 5,
        structureId: 99,
        status: 'Active',
        programCode: '',
        programName: 'Unknown Program',
        semesters: [{ id: 1, term: '2024-02', semesterNumber: null, status: 'Active', attempts: [] }],
      },
    ]);
    expect(raw.getClearance(1)).toBeUndefined();
    raw.close();
  });
});
