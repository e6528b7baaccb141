import { RegistryDatabase } from '../db/database.js';
import { parseSnapshot } from '../db/snapshot.js';
import { openFixtureDatabase } from '../test/registry.js';
import { approveAcademicGraduation } from './approve.js';

describe('approveAcademicGraduation', () => {
  let db: RegistryDatabase;

  beforeEach(() => {
    db = openFixtureDatabase();
  });

  afterEach(() => {
    db.close();
  });

  it('approves cleared students and refreshes the message of the rest', () => {
    const summary = approveAcademicGraduation(db, { now: () => 1735689600 });

    expect(summary).toEqual({ total: 2, approved: 1, stillPending: 1, failed: 0 });
    expect(db.getClearance(1)).toEqual({ status: 'approved', message: null, responseDate: 1735689600 });

    const pending = db.getClearance(2);
    expect(pending?.status).toBe('pending');
    expect(pending?.responseDate).toBeNull();
    expect(pending?.message).toBe(
      'Academic requirements not met. ' +
      'Failed modules never repeated: DIOP1110 - Media & Society II, DCOM1210 - Computing Concepts & Design II; ' +
      'Required modules never attempted: DRPR4110 - Research Project. ' +
      'Please ensure all program modules are completed successfully before applying for graduation.'
    );
  });

  it('leaves other departments alone', () => {
    approveAcademicGraduation(db, { now: () => 1735689600 });
    expect(db.getClearance(3)).toEqual({ status: 'pending', message: null, responseDate: null });
  });

  it('counts a student without an active program as failed and continues', () => {
    db.importSnapshot(parseSnapshot({
      students: [{ stdNo: 901000004, name: 'Test Student Four', nationalId: '000004' }],
      studentPrograms: [{ id: 5, stdNo: 901000004, structureId: 1, status: 'Deleted' }],
      graduationRequests: [{ id: 3, studentProgramId: 5 }],
      clearances: [{ id: 4, graduationRequestId: 3, department: 'academic' }],
    }));

    const summary = approveAcademicGraduation(db, { now: () => 1735689600 });

    expect(summary).toEqual({ total: 3, approved: 1, stillPending: 1, failed: 1 });
    expect(db.getClearance(4)).toEqual({ status: 'pending', message: null, responseDate: null });
  });

  it('re-evaluates only the clearances still pending', () => {
    approveAcademicGraduation(db);
    const second = approveAcademicGraduation(db);
    expect(second).toEqual({ total: 1, approved: 0, stillPending: 1, failed: 0 });
  });

  it('does nothing when no clearance is pending', () => {
    const empty = new RegistryDatabase(':memory:');
    empty.initialize();
    expect(approveAcademicGraduation(empty)).toEqual({ total: 0, approved: 0, stillPending: 0, failed: 0 });
    empty.close();
  });
});
