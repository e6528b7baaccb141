import { RegistryDatabase } from '../db/database.js';
import { openFixtureDatabase } from '../test/registry.js';
import { checkPrerequisites, formatPrerequisiteReport } from './checkPrerequisites.js';

describe('checkPrerequisites', () => {
  it('reports requests with failed prerequisites', () => {
    const db = openFixtureDatabase();
    const report = checkPrerequisites(db);
    db.close();

    expect(report.kind).toBe('checked');
    if (report.kind === 'checked') {
      expect(report.term.name).toBe('2025-02');
      expect(report.requests).toBe(2);
      expect(report.issues.map(issue => issue.request.stdNo)).toEqual([901000003]);
    }
    expect(formatPrerequisiteReport(report)).toEqual([
      '⚠️  1 students with prerequisite issues',
      '',
      '1/1) Test Student Three (901000003), request 1',
      '  Module: DCOM1210 - Computing Concepts & Design II',
      '    ↳ DCOM1110 - Computing Concepts & Design I',
    ]);
  });

  it('reports a missing active term', () => {
    const db = new RegistryDatabase(':memory:');
    db.initialize();
    const report = checkPrerequisites(db);
    db.close();

    expect(report).toEqual({ kind: 'no-active-term' });
    expect(formatPrerequisiteReport(report)).toEqual(['❌ No active term found']);
  });
});
