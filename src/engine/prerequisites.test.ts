import { findFailedPrerequisites, passedModuleCodes } from './prerequisites.js';
import { attempt } from '../test/builders.js';
import type { PrerequisiteModule } from '../types.js';

const prereq = (moduleId: number, code: string, name: string): PrerequisiteModule => ({ moduleId, code, name });

describe('passedModuleCodes', () => {
  it('collects codes of passed attempts only', () => {
    const passed = passedModuleCodes([
      attempt({ moduleCode: 'dcom1110', grade: 'B' }),
      attempt({ moduleCode: 'DMAT1110', grade: 'F' }),
      attempt({ moduleCode: 'DENG1110', grade: 'PP' }),
      attempt({ moduleCode: 'DBUS1110', grade: 'A', status: 'Delete' }),
      attempt({ moduleCode: 'DLAW1110', grade: '??' }),
    ]);
    expect([...passed]).toEqual(['DCOM1110']);
  });

  it('applies module code aliases', () => {
    const passed = passedModuleCodes([attempt({ moduleCode: 'DDDR110', grade: 'C' })]);
    expect(passed.has('DDDR1110')).toBe(true);
  });
});

describe('findFailedPrerequisites', () => {
  const prerequisites = new Map<number, PrerequisiteModule[]>([
    [20, [prereq(10, 'DCOM1110', 'Computing Concepts & Design I')]],
    [21, [prereq(11, 'DDDR1110', 'Drawing and Rendering'), prereq(12, 'DMAT1110', 'Mathematics I')]],
    [22, []],
  ]);
  const prerequisitesOf = (moduleId: number) => prerequisites.get(moduleId) ?? [];

  it('lists requested modules with prerequisites not passed', () => {
    const failures = findFailedPrerequisites(
      [
        { moduleId: 20, code: 'DCOM1210', name: 'Computing Concepts & Design II' },
        { moduleId: 21, code: 'DDDR1210', name: 'Drawing and Rendering II' },
        { moduleId: 22, code: 'DENG1210', name: 'English II' },
      ],
      prerequisitesOf,
      [
        attempt({ moduleCode: 'DCOM1110', grade: 'F' }),
        attempt({ moduleCode: 'DDDR110', grade: 'B-' }),
      ]
    );

    expect(failures).toEqual([
      {
        module: { moduleId: 20, code: 'DCOM1210', name: 'Computing Concepts & Design II' },
        prerequisites: [prereq(10, 'DCOM1110', 'Computing Concepts & Design I')],
      },
      {
        module: { moduleId: 21, code: 'DDDR1210', name: 'Drawing and Rendering II' },
        prerequisites: [prereq(12, 'DMAT1110', 'Mathematics I')],
      },
    ]);
  });

  it('returns nothing when every prerequisite was passed', () => {
    const failures = findFailedPrerequisites(
      [{ moduleId: 20, code: 'DCOM1210', name: 'Computing Concepts & Design II' }],
      prerequisitesOf,
      [attempt({ moduleCode: 'DCOM1110', grade: 'F' }), attempt({ moduleCode: 'DCOM1110', grade: 'C-' })]
    );
    expect(failures).toEqual([]);
  });
});
