import { normalizeModuleCode, normalizeModuleName } from './moduleNameParser.js';

describe('normalizeModuleName', () => {
  it('gives the same key for ampersand and roman numeral variants', () => {
    expect(normalizeModuleName('Computing Concepts & Design I')).toBe('computing concepts and design 1');
    expect(normalizeModuleName('computing concepts and design 1')).toBe('computing concepts and design 1');
  });

  it('collapses whitespace', () => {
    expect(normalizeModuleName('  Research   Project\tX ')).toBe('research project 10');
  });

  it('only converts whole words', () => {
    expect(normalizeModuleName('Vision Studies IV')).toBe('vision studies 4');
    expect(normalizeModuleName('Mixed Media')).toBe('mixed media');
  });

  it('leaves object property names alone', () => {
    expect(normalizeModuleName('Constructor Theory')).toBe('constructor theory');
  });

  it('returns an empty key for a blank name', () => {
    expect(normalizeModuleName('   ')).toBe('');
  });
});

describe('normalizeModuleCode', () => {
  it('trims and uppercases', () => {
    expect(normalizeModuleCode(' diop1110 ')).toBe('DIOP1110');
  });

  it('maps aliased codes', () => {
    expect(normalizeModuleCode('dddr110')).toBe('DDDR1110');
    expect(normalizeModuleCode('DDDR1110')).toBe('DDDR1110');
  });
});
