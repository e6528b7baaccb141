/**
 * Registry error types
 *
 * Only malformed data and bad configuration are thrown. Expected business
 * outcomes (no program, no semesters, no valid grades) are result values.
 */

export type RegistryErrorCode = 'INVALID_GRADE' | 'RECORD_PARSE' | 'CONFIG';

export class RegistryError extends Error {
  readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A grade symbol that is not in the catalog after normalization */
export class InvalidGradeError extends RegistryError {
  readonly raw: string;

  constructor(raw: string) {
    super('INVALID_GRADE', `Invalid grade symbol: ${raw.trim().toUpperCase()}`);
    this.raw = raw;
  }
}

/** A database row or snapshot record that is missing or has a malformed field */
export class RecordParseError extends RegistryError {
  readonly record: string;
  readonly field: string;

  constructor(record: string, field: string, detail: string) {
    super('RECORD_PARSE', `${record}.${field}: ${detail}`);
    this.record = record;
    this.field = field;
  }
}

export class ConfigError extends RegistryError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}
