/**
 * Grade Classifier
 * Maps raw symbols and marks to catalog grades and answers pass/fail questions
 */

import { InvalidGradeError } from '../errors.js';
import { defaultCatalog, type GradeCatalog } from './catalog.js';

// Failing is an explicit list: administrative grades also carry no points
// but are not failures.
const FAILING_GRADES: ReadonlySet<string> = new Set([
  'F', 'X', 'GNS', 'ANN', 'FIN', 'FX', 'DNC', 'DNA', 'DNS',
]);

const SUPPLEMENTARY_GRADE = 'PP';

export const NO_MARK = 'NM';

export type GradeResult =
  | { ok: true; symbol: string }
  | { ok: false; error: InvalidGradeError };

export class GradeClassifier {
  constructor(readonly catalog: GradeCatalog = defaultCatalog) {}

  /**
   * Trim and uppercase a raw symbol
   * @throws InvalidGradeError when the result is not in the catalog
   */
  normalize(raw: string): string {
    const symbol = raw.trim().toUpperCase();
    if (!this.catalog.has(symbol)) {
      throw new InvalidGradeError(raw);
    }
    return symbol;
  }

  /**
   * Like normalize(), but returns undefined for empty or unknown input
   */
  tryNormalize(raw: string | null | undefined): string | undefined {
    if (raw == null) return undefined;
    const symbol = raw.trim().toUpperCase();
    return this.catalog.has(symbol) ? symbol : undefined;
  }

  classify(raw: string): GradeResult {
    const symbol = raw.trim().toUpperCase();
    if (this.catalog.has(symbol)) {
      return { ok: true, symbol };
    }
    return { ok: false, error: new InvalidGradeError(raw) };
  }

  /**
   * Grade for a numeric mark. Fractions are truncated: 49.9 -> 49 -> PP.
   */
  gradeFromMarks(marks: number): string | undefined {
    if (!Number.isFinite(marks)) return undefined;
    const mark = Math.trunc(marks);

    for (const def of this.catalog.rangedDescending()) {
      const range = def.markRange;
      if (range && range.min <= mark && mark <= range.max) {
        return def.symbol;
      }
    }
    return undefined;
  }

  /**
   * Grade for a marks string as stored by the portal ("72", "64.5", "NM")
   */
  gradeFromMarksString(raw: string): string | undefined {
    const trimmed = raw.trim();
    if (!/^-?\d+(\.\d+)?$/.test(trimmed)) return undefined;
    return this.gradeFromMarks(Number(trimmed));
  }

  gradePoints(symbol: string): number | undefined {
    return this.catalog.get(symbol)?.points;
  }

  describe(symbol: string): string | undefined {
    return this.catalog.get(symbol)?.description;
  }

  isPassing(symbol: string): boolean {
    const points = this.gradePoints(symbol);
    return points !== undefined && points > 0;
  }

  isFailing(symbol: string): boolean {
    return FAILING_GRADES.has(symbol);
  }

  isSupplementary(symbol: string): boolean {
    return symbol === SUPPLEMENTARY_GRADE;
  }

  isFailingOrSupplementary(symbol: string): boolean {
    return this.isFailing(symbol) || this.isSupplementary(symbol);
  }

  /** True for administrative grades (EXP, DEF, NM) and unknown symbols */
  hasNoPoints(symbol: string): boolean {
    return this.gradePoints(symbol) === undefined;
  }

  passingGrades(): string[] {
    return this.catalog.all().filter(def => this.isPassing(def.symbol)).map(def => def.symbol);
  }

  failingGrades(): string[] {
    return this.catalog.all().filter(def => this.isFailing(def.symbol)).map(def => def.symbol);
  }
}

export const defaultClassifier = new GradeClassifier();

/**
 * Classify a raw grade against the process-wide catalog
 */
export function classifyGrade(raw: string, classifier: GradeClassifier = defaultClassifier): GradeResult {
  return classifier.classify(raw);
}
