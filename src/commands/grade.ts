/**
 * Grade lookup: catalog entry for a symbol, or the grade a mark earns
 */

import { defaultClassifier, type GradeClassifier } from '../grades/classifier.js';
import type { GradeDefinition } from '../types.js';

export type GradeLookup =
  | { ok: true; definition: GradeDefinition; passing: boolean; failing: boolean }
  | { ok: false; message: string };

function describeDefinition(classifier: GradeClassifier, symbol: string): GradeLookup {
  const definition = classifier.catalog.get(symbol);
  if (!definition) {
    return { ok: false, message: `Grade ${symbol} is not in the catalog` };
  }
  return {
    ok: true,
    definition,
    passing: classifier.isPassing(symbol),
    failing: classifier.isFailing(symbol),
  };
}

export function lookupGrade(raw: string, classifier: GradeClassifier = defaultClassifier): GradeLookup {
  const result = classifier.classify(raw);
  if (!result.ok) {
    return { ok: false, message: result.error.message };
  }
  return describeDefinition(classifier, result.symbol);
}

export function lookupMarks(rawMarks: string, classifier: GradeClassifier = defaultClassifier): GradeLookup {
  const symbol = classifier.gradeFromMarksString(rawMarks);
  if (symbol === undefined) {
    return { ok: false, message: `No grade covers marks "${rawMarks.trim()}"` };
  }
  return describeDefinition(classifier, symbol);
}

export function formatGradeLookup(lookup: GradeLookup): string[] {
  if (!lookup.ok) return [`❌ ${lookup.message}`];

  const { definition } = lookup;
  const range = definition.markRange ? `${definition.markRange.min}-${definition.markRange.max}` : '-';
  const points = definition.points === undefined ? 'none' : definition.points.toFixed(2);
  const standing = lookup.passing ? 'passing' : lookup.failing ? 'failing' : 'not passing';

  return [
    `  Grade:       ${definition.symbol}`,
    `  Description: ${definition.description}`,
    `  Points:      ${points}`,
    `  Marks:       ${range}`,
    `  Standing:    ${standing}`,
  ];
}
