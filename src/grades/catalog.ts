/**
 * Grade Catalog
 * Immutable table of grade symbols, loaded once from gradeCatalog.json
 */

import { z } from 'zod';
import catalogData from './gradeCatalog.json' with { type: 'json' };
import { ConfigError } from '../errors.js';
import type { GradeDefinition } from '../types.js';

const MarkRangeSchema = z
  .object({
    min: z.number().int().min(0),
    max: z.number().int().min(0),
  })
  .refine(range => range.min <= range.max, { message: 'min must not exceed max' });

const GradeDefinitionSchema = z.object({
  symbol: z.string().min(1),
  points: z.number().min(0).optional(),
  category: z.enum(['distinction', 'merit', 'pass', 'pass-provisional', 'fail', 'administrative']),
  description: z.string(),
  markRange: MarkRangeSchema.optional(),
});

const CatalogFileSchema = z.object({
  source: z.string().optional(),
  grades: z.array(GradeDefinitionSchema).min(1),
});

export class GradeCatalog {
  private readonly bySymbol: ReadonlyMap<string, GradeDefinition>;
  private readonly definitions: readonly GradeDefinition[];
  private readonly ranged: readonly GradeDefinition[];

  constructor(definitions: readonly GradeDefinition[]) {
    const bySymbol = new Map<string, GradeDefinition>();

    for (const def of definitions) {
      if (def.symbol !== def.symbol.trim().toUpperCase()) {
        throw new ConfigError(`Grade symbol "${def.symbol}" must be trimmed uppercase`);
      }
      if (bySymbol.has(def.symbol)) {
        throw new ConfigError(`Duplicate grade symbol "${def.symbol}"`);
      }
      bySymbol.set(def.symbol, Object.freeze({
        ...def,
        markRange: def.markRange ? Object.freeze({ ...def.markRange }) : undefined,
      }));
    }

    // Highest band first; neighbouring bands may touch but never share a mark
    const ranged = [...bySymbol.values()]
      .filter(def => def.markRange !== undefined)
      .sort((a, b) => (b.markRange?.min ?? 0) - (a.markRange?.min ?? 0));

    for (let i = 1; i < ranged.length; i++) {
      const upper = ranged[i - 1].markRange;
      const lower = ranged[i].markRange;
      if (upper && lower && lower.max >= upper.min) {
        throw new ConfigError(
          `Mark ranges of ${ranged[i - 1].symbol} and ${ranged[i].symbol} overlap`
        );
      }
    }

    this.bySymbol = bySymbol;
    this.definitions = Object.freeze([...bySymbol.values()]);
    this.ranged = Object.freeze(ranged);
    Object.freeze(this);
  }

  get(symbol: string): GradeDefinition | undefined {
    return this.bySymbol.get(symbol);
  }

  has(symbol: string): boolean {
    return this.bySymbol.has(symbol);
  }

  all(): readonly GradeDefinition[] {
    return this.definitions;
  }

  /** Grades with a mark range, sorted by descending min */
  rangedDescending(): readonly GradeDefinition[] {
    return this.ranged;
  }

  get size(): number {
    return this.bySymbol.size;
  }
}

/**
 * Validate raw catalog JSON and build a catalog from it
 */
export function parseGradeCatalog(raw: unknown): GradeCatalog {
  const parsed = CatalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid grade catalog at ${issue.path.join('.')}: ${issue.message}`);
  }
  return new GradeCatalog(parsed.data.grades);
}

// Process-wide catalog, built on first import
export const defaultCatalog = parseGradeCatalog(catalogData);
