/**
 * Load a JSON registry snapshot into the local database
 */

import { readFileSync } from 'fs';
import type { RegistryDatabase } from '../db/database.js';
import { parseSnapshot } from '../db/snapshot.js';
import { RecordParseError } from '../errors.js';

export function parseSnapshotText(text: string) {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new RecordParseError('snapshot', '(file)', err.message);
    }
    throw err;
  }
  return parseSnapshot(raw);
}

export function importSnapshotFile(db: RegistryDatabase, filePath: string): number {
  const snapshot = parseSnapshotText(readFileSync(filePath, 'utf-8'));
  return db.importSnapshot(snapshot);
}
