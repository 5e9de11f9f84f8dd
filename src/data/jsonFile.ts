/**
 * JSON File Storage
 *
 * Each named document is a single JSON array in the data directory.
 * Reads decode the whole file, writes replace it. There is no locking:
 * concurrent writers race and the last write wins.
 */

import fs from 'fs';
import path from 'path';
import { EntityErrorCode } from '../types';
import logger from '../utils/logger';

export class JsonFileStorage {
  constructor(readonly dataDir: string) {}

  pathOf(name: string): string {
    return path.join(this.dataDir, name);
  }

  exists(name: string): boolean {
    return fs.existsSync(this.pathOf(name));
  }

  /**
   * Returns the records stored under name.
   * A missing document reads as empty; so does one that does not decode
   * to a JSON array, after the problem is logged.
   */
  read(name: string): unknown[] {
    const filePath = this.pathOf(name);
    if (!fs.existsSync(filePath)) {
      return [];
    }

    const content = fs.readFileSync(filePath, 'utf-8');
    let decoded: unknown;
    try {
      decoded = JSON.parse(content);
    } catch (error) {
      logger.error(`Invalid data in ${name}`, {
        code: EntityErrorCode.CORRUPT_STORAGE,
        reason: error instanceof Error ? error.message : String(error)
      });
      return [];
    }

    if (!Array.isArray(decoded)) {
      logger.error(`Invalid data in ${name}`, {
        code: EntityErrorCode.CORRUPT_STORAGE,
        reason: 'document is not an array'
      });
      return [];
    }

    return decoded;
  }

  /** Replaces the document with the given records */
  write(name: string, records: readonly unknown[]): void {
    fs.mkdirSync(this.dataDir, { recursive: true });
    fs.writeFileSync(this.pathOf(name), JSON.stringify(records, null, 4), 'utf-8');
  }
}
