/**
 * Atomic Storage Module
 *
 * Crash-safe file operations for persisted issuance state.
 * Uses write-to-temp + fsync + atomic-rename so a crash mid-write leaves
 * either the old file or the new file intact, never a partial one.
 */

import * as fs from 'fs';
import * as path from 'path';
import { sha256 } from '../crypto';
import { describeError, logger } from '../observability/structured-logger';

/**
 * File wrapper with checksum for corruption detection
 */
export interface ChecksummedFile<T> {
  version: number;        // Schema version for future migrations
  checksum: string;       // SHA-256 of the serialized data
  data: T;
  writtenAt: number;
}

export interface ReadResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  recoveredFromBackup?: boolean;
}

function isChecksummedFile(value: unknown): value is ChecksummedFile<unknown> {
  if (value === null || typeof value !== 'object') return false;
  return 'version' in value && 'checksum' in value && 'data' in value;
}

/**
 * Atomic file writer with checksums and backup recovery
 */
export class AtomicStorage {
  private static readonly CURRENT_VERSION = 1;
  private static readonly TEMP_SUFFIX = '.tmp';
  private static readonly BACKUP_SUFFIX = '.bak';

  /**
   * 1. Serialize data with checksum
   * 2. Write to temporary file and fsync
   * 3. Move the existing file to .bak
   * 4. Atomic rename temp -> target
   */
  static writeFileAtomic<T>(filePath: string, data: T): void {
    const tempPath = filePath + this.TEMP_SUFFIX;
    const backupPath = filePath + this.BACKUP_SUFFIX;

    const jsonData = JSON.stringify(data, null, 2);
    const wrapper: ChecksummedFile<T> = {
      version: this.CURRENT_VERSION,
      checksum: sha256(jsonData),
      data,
      writtenAt: Date.now(),
    };

    const dir = path.dirname(filePath);
    fs.mkdirSync(dir, { recursive: true });

    const fd = fs.openSync(tempPath, 'w');
    try {
      fs.writeSync(fd, JSON.stringify(wrapper, null, 2));
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }

    if (fs.existsSync(filePath)) {
      try {
        fs.rmSync(backupPath, { force: true });
        fs.renameSync(filePath, backupPath);
      } catch (err) {
        // The temp file is complete; losing the backup only costs recovery depth
        logger.warn('AtomicStorage', 'Backup failed', { filePath, error: describeError(err) });
      }
    }

    fs.renameSync(tempPath, filePath);
  }

  /**
   * Read with checksum verification, falling back to the backup file and
   * restoring it over a corrupt main file.
   */
  static readFileAtomic<T>(filePath: string, validate: (data: unknown) => data is T): ReadResult<T> {
    const mainResult = this.tryReadFile(filePath, validate);
    if (mainResult.success) {
      return mainResult;
    }

    const backupResult = this.tryReadFile(filePath + this.BACKUP_SUFFIX, validate);
    if (backupResult.success && backupResult.data !== undefined) {
      logger.warn('AtomicStorage', 'Recovered from backup', { filePath, mainError: mainResult.error });
      this.writeFileAtomic(filePath, backupResult.data);
      return { success: true, data: backupResult.data, recoveredFromBackup: true };
    }

    return {
      success: false,
      error: `Both main file and backup are unreadable: ${mainResult.error}`,
    };
  }

  private static tryReadFile<T>(filePath: string, validate: (data: unknown) => data is T): ReadResult<T> {
    if (!fs.existsSync(filePath)) {
      return { success: false, error: 'File does not exist' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (err) {
      return { success: false, error: `Invalid JSON: ${describeError(err)}` };
    }

    if (!isChecksummedFile(parsed)) {
      return { success: false, error: 'Missing checksum wrapper' };
    }

    const calculated = sha256(JSON.stringify(parsed.data, null, 2));
    if (calculated !== parsed.checksum) {
      return { success: false, error: `Checksum mismatch: expected ${parsed.checksum}, got ${calculated}` };
    }

    if (!validate(parsed.data)) {
      return { success: false, error: 'Unexpected data shape' };
    }
    return { success: true, data: parsed.data };
  }

  static exists(filePath: string): boolean {
    return fs.existsSync(filePath) || fs.existsSync(filePath + this.BACKUP_SUFFIX);
  }

  /**
   * Clean up orphaned temp files from interrupted writes
   */
  static cleanupTempFiles(directory: string): number {
    if (!fs.existsSync(directory)) {
      return 0;
    }

    let cleaned = 0;
    for (const file of fs.readdirSync(directory)) {
      if (!file.endsWith(this.TEMP_SUFFIX)) continue;
      fs.rmSync(path.join(directory, file), { force: true });
      cleaned++;
      logger.info('AtomicStorage', 'Cleaned up orphaned temp file', { file });
    }
    return cleaned;
  }
}
