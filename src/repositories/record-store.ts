import fs from 'fs';
import path from 'path';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

/**
 * Record Store
 *
 * Persistence backend for the catalog: named text documents holding one
 * record per line. Reads and writes are synchronous so a catalog operation
 * finishes its saves before returning.
 */
export interface RecordStore {
  /** Returns null when the document does not exist yet */
  read(name: string): string | null;
  write(name: string, contents: string): void;
}

/**
 * Stores each document as a file under a data directory
 */
export class FileRecordStore implements RecordStore {
  constructor(private readonly directory: string) {}

  read(name: string): string | null {
    const filePath = this.resolve(name);
    if (!fs.existsSync(filePath)) {
      logger.debug('Record file not found, treating as empty', { filePath });
      return null;
    }

    try {
      return fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      logger.error('Failed to read record file', { filePath, error });
      throw new AppError(ErrorCode.STORAGE_ERROR, `Failed to read ${name}`, 500);
    }
  }

  write(name: string, contents: string): void {
    const filePath = this.resolve(name);

    try {
      fs.mkdirSync(this.directory, { recursive: true });
      fs.writeFileSync(filePath, contents, 'utf8');
    } catch (error) {
      logger.error('Failed to write record file', { filePath, error });
      throw new AppError(ErrorCode.STORAGE_ERROR, `Failed to write ${name}`, 500);
    }

    logger.debug('Record file written', { filePath, bytes: Buffer.byteLength(contents) });
  }

  private resolve(name: string): string {
    return path.join(this.directory, name);
  }
}

/**
 * Keeps documents in memory; used by tests and throwaway instances
 */
export class MemoryRecordStore implements RecordStore {
  private readonly documents = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [name, contents] of Object.entries(initial)) {
      this.documents.set(name, contents);
    }
  }

  read(name: string): string | null {
    return this.documents.get(name) ?? null;
  }

  write(name: string, contents: string): void {
    this.documents.set(name, contents);
  }
}
