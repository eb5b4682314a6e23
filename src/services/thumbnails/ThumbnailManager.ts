import { promises as fs } from 'fs';
import path from 'path';
import { isErrnoException } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { sourceDigest } from './cacheKey';
import { SourceResolver } from './SourceResolver';

// Age after which a temporary file is considered abandoned
export const STALE_TEMP_MS = 10 * 60 * 1000;

const isTemporary = (file: string): boolean => file.endsWith('.tmp');

/**
 * Maintenance of the thumbnail directory: listing and deleting thumbnails,
 * all of them or those of one source.
 */
export class ThumbnailManager {
  private readonly targetDir: string;

  constructor(targetDir: string, private readonly sources: SourceResolver) {
    this.targetDir = path.resolve(targetDir);
  }

  /**
   * Names of the cached thumbnails, sorted. With a source, only its own.
   */
  async get(sourceRef?: string): Promise<string[]> {
    const files = await this.listFiles();
    if (sourceRef === undefined) {
      return files;
    }
    const prefix = `${sourceDigest(this.sources.normalize(sourceRef))}_`;
    return files.filter((file) => file.startsWith(prefix));
  }

  /** Deletes the thumbnails of a source, returning how many */
  async clear(sourceRef: string): Promise<number> {
    return this.remove(await this.get(sourceRef));
  }

  /**
   * Deletes every thumbnail, returning how many. Temporary files are only
   * deleted once they are older than `STALE_TEMP_MS`; younger ones may still
   * be renamed into place by a running write.
   */
  async clearAll(): Promise<number> {
    const files = await this.listFiles(true);
    const stale: string[] = [];
    for (const file of files.filter(isTemporary)) {
      if (await this.isStale(file)) {
        stale.push(file);
      }
    }
    return this.remove([...files.filter((file) => !isTemporary(file)), ...stale]);
  }

  private async isStale(file: string): Promise<boolean> {
    try {
      const { mtimeMs } = await fs.stat(path.join(this.targetDir, file));
      return Date.now() - mtimeMs > STALE_TEMP_MS;
    } catch (error) {
      // Renamed into place meanwhile
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  private async listFiles(includeTemporary: boolean = false): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.targetDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && (includeTemporary || !isTemporary(entry.name)))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }

  private async remove(files: string[]): Promise<number> {
    for (const file of files) {
      await fs.rm(path.join(this.targetDir, file), { force: true });
    }
    logger.info('Thumbnails deleted', { count: files.length, targetDir: this.targetDir });
    return files.length;
  }
}
