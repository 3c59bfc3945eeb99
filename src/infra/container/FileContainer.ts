import { mkdir, readFile, rename, rm, stat, unlink, writeFile } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import path from 'node:path';
import { ContainerUnavailableError, ValidationError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { KeyValueContainer } from './KeyValueContainer.js';

const CONTAINER_ERROR_CODES = new Set(['ENOENT', 'ENOTDIR', 'EACCES', 'EPERM', 'EROFS']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Directory-backed container: one file per key, replaced through rename()
 */
export class FileContainer implements KeyValueContainer {
  constructor(private readonly directory: string) {}

  /**
   * Create the directory if needed and verify it is usable
   */
  static async open(directory: string): Promise<FileContainer> {
    try {
      await mkdir(directory, { recursive: true });
      const info = await stat(directory);
      if (!info.isDirectory()) {
        throw new ContainerUnavailableError('Cache path is not a directory', { directory });
      }
    } catch (error) {
      if (error instanceof ContainerUnavailableError) throw error;
      throw new ContainerUnavailableError('Cache directory is not usable', {
        directory,
        code: errorCode(error),
      });
    }
    logger.info('Cache container ready', { directory });
    return new FileContainer(directory);
  }

  describe(): string {
    return this.directory;
  }

  async read(fileName: string): Promise<Uint8Array | null> {
    const filePath = this.resolve(fileName);
    try {
      return await readFile(filePath);
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' && (await this.directoryExists())) {
        return null;
      }
      throw new ContainerUnavailableError('Cache container read failed', { fileName, code });
    }
  }

  async write(fileName: string, data: Uint8Array): Promise<void> {
    const filePath = this.resolve(fileName);
    const tempPath = `${filePath}.${randomUUID()}.tmp`;

    try {
      await writeFile(tempPath, data);
      await rename(tempPath, filePath);
    } catch (error) {
      await unlink(tempPath).catch((cleanupError: unknown) => {
        logger.debug('Temporary cache file not removed', {
          tempPath,
          code: errorCode(cleanupError),
        });
      });

      const code = errorCode(error);
      if (code && CONTAINER_ERROR_CODES.has(code)) {
        throw new ContainerUnavailableError('Cache container write failed', { fileName, code });
      }
      throw error;
    }
  }

  async remove(fileName: string): Promise<void> {
    try {
      await rm(this.resolve(fileName), { force: true });
    } catch (error) {
      throw new ContainerUnavailableError('Cache container remove failed', {
        fileName,
        code: errorCode(error),
      });
    }
  }

  private resolve(fileName: string): string {
    if (!/^[A-Za-z0-9._-]+$/.test(fileName) || fileName.startsWith('.')) {
      throw new ValidationError('Invalid cache file name', { fileName });
    }
    return path.join(this.directory, fileName);
  }

  private async directoryExists(): Promise<boolean> {
    try {
      return (await stat(this.directory)).isDirectory();
    } catch {
      return false;
    }
  }
}
