import type { z } from 'zod';
import {
  CacheCorruptionError,
  CacheWriteError,
  ContainerUnavailableError,
  describeError,
} from '../../domain/errors.js';
import { err, ok, type Result } from '../../domain/result.js';
import { logger } from '../logger.js';
import type { KeyValueContainer } from '../container/KeyValueContainer.js';
import { RECORD_VERSION, recordEnvelopeSchema } from './records.js';

export interface StoredRecord<T> {
  writtenAt: Date;
  data: T;
}

/**
 * One cache slot stored as a self-describing JSON record.
 *
 * Reads never throw: a missing, corrupt or unreachable record reads as null.
 * Writes never throw either; they return a failed Result and leave the
 * previous record in place.
 */
export abstract class JsonRecordRepository<T> {
  protected constructor(
    protected readonly container: KeyValueContainer,
    readonly fileName: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  /**
   * Whether a stored value may still be served at `now`
   */
  abstract isValid(value: T, now: Date): boolean;

  async load(): Promise<T | null> {
    const record = await this.readRecord();
    return record ? record.data : null;
  }

  async loadValid(now: Date): Promise<T | null> {
    const value = await this.load();
    if (value === null) return null;
    if (!this.isValid(value, now)) {
      logger.debug('Cache record is stale', { fileName: this.fileName });
      return null;
    }
    return value;
  }

  async shouldRefresh(now: Date): Promise<boolean> {
    return (await this.loadValid(now)) === null;
  }

  async readRecord(): Promise<StoredRecord<T> | null> {
    let bytes: Uint8Array | null;
    try {
      bytes = await this.container.read(this.fileName);
    } catch (error) {
      this.logReadFailure(error);
      return null;
    }
    if (bytes === null) return null;

    const decoded = this.decode(bytes);
    if (!decoded.ok) {
      logger.warn('Ignoring corrupt cache record', {
        fileName: this.fileName,
        error: decoded.error.message,
        details: decoded.error.details,
      });
      return null;
    }
    return decoded.value;
  }

  async save(value: T, writtenAt: Date = new Date()): Promise<Result<void, CacheWriteError>> {
    const payload = JSON.stringify(
      { version: RECORD_VERSION, writtenAt: writtenAt.toISOString(), data: value },
      null,
      2
    );

    try {
      await this.container.write(this.fileName, Buffer.from(payload, 'utf8'));
      return ok(undefined);
    } catch (error) {
      return err(this.writeFailure('Cache write failed', error));
    }
  }

  async clear(): Promise<Result<void, CacheWriteError>> {
    try {
      await this.container.remove(this.fileName);
      return ok(undefined);
    } catch (error) {
      return err(this.writeFailure('Cache clear failed', error));
    }
  }

  private decode(bytes: Uint8Array): Result<StoredRecord<T>, CacheCorruptionError> {
    let raw: unknown;
    try {
      raw = JSON.parse(Buffer.from(bytes).toString('utf8'));
    } catch (error) {
      return err(new CacheCorruptionError(this.fileName, { reason: describeError(error) }));
    }

    const envelope = recordEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      return err(new CacheCorruptionError(this.fileName, { issues: envelope.error.issues }));
    }

    const data = this.schema.safeParse(envelope.data.data);
    if (!data.success) {
      return err(new CacheCorruptionError(this.fileName, { issues: data.error.issues }));
    }

    return ok({ writtenAt: envelope.data.writtenAt, data: data.data });
  }

  private logReadFailure(error: unknown): void {
    if (error instanceof ContainerUnavailableError) {
      logger.error('Cache container unavailable', {
        severity: 'critical',
        container: this.container.describe(),
        fileName: this.fileName,
        details: error.details,
      });
      return;
    }
    logger.error('Cache read failed', { fileName: this.fileName, error: describeError(error) });
  }

  private writeFailure(message: string, error: unknown): CacheWriteError {
    logger.error(message, {
      severity: error instanceof ContainerUnavailableError ? 'critical' : 'error',
      container: this.container.describe(),
      fileName: this.fileName,
      error: describeError(error),
    });
    return new CacheWriteError(this.fileName, { reason: describeError(error) });
  }
}
