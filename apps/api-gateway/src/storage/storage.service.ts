import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as Minio from 'minio';
import { randomUUID } from 'crypto';
import { StorageClient, StorageError, StoredObject } from '@docsense/processing';
import { readNumber } from '../config/config.utils';
import { MINIO_CLIENT } from './storage.constants';

/** Max length of the sanitized file name suffix in the object key */
const MAX_FILENAME_LENGTH = 100;

const DEFAULT_PRESIGNED_URL_TTL_SECONDS = 60 * 60;

/**
 * StorageService — MinIO-backed StorageClient for the processing core.
 *
 * Object key pattern:  {YYYY}/{uuid}-{sanitized-filename}
 * Example:             2026/f3a2b1c0-…-my-report.pdf
 *
 * upload() returns a presigned GET URL next to the key: the analysis
 * service fetches the document itself and has no bucket credentials.
 */
@Injectable()
export class StorageService implements StorageClient, OnModuleInit {
  private readonly logger = new Logger(StorageService.name);
  private readonly bucket: string;
  private readonly presignedUrlTtlSeconds: number;

  constructor(
    @Inject(MINIO_CLIENT) private readonly client: Minio.Client,
    private readonly configService: ConfigService,
  ) {
    this.bucket = this.configService.get<string>('MINIO_BUCKET', 'docsense-documents');
    this.presignedUrlTtlSeconds = readNumber(
      this.configService,
      'MINIO_PRESIGNED_URL_TTL_SECONDS',
      DEFAULT_PRESIGNED_URL_TTL_SECONDS,
    );
  }

  async onModuleInit(): Promise<void> {
    await this.ensureBucketExists();
    this.logger.log(`StorageService ready — bucket: "${this.bucket}"`);
  }

  /**
   * Stores the bytes under a fresh object key.
   *
   * @returns the object key and a presigned URL valid for
   *          MINIO_PRESIGNED_URL_TTL_SECONDS
   * @throws StorageError on any MinIO error
   */
  async upload(bytes: Buffer, filename: string, contentType: string): Promise<StoredObject> {
    const key = this.buildObjectKey(filename);

    this.logger.debug(`Uploading ${key} (${bytes.length} bytes)`);

    try {
      await this.client.putObject(this.bucket, key, bytes, bytes.length, {
        'Content-Type': contentType,
      });
      const url = await this.client.presignedGetObject(
        this.bucket,
        key,
        this.presignedUrlTtlSeconds,
      );

      this.logger.log(`Uploaded "${key}" (${bytes.length} bytes)`);
      return { key, url };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to upload "${key}" to MinIO: ${message}`);
      throw new StorageError(`Failed to store "${filename}": ${message}`, { cause: error });
    }
  }

  /** @throws StorageError on any MinIO error */
  async delete(key: string): Promise<void> {
    try {
      await this.client.removeObject(this.bucket, key);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StorageError(`Failed to delete "${key}": ${message}`, { cause: error });
    }
    this.logger.log(`Deleted "${key}"`);
  }

  // ── Helpers ────────────────────────────────────────────────

  private buildObjectKey(filename: string): string {
    const year = new Date().getFullYear();
    return `${year}/${randomUUID()}-${this.sanitizeFilename(filename)}`;
  }

  /**
   * Strips path traversal characters and whitespace, and truncates
   * to MAX_FILENAME_LENGTH characters.
   */
  private sanitizeFilename(filename: string): string {
    return filename
      .replace(/[^a-zA-Z0-9._-]/g, '_')
      .slice(0, MAX_FILENAME_LENGTH)
      .toLowerCase();
  }

  private async ensureBucketExists(): Promise<void> {
    try {
      const exists = await this.client.bucketExists(this.bucket);
      if (!exists) {
        await this.client.makeBucket(this.bucket, 'us-east-1');
        this.logger.log(`Created bucket "${this.bucket}"`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      // Non-fatal during init: uploads fail with StorageError until MinIO is reachable
      this.logger.error(`Failed to ensure bucket "${this.bucket}" exists: ${message}`);
    }
  }
}
