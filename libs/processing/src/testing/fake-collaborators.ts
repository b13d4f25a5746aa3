import { Injectable } from '@nestjs/common';
import { OperationStage } from '../enums/operation-stage.enum';
import {
  AnalysisClient,
  StorageClient,
  StoredObject,
} from '../interfaces/collaborators.interface';
import { ExtractionPayload } from '../interfaces/document-task.interface';
import { OperationStatus } from '../interfaces/operation.interface';

const STORAGE_BASE_URL = 'https://storage.test';
const OPERATIONS_BASE_URL = 'https://analysis.test/operations/';

/** In-memory object store. Set `failWith` to make every upload reject. */
@Injectable()
export class InMemoryStorage implements StorageClient {
  readonly objects = new Map<string, { bytes: Buffer; contentType: string }>();
  readonly deleted: string[] = [];
  failWith: Error | null = null;
  deleteFailsWith: Error | null = null;
  private sequence = 0;

  async upload(bytes: Buffer, filename: string, contentType: string): Promise<StoredObject> {
    if (this.failWith) throw this.failWith;

    const key = `uploads/${++this.sequence}-${filename}`;
    this.objects.set(key, { bytes, contentType });
    return { key, url: `${STORAGE_BASE_URL}/${key}` };
  }

  async delete(key: string): Promise<void> {
    if (this.deleteFailsWith) throw this.deleteFailsWith;
    this.deleted.push(key);
    this.objects.delete(key);
  }
}

export type StatusScript = (
  documentUrl: string,
  attempt: number,
) => OperationStatus<ExtractionPayload>;

/**
 * Analysis stand-in. The operation handle encodes the submitted URL, and the
 * default script succeeds on the first query with one field echoing that URL.
 */
@Injectable()
export class ScriptedAnalysis implements AnalysisClient {
  readonly submitted: string[] = [];
  submitFailsWith: Error | null = null;
  script: StatusScript = (documentUrl) => ({
    stage: OperationStage.SUCCEEDED,
    payload: { fields: [{ name: 'source', value: documentUrl, confidence: 0.99 }] },
  });
  private readonly attempts = new Map<string, number>();

  async submit(documentUrl: string): Promise<string> {
    if (this.submitFailsWith) throw this.submitFailsWith;
    this.submitted.push(documentUrl);
    return OPERATIONS_BASE_URL + encodeURIComponent(documentUrl);
  }

  async fetchStatus(operationHandle: string): Promise<OperationStatus<ExtractionPayload>> {
    const attempt = (this.attempts.get(operationHandle) ?? 0) + 1;
    this.attempts.set(operationHandle, attempt);
    const documentUrl = decodeURIComponent(operationHandle.slice(OPERATIONS_BASE_URL.length));
    return this.script(documentUrl, attempt);
  }
}
