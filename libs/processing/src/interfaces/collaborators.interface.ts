import { ExtractionPayload } from './document-task.interface';
import { OperationStatus } from './operation.interface';

export interface StoredObject {
  /** Adapter-specific locator, passed back to delete() */
  key: string;
  /** URL the analysis service can fetch the document from */
  url: string;
}

/**
 * Object storage collaborator.
 * Implementations throw StorageError on failure.
 */
export interface StorageClient {
  upload(bytes: Buffer, filename: string, contentType: string): Promise<StoredObject>;
  delete(key: string): Promise<void>;
}

/**
 * Long-running analysis collaborator.
 *
 * submit() throws SubmissionError; fetchStatus() throws PollingError for
 * transient failures, which the poller retries.
 */
export interface AnalysisClient {
  submit(documentUrl: string): Promise<string>;
  fetchStatus(
    operationHandle: string,
    signal?: AbortSignal,
  ): Promise<OperationStatus<ExtractionPayload>>;
}
