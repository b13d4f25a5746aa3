import {
  DocumentTask,
  ExtractedField,
  LifecycleState,
  TaskError,
} from '@docsense/processing';

/**
 * Response body for GET /documents/:id and POST /documents/analyze.
 *
 * A flattened view of the task snapshot: `fields` and `rawResult` are set
 * only for a COMPLETED task and `error` only for a FAILED one.
 */
export class DocumentStatusResponseDto {
  documentId!: string;

  /** queued → uploading → … → completed | failed */
  state!: LifecycleState;

  filename!: string;

  contentType!: string;

  fileSizeBytes!: number;

  /** URL the analysis service was given, once the document is stored */
  storageLocation!: string | null;

  fields!: ExtractedField[] | null;

  /** Analyzer response the fields came from; completed tasks only */
  rawResult!: Record<string, unknown> | null;

  error!: TaskError | null;

  /** ISO 8601 UTC */
  createdAt!: string;

  /** ISO 8601 UTC */
  updatedAt!: string;

  static fromTask(task: DocumentTask): DocumentStatusResponseDto {
    const dto = new DocumentStatusResponseDto();
    dto.documentId = task.id;
    dto.state = task.state;
    dto.filename = task.sourceFilename;
    dto.contentType = task.contentType;
    dto.fileSizeBytes = task.sizeBytes;
    dto.storageLocation = task.storageLocation ?? null;
    dto.fields = task.result?.status === 'succeeded' ? task.result.payload.fields : null;
    dto.rawResult =
      task.result?.status === 'succeeded' ? task.result.payload.rawResult ?? null : null;
    dto.error = task.result?.status === 'failed' ? task.result.error : null;
    dto.createdAt = task.createdAt.toISOString();
    dto.updatedAt = task.updatedAt.toISOString();
    return dto;
  }
}
