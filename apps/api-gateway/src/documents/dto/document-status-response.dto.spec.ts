import { DocumentTask, FailureKind, LifecycleState } from '@docsense/processing';
import { DocumentStatusResponseDto } from './document-status-response.dto';

describe('DocumentStatusResponseDto', () => {
  const createdAt = new Date('2026-03-01T10:00:00.000Z');
  const updatedAt = new Date('2026-03-01T10:00:05.000Z');

  const baseTask: DocumentTask = {
    id: 'doc-1',
    state: LifecycleState.COMPLETED,
    sourceFilename: 'invoice.pdf',
    contentType: 'application/pdf',
    sizeBytes: 13,
    storageLocation: 'https://storage.test/uploads/1-invoice.pdf',
    storageKey: 'uploads/1-invoice.pdf',
    operationHandle: 'https://analyzer.test/operations/1',
    createdAt,
    updatedAt,
  };

  it('carries the analyzer response of a completed task', () => {
    const rawResult = { status: 'Succeeded', result: { contents: [] } };

    const dto = DocumentStatusResponseDto.fromTask({
      ...baseTask,
      result: {
        status: 'succeeded',
        payload: { fields: [{ name: 'Total', value: 42, confidence: 0.8 }], rawResult },
      },
    });

    expect(dto).toEqual({
      documentId: 'doc-1',
      state: LifecycleState.COMPLETED,
      filename: 'invoice.pdf',
      contentType: 'application/pdf',
      fileSizeBytes: 13,
      storageLocation: 'https://storage.test/uploads/1-invoice.pdf',
      fields: [{ name: 'Total', value: 42, confidence: 0.8 }],
      rawResult,
      error: null,
      createdAt: '2026-03-01T10:00:00.000Z',
      updatedAt: '2026-03-01T10:00:05.000Z',
    });
  });

  it('leaves rawResult null when the payload has none', () => {
    const dto = DocumentStatusResponseDto.fromTask({
      ...baseTask,
      result: { status: 'succeeded', payload: { fields: [] } },
    });

    expect(dto.fields).toEqual([]);
    expect(dto.rawResult).toBeNull();
  });

  it('reports only the error for a failed task', () => {
    const error = { kind: FailureKind.TIMED_OUT, message: 'Analysis did not finish in time' };

    const dto = DocumentStatusResponseDto.fromTask({
      ...baseTask,
      state: LifecycleState.FAILED,
      result: { status: 'failed', error },
    });

    expect(dto.fields).toBeNull();
    expect(dto.rawResult).toBeNull();
    expect(dto.error).toEqual(error);
  });
});
