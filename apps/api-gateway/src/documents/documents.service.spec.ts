import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { Readable } from 'stream';
import { lastValueFrom } from 'rxjs';
import {
  DEFAULT_POLL_POLICY,
  FailureKind,
  LifecycleState,
  PROCESSING_CLOCK,
  ProcessingModule,
  StatusRegistry,
} from '@docsense/processing';
import {
  FakeAdaptersModule,
  FakeClock,
  InMemoryStorage,
  ScriptedAnalysis,
} from '@docsense/processing/testing';
import { DocumentsService } from './documents.service';
import {
  DocumentNotFoundException,
  FileTooLargeException,
  InvalidMimeTypeException,
  MissingFileException,
} from './exceptions/document.exceptions';

const UNKNOWN_ID = '7d0c6a52-4a3e-4c55-9a55-2f4a1c3b9e10';

function uploadedFile(overrides: Partial<Express.Multer.File> = {}): Express.Multer.File {
  const buffer = overrides.buffer ?? Buffer.from('%PDF-1.7 test');
  return {
    fieldname: 'file',
    originalname: 'invoice.pdf',
    encoding: '7bit',
    mimetype: 'application/pdf',
    size: buffer.length,
    buffer,
    stream: Readable.from(buffer),
    destination: '',
    filename: '',
    path: '',
    ...overrides,
  };
}

describe('DocumentsService', () => {
  let moduleRef: TestingModule;
  let service: DocumentsService;
  let storage: InMemoryStorage;
  let registry: StatusRegistry;

  async function compile(config: Record<string, string> = {}): Promise<void> {
    moduleRef = await Test.createTestingModule({
      imports: [
        ProcessingModule.forRootAsync({
          imports: [FakeAdaptersModule],
          storage: InMemoryStorage,
          analysis: ScriptedAnalysis,
          useFactory: () => ({ pollPolicy: DEFAULT_POLL_POLICY, retentionMs: 0 }),
          extraProviders: [{ provide: PROCESSING_CLOCK, useValue: new FakeClock() }],
          isGlobal: true,
        }),
      ],
      providers: [
        DocumentsService,
        { provide: ConfigService, useValue: new ConfigService(config) },
      ],
    }).compile();
    await moduleRef.init();

    service = moduleRef.get(DocumentsService);
    storage = moduleRef.get(InMemoryStorage, { strict: false });
    registry = moduleRef.get(StatusRegistry, { strict: false });
  }

  afterEach(async () => {
    await moduleRef.close();
  });

  describe('analyze', () => {
    beforeEach(() => compile());

    it('returns the completed document with its extracted fields', async () => {
      const response = await service.analyze(uploadedFile());

      expect(response).toMatchObject({
        state: LifecycleState.COMPLETED,
        filename: 'invoice.pdf',
        contentType: 'application/pdf',
        fileSizeBytes: 13,
        storageLocation: 'https://storage.test/uploads/1-invoice.pdf',
        fields: [
          {
            name: 'source',
            value: 'https://storage.test/uploads/1-invoice.pdf',
            confidence: 0.99,
          },
        ],
        rawResult: null,
        error: null,
      });
      expect(response.updatedAt >= response.createdAt).toBe(true);
    });

    it('reports a pipeline failure in the body rather than as an HTTP error', async () => {
      storage.failWith = new Error('bucket offline');

      const response = await service.analyze(uploadedFile());

      expect(response.state).toBe(LifecycleState.FAILED);
      expect(response.fields).toBeNull();
      expect(response.storageLocation).toBeNull();
      expect(response.error).toEqual({
        kind: FailureKind.STORAGE_ERROR,
        message: 'Upload failed: bucket offline',
        cause: 'bucket offline',
      });
    });

    it('falls back to a default filename', async () => {
      const response = await service.analyze(uploadedFile({ originalname: '' }));

      expect(response.filename).toBe('unknown.pdf');
    });

    it('requires a file', async () => {
      await expect(service.analyze(undefined)).rejects.toThrow(MissingFileException);
    });

    it('rejects an empty file', async () => {
      await expect(
        service.analyze(uploadedFile({ buffer: Buffer.alloc(0) })),
      ).rejects.toThrow(MissingFileException);
      expect(registry.size).toBe(0);
    });

    it('rejects an unsupported MIME type', async () => {
      await expect(
        service.analyze(uploadedFile({ mimetype: 'text/plain' })),
      ).rejects.toThrow(
        'File type "text/plain" is not supported. Allowed types: application/pdf, ' +
          'application/vnd.openxmlformats-officedocument.wordprocessingml.document, ' +
          'application/msword, image/png, image/jpeg, image/tiff',
      );
    });

    it('treats a missing MIME type as application/octet-stream', async () => {
      await expect(
        service.analyze(uploadedFile({ mimetype: '' })),
      ).rejects.toThrow(InvalidMimeTypeException);
    });
  });

  describe('size limit', () => {
    beforeEach(() => compile({ UPLOAD_MAX_FILE_SIZE_MB: '1' }));

    it('rejects a file above UPLOAD_MAX_FILE_SIZE_MB', async () => {
      const oversized = uploadedFile({ buffer: Buffer.alloc(1024 * 1024 + 1, 1) });

      await expect(service.analyze(oversized)).rejects.toThrow(
        new FileTooLargeException(1),
      );
    });

    it('accepts a file exactly at the limit', async () => {
      const atLimit = uploadedFile({ buffer: Buffer.alloc(1024 * 1024, 1) });

      const response = await service.analyze(atLimit);

      expect(response.state).toBe(LifecycleState.COMPLETED);
    });
  });

  describe('analyzeAsync', () => {
    beforeEach(() => compile());

    it('returns a queued acknowledgement and keeps processing', async () => {
      const accepted = service.analyzeAsync(uploadedFile());

      expect(accepted).toEqual({
        documentId: accepted.documentId,
        status: 'queued',
        message: `Processing started. Poll GET /documents/${accepted.documentId} for status.`,
      });
      expect(service.getStatus(accepted.documentId).state).toBe(LifecycleState.QUEUED);

      const terminal = await lastValueFrom(registry.watch(accepted.documentId));

      expect(terminal.state).toBe(LifecycleState.COMPLETED);
      expect(service.getStatus(accepted.documentId).state).toBe(LifecycleState.COMPLETED);
    });

    it('validates the upload before queuing anything', () => {
      expect(() => service.analyzeAsync(undefined)).toThrow(MissingFileException);
      expect(registry.size).toBe(0);
    });
  });

  describe('task management', () => {
    beforeEach(() => compile());

    it('returns 404 for an unknown id', () => {
      expect(() => service.getStatus(UNKNOWN_ID)).toThrow(
        new DocumentNotFoundException(UNKNOWN_ID),
      );
      expect(() => service.cancel(UNKNOWN_ID)).toThrow(DocumentNotFoundException);
    });

    it('reports that a finished task could not be cancelled', async () => {
      const { documentId } = await service.analyze(uploadedFile());

      expect(service.cancel(documentId)).toEqual({ documentId, cancelled: false });
    });

    it('cancels a queued task', async () => {
      const { documentId } = service.analyzeAsync(uploadedFile());

      expect(service.cancel(documentId)).toEqual({ documentId, cancelled: true });

      const terminal = await lastValueFrom(registry.watch(documentId));
      expect(terminal.state).toBe(LifecycleState.FAILED);
      expect(service.getStatus(documentId).error?.kind).toBe(FailureKind.CANCELLED);
    });

    it('discards a task and its stored file', async () => {
      const { documentId } = await service.analyze(uploadedFile());

      await service.discard(documentId);

      expect(storage.deleted).toEqual(['uploads/1-invoice.pdf']);
      expect(() => service.getStatus(documentId)).toThrow(DocumentNotFoundException);
    });

    it('returns 404 when discarding an unknown id', async () => {
      await expect(service.discard(UNKNOWN_ID)).rejects.toThrow(DocumentNotFoundException);
    });
  });
});
