import type { Chunk, FileObject } from '../models';
import type { Logger } from '../monitoring';
import type { BlobStore, EntityStore, ListOptions } from '../storage';
import { splitIntoChunks, type TextExtractor } from '../tools';
import type { Clock, IdGenerator, ListResponse, ServiceConfig, ServiceResult } from './types';
import { ServiceUtils } from './utils';

export interface FileUpload {
  filename: string;
  purpose: string;
  data: Uint8Array;
}

/**
 * File uploads. Bytes go to the blob store; the extracted text is split into chunks for retrieval.
 */
export class FileService {
  private readonly store: EntityStore;
  private readonly blobs: BlobStore;
  private readonly extractor: TextExtractor;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly ids: IdGenerator;
  private readonly maxFileSize: number;
  private readonly chunkSize: number;

  constructor(config: ServiceConfig) {
    this.store = config.store;
    this.blobs = config.blobs;
    this.extractor = config.extractor;
    this.logger = config.logger;
    this.clock = config.clock;
    this.ids = config.ids;
    this.maxFileSize = config.config.MAX_FILE_SIZE;
    this.chunkSize = config.config.CHUNK_SIZE;
  }

  static blobKey(fileId: string): string {
    return `files/${fileId}`;
  }

  async upload(ownerId: string, upload: FileUpload): Promise<ServiceResult<FileObject>> {
    if (upload.data.byteLength === 0) {
      return ServiceUtils.createErrorResult('File is empty', 'VALIDATION_ERROR');
    }
    if (upload.data.byteLength > this.maxFileSize) {
      return ServiceUtils.createErrorResult(
        `File exceeds the maximum size of ${this.maxFileSize} bytes`,
        'VALIDATION_ERROR'
      );
    }

    try {
      const createdAt = ServiceUtils.toSeconds(this.clock.now());
      const file: FileObject = {
        id: this.ids.generateFileId(),
        object: 'file',
        owner_id: ownerId,
        filename: upload.filename,
        bytes: upload.data.byteLength,
        purpose: upload.purpose,
        status: 'uploaded',
        created_at: createdAt,
      };

      await this.blobs.put(FileService.blobKey(file.id), upload.data);
      await this.store.insertFile(file);

      let text: string | null;
      try {
        text = await this.extractor.extract(upload.data);
      } catch (error) {
        // The upload is kept, but nothing of it can be retrieved
        this.logger.warn('Text extraction failed', {
          file_id: file.id,
          reason: error instanceof Error ? error.message : String(error),
        });
        await this.store.updateFileStatus(file.id, 'error');
        return ServiceUtils.createSuccessResult({ ...file, status: 'error' });
      }
      if (text === null) {
        // Binary files are kept but not searchable
        await this.store.updateFileStatus(file.id, 'processed');
        return ServiceUtils.createSuccessResult({ ...file, status: 'processed' });
      }

      const chunks: Chunk[] = splitIntoChunks(text, this.chunkSize).map(chunk => ({
        id: this.ids.generateChunkId(),
        file_id: file.id,
        sequence: chunk.sequence,
        start_index: chunk.start_index,
        end_index: chunk.end_index,
        data: chunk.data,
        created_at: createdAt,
      }));

      await this.store.transaction(async trx => {
        await trx.insertChunks(chunks);
        await trx.updateFileStatus(file.id, 'processed');
      });
      this.logger.info('File ingested', { file_id: file.id, bytes: file.bytes, chunks: chunks.length });

      return ServiceUtils.createSuccessResult({ ...file, status: 'processed' });
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'upload file', error);
    }
  }

  async get(ownerId: string, id: string): Promise<ServiceResult<FileObject>> {
    try {
      const file = await this.store.getFile(id, ownerId);
      return file ? ServiceUtils.createSuccessResult(file) : ServiceUtils.notFound('File', id);
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'get file', error);
    }
  }

  async list(ownerId: string, options: ListOptions, purpose?: string): Promise<ServiceResult<ListResponse<FileObject>>> {
    try {
      const page = await this.store.listFiles(ownerId, options, purpose);
      return ServiceUtils.createSuccessResult(ServiceUtils.toListResponse(page.data, page.hasMore));
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'list files', error);
    }
  }

  async getContent(ownerId: string, id: string): Promise<ServiceResult<{ file: FileObject; data: Uint8Array }>> {
    try {
      const file = await this.store.getFile(id, ownerId);
      if (!file) {
        return ServiceUtils.notFound('File', id);
      }
      const data = await this.blobs.get(FileService.blobKey(id));
      if (!data) {
        return ServiceUtils.notFound('File content', id);
      }
      return ServiceUtils.createSuccessResult({ file, data });
    } catch (error) {
      return ServiceUtils.internalError(this.logger, 'read file content', error);
    }
  }
}
