/**
 * Files service: upload, inspect, modify, delete and download stored files.
 */

import type { WaifuVaultResult } from '../errors';
import {
  buildDeleteFileRequest,
  buildDownloadRequest,
  buildFileInfoRequest,
  buildModificationRequest,
  buildUploadRequest,
} from '../requests';
import { mapDownloadResponse, mapJsonResponse } from '../response';
import {
  DeleteResponseSchema,
  FileEntrySchema,
  type FileEntry,
  type GetRequest,
  type ModificationRequest,
  type UploadRequest,
} from '../types';
import { BaseService } from './base';

/**
 * Files service interface.
 */
export interface FilesService {
  /**
   * Upload content from a local file, a remote URL or raw bytes.
   *
   * A local file is read fully into memory before anything is sent; a read
   * failure is an `IoError` and no request is made.
   */
  upload(request: UploadRequest): Promise<WaifuVaultResult<FileEntry>>;

  /**
   * Get a stored file's metadata.
   */
  fileInfo(request: GetRequest): Promise<WaifuVaultResult<FileEntry>>;

  /**
   * Change a stored file's password, expiry or file name visibility.
   *
   * A server-side rejection (for example a missing `previousPassword` on an
   * already protected file) comes back as an `ApiError` with the server's message.
   */
  update(request: ModificationRequest): Promise<WaifuVaultResult<FileEntry>>;

  /**
   * Delete a stored file. Resolves to the server's success flag.
   */
  delete(token: string): Promise<WaifuVaultResult<boolean>>;

  /**
   * Download the content behind a file's `url`.
   *
   * @param password - sent in the `x-password` header for protected files
   */
  download(url: string, password?: string): Promise<WaifuVaultResult<Uint8Array>>;
}

/**
 * Default implementation of the files service.
 */
export class FilesServiceImpl extends BaseService implements FilesService {
  upload(request: UploadRequest): Promise<WaifuVaultResult<FileEntry>> {
    return this.execute('files.upload', async () => {
      const httpRequest = await buildUploadRequest(this.context, request);
      const response = await this.send('files.upload', httpRequest);
      return mapJsonResponse(response, FileEntrySchema);
    });
  }

  fileInfo(request: GetRequest): Promise<WaifuVaultResult<FileEntry>> {
    return this.execute('files.fileInfo', async () => {
      const response = await this.send(
        'files.fileInfo',
        buildFileInfoRequest(this.context, request)
      );
      return mapJsonResponse(response, FileEntrySchema);
    });
  }

  update(request: ModificationRequest): Promise<WaifuVaultResult<FileEntry>> {
    return this.execute('files.update', async () => {
      const response = await this.send(
        'files.update',
        buildModificationRequest(this.context, request)
      );
      return mapJsonResponse(response, FileEntrySchema);
    });
  }

  delete(token: string): Promise<WaifuVaultResult<boolean>> {
    return this.execute('files.delete', async () => {
      const response = await this.send('files.delete', buildDeleteFileRequest(this.context, token));
      return mapJsonResponse(response, DeleteResponseSchema);
    });
  }

  download(url: string, password?: string): Promise<WaifuVaultResult<Uint8Array>> {
    return this.execute('files.download', async () => {
      const response = await this.send(
        'files.download',
        buildDownloadRequest(this.context, url, password)
      );
      return mapDownloadResponse(response, password !== undefined);
    });
  }
}
