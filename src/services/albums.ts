/**
 * Albums service.
 *
 * An album is a named collection of files inside one bucket. Files must be
 * uploaded before they can be associated; the client does not order calls.
 */

import type { WaifuVaultResult } from '../errors';
import {
  buildAssociateFilesRequest,
  buildCreateAlbumRequest,
  buildDeleteAlbumRequest,
  buildDisassociateFilesRequest,
  buildDownloadAlbumRequest,
  buildGetAlbumRequest,
  buildRevokeAlbumRequest,
  buildShareAlbumRequest,
} from '../requests';
import { mapBinaryResponse, mapJsonResponse } from '../response';
import {
  AlbumEntrySchema,
  GenericMessageSchema,
  type AlbumEntry,
  type GenericMessage,
} from '../types';
import { BaseService } from './base';

export interface AlbumsService {
  /** Create an album in a bucket. */
  create(bucketToken: string, name: string): Promise<WaifuVaultResult<AlbumEntry>>;

  /** Get an album with its files. */
  get(albumToken: string): Promise<WaifuVaultResult<AlbumEntry>>;

  /** Add files to an album. `fileTokens` must not be empty. */
  associate(albumToken: string, fileTokens: readonly string[]): Promise<WaifuVaultResult<AlbumEntry>>;

  /** Remove files from an album. `fileTokens` must not be empty. */
  disassociate(
    albumToken: string,
    fileTokens: readonly string[]
  ): Promise<WaifuVaultResult<AlbumEntry>>;

  /**
   * Delete an album.
   *
   * @param deleteFiles - also delete the album's files
   */
  delete(albumToken: string, deleteFiles: boolean): Promise<WaifuVaultResult<GenericMessage>>;

  /** Make an album public. Resolves to the public URL. */
  share(albumToken: string): Promise<WaifuVaultResult<string>>;

  /** Withdraw an album's public URL. */
  revoke(albumToken: string): Promise<WaifuVaultResult<GenericMessage>>;

  /**
   * Download an album as a zip archive.
   *
   * @param fileIds - ids of the files to include; empty for the whole album
   */
  download(albumToken: string, fileIds?: readonly number[]): Promise<WaifuVaultResult<Uint8Array>>;
}

export class AlbumsServiceImpl extends BaseService implements AlbumsService {
  create(bucketToken: string, name: string): Promise<WaifuVaultResult<AlbumEntry>> {
    return this.execute('albums.create', async () => {
      const response = await this.send(
        'albums.create',
        buildCreateAlbumRequest(this.context, bucketToken, name)
      );
      return mapJsonResponse(response, AlbumEntrySchema);
    });
  }

  get(albumToken: string): Promise<WaifuVaultResult<AlbumEntry>> {
    return this.execute('albums.get', async () => {
      const response = await this.send('albums.get', buildGetAlbumRequest(this.context, albumToken));
      return mapJsonResponse(response, AlbumEntrySchema);
    });
  }

  associate(
    albumToken: string,
    fileTokens: readonly string[]
  ): Promise<WaifuVaultResult<AlbumEntry>> {
    return this.execute('albums.associate', async () => {
      const response = await this.send(
        'albums.associate',
        buildAssociateFilesRequest(this.context, albumToken, fileTokens)
      );
      return mapJsonResponse(response, AlbumEntrySchema);
    });
  }

  disassociate(
    albumToken: string,
    fileTokens: readonly string[]
  ): Promise<WaifuVaultResult<AlbumEntry>> {
    return this.execute('albums.disassociate', async () => {
      const response = await this.send(
        'albums.disassociate',
        buildDisassociateFilesRequest(this.context, albumToken, fileTokens)
      );
      return mapJsonResponse(response, AlbumEntrySchema);
    });
  }

  delete(albumToken: string, deleteFiles: boolean): Promise<WaifuVaultResult<GenericMessage>> {
    return this.execute('albums.delete', async () => {
      const response = await this.send(
        'albums.delete',
        buildDeleteAlbumRequest(this.context, albumToken, deleteFiles)
      );
      return mapJsonResponse(response, GenericMessageSchema);
    });
  }

  share(albumToken: string): Promise<WaifuVaultResult<string>> {
    return this.execute('albums.share', async () => {
      const response = await this.send(
        'albums.share',
        buildShareAlbumRequest(this.context, albumToken)
      );
      return mapJsonResponse(response, GenericMessageSchema).description;
    });
  }

  revoke(albumToken: string): Promise<WaifuVaultResult<GenericMessage>> {
    return this.execute('albums.revoke', async () => {
      const response = await this.send(
        'albums.revoke',
        buildRevokeAlbumRequest(this.context, albumToken)
      );
      return mapJsonResponse(response, GenericMessageSchema);
    });
  }

  download(
    albumToken: string,
    fileIds: readonly number[] = []
  ): Promise<WaifuVaultResult<Uint8Array>> {
    return this.execute('albums.download', async () => {
      const response = await this.send(
        'albums.download',
        buildDownloadAlbumRequest(this.context, albumToken, fileIds)
      );
      return mapBinaryResponse(response);
    });
  }
}
