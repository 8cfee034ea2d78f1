/**
 * Albums service tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MockTransport } from '../src/__mocks__';
import { AlbumsServiceImpl } from '../src/services';
import { NoopLogger } from '../src/observability/logging';
import { ValidationError } from '../src/errors';
import { BASE_URL, albumEntry, testContext } from './fixtures';

describe('AlbumsService', () => {
  let transport: MockTransport;
  let service: AlbumsServiceImpl;

  beforeEach(() => {
    transport = new MockTransport();
    service = new AlbumsServiceImpl({ transport, context: testContext, logger: new NoopLogger() });
  });

  describe('create', () => {
    it('should create an album in the bucket', async () => {
      transport.enqueueJson(200, { ...albumEntry, files: [] });

      const result = await service.create('bucket-token', 'holiday');

      expect(result).toEqual({ success: true, data: { ...albumEntry, files: [] } });
      expect(transport.lastRequest()?.method).toBe('POST');
      expect(transport.lastRequest()?.url).toBe(`${BASE_URL}/album/bucket-token`);
      expect(transport.lastRequest()?.body).toBe('{"name":"holiday"}');
    });

    it('should reject an empty name without sending', async () => {
      const result = await service.create('bucket-token', '');

      expect(result.success).toBe(false);
      expect(transport.requestCount()).toBe(0);
    });
  });

  describe('get', () => {
    it('should fetch the album with its files', async () => {
      transport.enqueueJson(200, albumEntry);

      const result = await service.get('album-token');

      expect(result).toEqual({ success: true, data: albumEntry });
      expect(transport.lastRequest()?.method).toBe('GET');
      expect(transport.lastRequest()?.url).toBe(`${BASE_URL}/album/album-token`);
    });
  });

  describe('associate and disassociate', () => {
    it('should associate files', async () => {
      transport.enqueueJson(200, albumEntry);

      const result = await service.associate('album-token', ['file-a', 'file-b']);

      expect(result.success).toBe(true);
      expect(transport.lastRequest()?.url).toBe(`${BASE_URL}/album/album-token/associate`);
      expect(transport.lastRequest()?.body).toBe('{"fileTokens":["file-a","file-b"]}');
    });

    it('should disassociate files', async () => {
      transport.enqueueJson(200, { ...albumEntry, files: [] });

      const result = await service.disassociate('album-token', ['file-a']);

      expect(result.success).toBe(true);
      expect(transport.lastRequest()?.url).toBe(`${BASE_URL}/album/album-token/disassociate`);
      expect(transport.lastRequest()?.body).toBe('{"fileTokens":["file-a"]}');
    });

    it('should reject an empty token list without sending', async () => {
      const associated = await service.associate('album-token', []);
      const disassociated = await service.disassociate('album-token', []);

      for (const result of [associated, disassociated]) {
        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error).toBeInstanceOf(ValidationError);
          expect(result.error.message).toBe('fileTokens must contain at least one token');
        }
      }
      expect(transport.requestCount()).toBe(0);
    });

    it('should reject an empty token inside the list', async () => {
      const result = await service.associate('album-token', ['file-a', '']);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('fileTokens[1] must be a non-empty string');
      }
    });
  });

  describe('delete', () => {
    it('should say whether files go too', async () => {
      transport.enqueueJson(200, { success: true, description: 'album deleted' });

      const result = await service.delete('album-token', true);

      expect(result).toEqual({
        success: true,
        data: { success: true, description: 'album deleted' },
      });
      expect(transport.lastRequest()?.method).toBe('DELETE');
      expect(transport.lastRequest()?.url).toBe(`${BASE_URL}/album/album-token?deleteFiles=true`);
    });
  });

  describe('share and revoke', () => {
    it('should return the public URL when sharing', async () => {
      transport.enqueueJson(200, {
        success: true,
        description: 'https://vault.test/album/public-token',
      });

      const result = await service.share('album-token');

      expect(result).toEqual({ success: true, data: 'https://vault.test/album/public-token' });
      expect(transport.lastRequest()?.url).toBe(`${BASE_URL}/album/share/album-token`);
    });

    it('should revoke the public URL', async () => {
      transport.enqueueJson(200, { success: true, description: 'album unshared' });

      const result = await service.revoke('album-token');

      expect(result.success && result.data.description).toBe('album unshared');
      expect(transport.lastRequest()?.method).toBe('GET');
      expect(transport.lastRequest()?.url).toBe(`${BASE_URL}/album/revoke/album-token`);
    });
  });

  describe('download', () => {
    it('should post the chosen file ids and return the archive bytes', async () => {
      const zip = new Uint8Array([0x50, 0x4b, 0x05, 0x06]);
      transport.enqueueBytes(200, zip, { 'content-type': 'application/zip' });

      const result = await service.download('album-token', [1, 2]);

      expect(result).toEqual({ success: true, data: zip });
      expect(transport.lastRequest()?.method).toBe('POST');
      expect(transport.lastRequest()?.url).toBe(`${BASE_URL}/album/download/album-token`);
      expect(transport.lastRequest()?.body).toBe('[1,2]');
    });

    it('should ask for the whole album by default', async () => {
      transport.enqueueBytes(200, new Uint8Array([0x50, 0x4b]));

      await service.download('album-token');

      expect(transport.lastRequest()?.body).toBe('[]');
    });

    it('should reject a negative file id without sending', async () => {
      const result = await service.download('album-token', [-1]);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('fileIds must be non-negative integers, got -1');
      }
      expect(transport.requestCount()).toBe(0);
    });
  });
});
