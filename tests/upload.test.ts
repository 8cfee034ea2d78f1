/**
 * Upload request builder tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { buildUploadRequest, validateContentSource } from '../src/requests';
import { IoError, ValidationError } from '../src/errors';
import type { ContentSource, UploadRequest } from '../src/types';
import type { HttpRequest } from '../src/transport';
import { BASE_URL, testContext } from './fixtures';

function formOf(request: HttpRequest): FormData {
  if (!(request.body instanceof FormData)) {
    throw new Error('expected a multipart body');
  }
  return request.body;
}

function filePart(form: FormData) {
  const part = form.get('file');
  if (part === null || typeof part === 'string') {
    throw new Error('expected a file part');
  }
  return part;
}

describe('buildUploadRequest', () => {
  let dir: string;
  let reportPath: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'waifuvault-upload-'));
    reportPath = join(dir, 'report.txt');
    await writeFile(reportPath, 'file contents');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('content sources', () => {
    it('should send a URL source as a text field', async () => {
      const request = await buildUploadRequest(testContext, {
        source: { type: 'url', url: 'https://example.com/cat.png' },
      });

      expect(request.method).toBe('PUT');
      expect(request.url).toBe(BASE_URL);
      expect(request.headers).toEqual({ 'User-Agent': 'waifuvault-client/test' });

      const form = formOf(request);
      expect(form.get('url')).toBe('https://example.com/cat.png');
      expect(form.has('filename')).toBe(false);
      expect(form.has('file')).toBe(false);
    });

    it('should send a URL source filename when given', async () => {
      const request = await buildUploadRequest(testContext, {
        source: { type: 'url', url: 'https://example.com/cat.png', filename: 'kitten.png' },
      });

      expect(formOf(request).get('filename')).toBe('kitten.png');
    });

    it('should send bytes as a file part named after the supplied filename', async () => {
      const request = await buildUploadRequest(testContext, {
        source: { type: 'bytes', data: new TextEncoder().encode('hello'), filename: 'hello.txt' },
      });

      const part = filePart(formOf(request));
      expect(part.name).toBe('hello.txt');
      expect(await part.text()).toBe('hello');
    });

    it('should read a local file and name the part after its basename', async () => {
      const request = await buildUploadRequest(testContext, {
        source: { type: 'file', path: reportPath },
      });

      const part = filePart(formOf(request));
      expect(part.name).toBe('report.txt');
      expect(await part.text()).toBe('file contents');
    });

    it('should fail with IoError for a missing file', async () => {
      const missing = join(dir, 'missing.txt');

      await expect(
        buildUploadRequest(testContext, { source: { type: 'file', path: missing } })
      ).rejects.toBeInstanceOf(IoError);
    });
  });

  describe('options', () => {
    it('should put the bucket token in the path and settings in the query', async () => {
      const request = await buildUploadRequest(testContext, {
        source: { type: 'url', url: 'https://example.com/cat.png' },
        bucketToken: 'bucket-token',
        expires: { amount: 1, unit: 'hour' },
        hideFilename: true,
        oneTimeDownload: false,
      });

      expect(request.url).toBe(
        `${BASE_URL}/bucket-token?expires=1h&hide_filename=true&one_time_download=false`
      );
    });

    it('should send each flag with its own value', async () => {
      const request = await buildUploadRequest(testContext, {
        source: { type: 'url', url: 'https://example.com/cat.png' },
        oneTimeDownload: true,
      });

      expect(request.url).toBe(`${BASE_URL}?one_time_download=true`);
    });

    it('should pass a raw expiry string through', async () => {
      const request = await buildUploadRequest(testContext, {
        source: { type: 'url', url: 'https://example.com/cat.png' },
        expires: '10m',
      });

      expect(request.url).toBe(`${BASE_URL}?expires=10m`);
    });

    it('should send the password as a form field', async () => {
      const request = await buildUploadRequest(testContext, {
        source: { type: 'url', url: 'https://example.com/cat.png' },
        password: 'test-secret',
      });

      expect(formOf(request).get('password')).toBe('test-secret');
    });

    it('should reject an empty bucket token', async () => {
      await expect(
        buildUploadRequest(testContext, {
          source: { type: 'url', url: 'https://example.com/cat.png' },
          bucketToken: '',
        })
      ).rejects.toThrow('bucketToken must be a non-empty string');
    });

    it('should validate before touching the filesystem', async () => {
      await expect(
        buildUploadRequest(testContext, {
          source: { type: 'file', path: join(dir, 'missing.txt') },
          expires: { amount: -1, unit: 'day' },
        })
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });
});

describe('validateContentSource', () => {
  it('should accept each well-formed source', () => {
    expect(() => validateContentSource({ type: 'file', path: '/tmp/a.txt' })).not.toThrow();
    expect(() => validateContentSource({ type: 'url', url: 'https://example.com/a' })).not.toThrow();
    expect(() =>
      validateContentSource({ type: 'bytes', data: new Uint8Array([1]), filename: 'a.bin' })
    ).not.toThrow();
  });

  it('should reject a missing source', () => {
    const request: UploadRequest = JSON.parse('{}');

    expect(() => validateContentSource(request.source)).toThrow(
      'An upload needs a file, url or bytes source'
    );
  });

  it('should reject an unknown source type', () => {
    const source: ContentSource = JSON.parse('{"type":"ftp","url":"ftp://example.com/a"}');

    expect(() => validateContentSource(source)).toThrow(
      'An upload needs a file, url or bytes source'
    );
  });

  it('should reject bytes without a filename', () => {
    const source: ContentSource = { type: 'bytes', data: new Uint8Array([1, 2]), filename: 'a' };
    Reflect.deleteProperty(source, 'filename');

    expect(() => validateContentSource(source)).toThrow(
      new ValidationError('source.filename must be a non-empty string', 'source.filename')
    );
  });

  it('should reject bytes with an empty filename', () => {
    expect(() =>
      validateContentSource({ type: 'bytes', data: new Uint8Array([1]), filename: '' })
    ).toThrow('source.filename must be a non-empty string');
  });

  it('should reject an empty path or url', () => {
    expect(() => validateContentSource({ type: 'file', path: '' })).toThrow(
      'source.path must be a non-empty string'
    );
    expect(() => validateContentSource({ type: 'url', url: ' ' })).toThrow(
      'source.url must be a non-empty string'
    );
  });

  it('should reject a source carrying a second content', () => {
    const source: ContentSource = { type: 'url', url: 'https://example.com/a' };
    Object.assign(source, { path: '/tmp/a.txt' });

    expect(() => validateContentSource(source)).toThrow(
      'An upload takes exactly one content source; got url, path'
    );
  });

  it('should treat a content key holding undefined as unset', () => {
    const source: ContentSource = { type: 'file', path: '/tmp/a.txt' };
    Object.assign(source, { url: undefined, data: undefined });

    expect(() => validateContentSource(source)).not.toThrow();

    Object.assign(source, { url: 'https://example.com/a' });

    expect(() => validateContentSource(source)).toThrow(
      'An upload takes exactly one content source; got path, url'
    );
  });
});
