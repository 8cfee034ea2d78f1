/**
 * Shared test data.
 */

import { MockTransport } from '../src/__mocks__';
import { WaifuVaultClient } from '../src/client';
import { NoopLogger } from '../src/observability/logging';
import type { RequestContext } from '../src/requests';
import type { AlbumEntry, FileEntry } from '../src/types';

export const BASE_URL = 'https://vault.test/rest';

export const testContext: RequestContext = {
  baseUrl: BASE_URL,
  headers: { 'User-Agent': 'waifuvault-client/test' },
};

export const fileEntry: FileEntry = {
  token: 'file-token',
  url: 'https://vault.test/f/1700000000000/cat.png',
  id: 7,
  bucket: null,
  album: null,
  views: 0,
  retentionPeriod: 3600000,
  options: {
    hideFilename: false,
    oneTimeDownload: false,
    protected: false,
  },
};

export const albumEntry: AlbumEntry = {
  token: 'album-token',
  bucketToken: 'bucket-token',
  publicToken: null,
  name: 'holiday',
  files: [fileEntry],
};

/**
 * A client wired to a fresh mock transport, with logging switched off.
 */
export function createTestClient(): { client: WaifuVaultClient; transport: MockTransport } {
  const transport = new MockTransport();
  const client = WaifuVaultClient.create({
    baseUrl: BASE_URL,
    transport,
    logger: new NoopLogger(),
  });
  return { client, transport };
}
