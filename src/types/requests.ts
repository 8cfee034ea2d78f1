/**
 * Request models.
 *
 * Every optional field follows the same rule: present means "send it",
 * absent means "leave it out of the request".
 */

/**
 * Upload a file read from the local filesystem. The stored file name is the
 * last segment of the path.
 */
export interface FileSource {
  type: 'file';
  path: string;
}

/**
 * Have the server fetch the content from a remote URL.
 */
export interface UrlSource {
  type: 'url';
  url: string;
  /** Name to store the content under, when the URL's own name is not wanted */
  filename?: string;
}

/**
 * Upload raw bytes held in memory.
 */
export interface BytesSource {
  type: 'bytes';
  data: Uint8Array;
  filename: string;
}

/**
 * The single content source of an upload.
 */
export type ContentSource = FileSource | UrlSource | BytesSource;

export type ExpiryUnit = 'minute' | 'hour' | 'day';

/**
 * When uploaded content is removed by the server.
 */
export interface ExpirySpec {
  /** Positive whole number of units */
  amount: number;
  unit: ExpiryUnit;
}

/**
 * Expiry as an {@link ExpirySpec} or as a raw server string such as `"1h"` or `"30m"`.
 */
export type Expiry = ExpirySpec | string;

/**
 * Upload content to the vault.
 */
export interface UploadRequest {
  source: ContentSource;

  /** Bucket to upload into */
  bucketToken?: string;

  /** Expiry; leave unset to keep the file as long as the retention policy allows */
  expires?: Expiry;

  /** Hide the file name from the generated URL */
  hideFilename?: boolean;

  /** Encrypt the file on the server; it can then only be fetched with this password */
  password?: string;

  /** Delete the file after its first download */
  oneTimeDownload?: boolean;
}

/**
 * Change the options of a stored file.
 *
 * When the file already has a password, changing it also needs
 * `previousPassword`. The server enforces that, not the client.
 */
export interface ModificationRequest {
  token: string;
  password?: string;
  previousPassword?: string;
  customExpiry?: Expiry;
  hideFilename?: boolean;
}

/**
 * Read a stored file's metadata.
 */
export interface GetRequest {
  token: string;

  /** Report the retention period in human-readable form instead of milliseconds */
  formatted?: boolean;
}
