/**
 * Response schemas and the types inferred from them.
 *
 * Fields the server adds beyond these are dropped on decode.
 */

import { z } from 'zod';

export const FileOptionsSchema = z.object({
  hideFilename: z.boolean(),
  oneTimeDownload: z.boolean(),
  protected: z.boolean(),
});

export type FileOptions = z.infer<typeof FileOptionsSchema>;

/**
 * Which album a file belongs to.
 */
export const AlbumMetadataSchema = z.object({
  token: z.string(),
  publicToken: z.string().nullish(),
  name: z.string(),
  bucket: z.string(),
  dateCreated: z.number(),
});

export type AlbumMetadata = z.infer<typeof AlbumMetadataSchema>;

/**
 * A stored file.
 */
export const FileEntrySchema = z.object({
  /** Token used for info, modification and deletion */
  token: z.string(),
  /** Location of the content */
  url: z.string(),
  /** Numeric file id, used to pick files for an album download */
  id: z.number().int().optional(),
  bucket: z.string().nullish(),
  album: AlbumMetadataSchema.nullish(),
  views: z.number().int().nonnegative(),
  /** Milliseconds, or a human-readable description when requested formatted */
  retentionPeriod: z.union([z.string(), z.number()]),
  options: FileOptionsSchema.nullish(),
});

export type FileEntry = z.infer<typeof FileEntrySchema>;

export const BucketEntrySchema = z.object({
  token: z.string(),
  files: z.array(FileEntrySchema),
  albums: z.array(AlbumMetadataSchema).nullish(),
});

export type BucketEntry = z.infer<typeof BucketEntrySchema>;

export const AlbumEntrySchema = z.object({
  token: z.string(),
  bucketToken: z.string(),
  publicToken: z.string().nullish(),
  name: z.string(),
  files: z.array(FileEntrySchema),
});

export type AlbumEntry = z.infer<typeof AlbumEntrySchema>;

/**
 * Success/failure flag plus a description, returned by album management calls.
 */
export const GenericMessageSchema = z.object({
  success: z.boolean(),
  description: z.string(),
});

export type GenericMessage = z.infer<typeof GenericMessageSchema>;

/**
 * Delete endpoints answer with a bare boolean.
 */
export const DeleteResponseSchema = z.boolean();

/**
 * Every error the service reports takes this shape.
 */
export const ErrorEnvelopeSchema = z.object({
  name: z.string(),
  message: z.string(),
  status: z.number().int(),
});

export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;
