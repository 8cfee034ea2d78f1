export type {
  FileSource,
  UrlSource,
  BytesSource,
  ContentSource,
  ExpiryUnit,
  ExpirySpec,
  Expiry,
  UploadRequest,
  ModificationRequest,
  GetRequest,
} from './requests';

export {
  FileOptionsSchema,
  AlbumMetadataSchema,
  FileEntrySchema,
  BucketEntrySchema,
  AlbumEntrySchema,
  GenericMessageSchema,
  DeleteResponseSchema,
  ErrorEnvelopeSchema,
} from './responses';

export type {
  FileOptions,
  AlbumMetadata,
  FileEntry,
  BucketEntry,
  AlbumEntry,
  GenericMessage,
  ErrorEnvelope,
} from './responses';
