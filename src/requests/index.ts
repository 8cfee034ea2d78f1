/**
 * Request builders: validate request models and describe the HTTP request.
 */

export {
  type RequestContext,
  contextFromConfig,
  requireNonEmpty,
  endpoint,
  bareRequest,
  jsonRequest,
} from './context';
export { formatExpiry } from './expiry';
export { buildUploadRequest, validateContentSource } from './upload';
export {
  type ModificationPayload,
  buildModificationPayload,
  buildModificationRequest,
} from './modification';
export {
  PASSWORD_HEADER,
  buildFileInfoRequest,
  buildDeleteFileRequest,
  buildDownloadRequest,
} from './files';
export {
  buildCreateBucketRequest,
  buildGetBucketRequest,
  buildDeleteBucketRequest,
} from './buckets';
export {
  buildCreateAlbumRequest,
  buildGetAlbumRequest,
  buildAssociateFilesRequest,
  buildDisassociateFilesRequest,
  buildDeleteAlbumRequest,
  buildShareAlbumRequest,
  buildRevokeAlbumRequest,
  buildDownloadAlbumRequest,
} from './albums';
