export {
  isSuccessStatus,
  toApiError,
  mapJsonResponse,
  mapBinaryResponse,
  mapDownloadResponse,
} from './mapper';
