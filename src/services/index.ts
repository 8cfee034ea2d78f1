/**
 * Service implementations for the WaifuVault API.
 */

export { BaseService, type ServiceDependencies } from './base';
export { type FilesService, FilesServiceImpl } from './files';
export { type BucketsService, BucketsServiceImpl } from './buckets';
export { type AlbumsService, AlbumsServiceImpl } from './albums';
