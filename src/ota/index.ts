/**
 * Update Service Module
 *
 * @module ota
 */

export {
  OtaUpdateSource,
  DEFAULT_OTA_ENDPOINT,
  DOWNLOAD_FILE_NAME,
  type OtaUpdateSourceOptions,
} from './source.js';
export {
  FetchHttpClient,
  OtaHttpError,
  UnexpectedContentTypeError,
  type HttpClient,
  type FetchHttpClientOptions,
} from './http.js';
