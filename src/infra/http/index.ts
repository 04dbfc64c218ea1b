export {
  makeHttpClient,
  buildUrl,
  encodeSegment,
  mapHttpStatus,
  type HttpClient,
  type HttpClientDeps,
  type HttpRequest,
  type Credential,
  type TokenPlacement,
  type FetchFn,
  type FetchResponse,
} from './client.js';
