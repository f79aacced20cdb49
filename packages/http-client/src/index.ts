/**
 * Resilient HTTP client for upstream services
 *
 * Bounded retries with exponential backoff and jitter, transient/permanent
 * failure classification, caller cancellation and deadlines.
 */

export {
  HTTP_METHODS,
  isHttpMethod,
  type HttpMethod,
  type HeaderMap,
  type ResponseHeaderMap,
  type PreparedRequest,
  type Transport,
  type TransportResponse,
  type UpstreamResponse,
  type CallOptions,
  type CallState,
  type AttemptRecord,
  type AttemptObserver,
} from './types.js';

export { RequestExecutor, type RequestExecutorOptions } from './executor.js';
export { HttpClient, createHttpClient, type HttpClientOptions, type RequestOptions } from './client.js';
export { encodeForm, encodeJson, mergeHeaders, prepareRequest, resolveUrl, type FormValues } from './encoding.js';
export { AttemptRecorder } from './observers.js';
export { AxiosTransport, type AxiosTransportOptions } from './transports/axios-transport.js';
