export {
  TransportAdapter,
  isHttpMethod,
  type HttpMethod,
  type QueryParams,
  type RawResponse,
  type TransportRequest,
} from "./base.js";
export { FetchAdapter, type FetchAdapterOptions, type FetchFn } from "./fetch.js";
export { StubAdapter } from "./stub.js";
