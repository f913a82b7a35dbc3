export {
  OuraClient,
  DEFAULT_API_VERSION,
  DEFAULT_HOSTNAME,
  type AdapterClientOptions,
  type FetchClientOptions,
  type OuraClientOptions,
} from "./oura/client.js";
export { RequestManager, type RequestManagerOptions } from "./oura/request-manager.js";
export { summaryResources, defineSummaryResource, type SummaryResourceKey } from "./oura/resources.js";
export { resolveDateWindow, type DateWindow } from "./oura/summary.js";
export { decode, decodeCollection } from "./oura/decode.js";
export * from "./oura/models.js";
export type {
  Collection,
  DatumSchema,
  Result,
  SummaryQuery,
  SummaryResource,
  SummaryResult,
} from "./oura/types.js";
export * from "./transports/index.js";
export {
  ApiError,
  BadResponseError,
  InvalidArgumentError,
  InvalidDateRangeError,
  OuraError,
  RequestFailedError,
} from "./errors.js";
export { noopLogger, type Logger } from "./logger.js";
