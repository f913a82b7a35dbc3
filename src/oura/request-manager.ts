import { ApiError, BadResponseError } from "../errors.js";
import { noopLogger, type Logger } from "../logger.js";
import type { HttpMethod, QueryParams, RawResponse, TransportAdapter } from "../transports/base.js";
import type { Result } from "./types.js";

export interface RequestManagerOptions {
  adapter: TransportAdapter;
  /** Collection base, e.g. https://api.ouraring.com/v2/usercollection */
  baseUrl: string;
  logger?: Logger;
}

function formatParams(params: QueryParams | undefined): string {
  return params ? JSON.stringify(params) : "none";
}

function outcomeLine(success: boolean, statusCode: number, message: string): string {
  return `success=${success}, status_code=${statusCode}, message=${message}`;
}

/**
 * Sends requests through a transport and classifies the outcome: 2xx with a
 * JSON body becomes a `Result`, everything else an error.
 */
export class RequestManager {
  public readonly baseUrl: string;
  private readonly adapter: TransportAdapter;
  private readonly logger: Logger;

  public constructor(options: RequestManagerOptions) {
    this.adapter = options.adapter;
    this.baseUrl = options.baseUrl;
    this.logger = options.logger ?? noopLogger;
  }

  public get(endpoint: string, params?: QueryParams): Promise<Result> {
    return this.send("GET", `${this.baseUrl}/${endpoint}`, params);
  }

  public post(endpoint: string, params?: QueryParams, data?: Record<string, unknown>): Promise<Result> {
    return this.send("POST", `${this.baseUrl}/${endpoint}`, params, data);
  }

  /** Request an absolute URL, for endpoints that live outside the collection base. */
  public async send(
    method: HttpMethod,
    url: string,
    params?: QueryParams,
    data?: Record<string, unknown>
  ): Promise<Result> {
    const response = await this.dispatch(method, url, params, data);

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.logger.error(outcomeLine(false, response.statusCode, `Bad JSON in response: ${detail}`));
      throw new BadResponseError("Bad JSON in response", { cause: err });
    }

    this.classify(response);
    return Object.freeze({
      statusCode: response.statusCode,
      message: response.reason,
      data: payload,
    });
  }

  /** Like `send`, but the body is left undecoded and only the status decides. */
  public async sendExpectingStatus(
    method: HttpMethod,
    url: string,
    params?: QueryParams,
    data?: Record<string, unknown>
  ): Promise<RawResponse> {
    const response = await this.dispatch(method, url, params, data);
    this.classify(response);
    return Object.freeze({ ...response });
  }

  private async dispatch(
    method: HttpMethod,
    url: string,
    params: QueryParams | undefined,
    data: Record<string, unknown> | undefined
  ): Promise<RawResponse> {
    this.logger.debug(`method=${method}, url=${url}, params=${formatParams(params)}`);
    try {
      return await this.adapter.send(method, url, params, data);
    } catch (err) {
      this.logger.error(err instanceof Error ? err.message : String(err));
      throw err;
    }
  }

  private classify(response: RawResponse): void {
    const success = response.statusCode >= 200 && response.statusCode <= 299;
    const line = outcomeLine(success, response.statusCode, response.reason);
    if (!success) {
      this.logger.error(line);
      throw new ApiError(response.statusCode, response.reason);
    }
    this.logger.debug(line);
  }
}
