import { InvalidArgumentError, InvalidDateRangeError } from "../errors.js";
import { noopLogger, type Logger } from "../logger.js";
import type { RawResponse, TransportAdapter } from "../transports/base.js";
import { FetchAdapter, type FetchFn } from "../transports/fetch.js";
import { isValidTimeZone, todayInTimezone } from "../utils/dates.js";
import { decode, decodeCollection } from "./decode.js";
import { PersonalInfoSchema, type PersonalInfo, type RingConfiguration } from "./models.js";
import { RequestManager } from "./request-manager.js";
import { summaryResources } from "./resources.js";
import { resolveDateWindow, type DateWindow } from "./summary.js";
import type { SummaryQuery, SummaryResource, SummaryResult } from "./types.js";

export const DEFAULT_HOSTNAME = "api.ouraring.com";
export const DEFAULT_API_VERSION = "v2";

interface BaseClientOptions {
  hostname?: string;
  version?: string;
  logger?: Logger;
  /** Time zone that decides "today" for the default date window. Defaults to the process zone. */
  timeZone?: string;
}

/** Default transport: the client builds a `FetchAdapter` around the token. */
export interface FetchClientOptions extends BaseClientOptions {
  accessToken: string;
  /** Verify the API's TLS certificate. Defaults to true. */
  sslVerify?: boolean;
  timeoutMs?: number;
  /** Replaces undici's fetch, mainly for tests. */
  fetch?: FetchFn;
  adapter?: undefined;
}

/** Caller-supplied transport. The adapter carries its own token and transport settings. */
export interface AdapterClientOptions extends BaseClientOptions {
  adapter: TransportAdapter;
  accessToken?: undefined;
  sslVerify?: undefined;
  timeoutMs?: undefined;
  fetch?: undefined;
}

export type OuraClientOptions = FetchClientOptions | AdapterClientOptions;

function adapterFor(options: OuraClientOptions): TransportAdapter {
  if (options.adapter !== undefined) return options.adapter;
  if (!options.accessToken) {
    throw new InvalidArgumentError("OuraClient requires a personal access token.");
  }
  return new FetchAdapter({
    accessToken: options.accessToken,
    sslVerify: options.sslVerify,
    timeoutMs: options.timeoutMs,
    fetch: options.fetch,
  });
}

export class OuraClient {
  public readonly baseUrl: string;
  private readonly hostname: string;
  private readonly timeZone: string | undefined;
  private readonly logger: Logger;
  private readonly manager: RequestManager;

  public constructor(options: OuraClientOptions) {
    const adapter = adapterFor(options);
    if (options.timeZone !== undefined && !isValidTimeZone(options.timeZone)) {
      throw new InvalidArgumentError(`Unknown time zone "${options.timeZone}".`);
    }

    this.hostname = options.hostname ?? DEFAULT_HOSTNAME;
    this.baseUrl = `https://${this.hostname}/${options.version ?? DEFAULT_API_VERSION}/usercollection`;
    this.timeZone = options.timeZone;
    this.logger = options.logger ?? noopLogger;
    this.manager = new RequestManager({
      adapter,
      baseUrl: this.baseUrl,
      logger: this.logger,
    });
  }

  public async getPersonalInfo(): Promise<PersonalInfo> {
    const result = await this.manager.get("personal_info");
    return decode(PersonalInfoSchema, result.data, "personal_info");
  }

  /** All rings on the account, or a single ring by document id. */
  public async getRingConfiguration(documentId?: string): Promise<SummaryResult<RingConfiguration>> {
    const resource = summaryResources.ringConfiguration;
    if (documentId) {
      const result = await this.manager.get(`${resource.name}/${documentId}`);
      return { kind: "datum", datum: decode(resource.datum, result.data, resource.name) };
    }
    const result = await this.manager.get(resource.name);
    const collection = decodeCollection(resource.datum, result.data, resource.name);
    return { kind: "collection", data: collection.data, nextToken: collection.next_token };
  }

  /**
   * Fetch a summary resource. A non-empty `nextToken` fetches that single
   * record and wins over any dates; otherwise the date window is validated and
   * the collection for it is returned.
   */
  public async fetchSummary<T>(
    resource: SummaryResource<T>,
    query: SummaryQuery = {}
  ): Promise<SummaryResult<T>> {
    const { start, end, nextToken } = query;

    if (nextToken) {
      this.logger.debug(`next_token=${nextToken}`);
      const result = await this.manager.get(`${resource.name}/${nextToken}`);
      return { kind: "datum", datum: decode(resource.datum, result.data, resource.name) };
    }

    let window: DateWindow;
    try {
      window = resolveDateWindow(start, end, todayInTimezone(this.timeZone));
    } catch (err) {
      if (err instanceof InvalidDateRangeError) this.logger.error(err.message);
      throw err;
    }

    const result = await this.manager.get(resource.name, {
      start_date: window.startDate,
      end_date: window.endDate,
    });
    const collection = decodeCollection(resource.datum, result.data, resource.name);
    return { kind: "collection", data: collection.data, nextToken: collection.next_token };
  }

  /**
   * Revoke the access token this client was built with. Judged by status
   * alone: the endpoint may answer a successful revoke with an empty body.
   */
  public revokeToken(): Promise<RawResponse> {
    return this.manager.sendExpectingStatus("POST", `https://${this.hostname}/oauth/revoke`);
  }
}
