import { Agent, fetch, type Dispatcher } from "undici";
import { TransportAdapter, type RawResponse, type TransportRequest } from "./base.js";

export type FetchFn = typeof fetch;

export interface FetchAdapterOptions {
  accessToken: string;
  /** Verify the server's TLS certificate. Defaults to true. */
  sslVerify?: boolean;
  /** Abort the round trip after this many milliseconds. No limit when unset. */
  timeoutMs?: number;
  fetch?: FetchFn;
}

/** Default transport: one undici `fetch` per request. */
export class FetchAdapter extends TransportAdapter {
  private readonly fetchImpl: FetchFn;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly timeoutMs: number | undefined;

  public constructor(options: FetchAdapterOptions) {
    super(options.accessToken);
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs;
    // Scoped to this adapter; NODE_TLS_REJECT_UNAUTHORIZED (and its warning) stays untouched.
    this.dispatcher =
      options.sslVerify === false
        ? new Agent({ connect: { rejectUnauthorized: false } })
        : undefined;
  }

  protected async dispatch(request: TransportRequest): Promise<RawResponse> {
    const headers: Record<string, string> = { ...request.headers };
    if (request.body) {
      headers["Content-Type"] = "application/json";
    }

    const url = new URL(request.url);
    if (request.params) {
      for (const [key, value] of Object.entries(request.params)) {
        url.searchParams.set(key, value);
      }
    }

    const response = await this.fetchImpl(url.toString(), {
      method: request.method,
      headers,
      body: request.body ? JSON.stringify(request.body) : undefined,
      dispatcher: this.dispatcher,
      signal: this.timeoutMs ? AbortSignal.timeout(this.timeoutMs) : undefined,
    });
    const body = await response.text();

    return { statusCode: response.status, reason: response.statusText, body };
  }
}
