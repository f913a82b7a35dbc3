import { InvalidArgumentError, RequestFailedError } from "../errors.js";

export type HttpMethod = "GET" | "POST";

const SUPPORTED_METHODS: ReadonlySet<string> = new Set<HttpMethod>(["GET", "POST"]);

export function isHttpMethod(value: string): value is HttpMethod {
  return SUPPORTED_METHODS.has(value);
}

export type QueryParams = Record<string, string>;

/** Outbound request as it leaves the adapter, credential attached. */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  params?: QueryParams;
  body?: Record<string, unknown>;
}

/** Undecoded response as the transport saw it. */
export interface RawResponse {
  statusCode: number;
  reason: string;
  body: string;
}

/**
 * Performs exactly one authenticated HTTP round trip per `send`.
 *
 * Subclasses implement `dispatch`. Argument checks, the bearer header and
 * wrapping of transport failures in `RequestFailedError` happen here.
 */
export abstract class TransportAdapter {
  private readonly token: string;

  protected constructor(token: string) {
    if (!token) {
      throw new InvalidArgumentError("A personal access token is required.");
    }
    this.token = token;
  }

  public async send(
    method: string,
    url: string,
    params?: QueryParams,
    body?: Record<string, unknown>
  ): Promise<RawResponse> {
    if (!url) {
      throw new InvalidArgumentError("A request URL is required.");
    }
    if (!URL.canParse(url)) {
      throw new InvalidArgumentError(`Invalid request URL "${url}".`);
    }
    if (!isHttpMethod(method)) {
      throw new InvalidArgumentError(`Unsupported HTTP method "${method}". Use GET or POST.`);
    }

    try {
      return await this.dispatch({
        method,
        url,
        headers: { Authorization: `Bearer ${this.token}` },
        params,
        body,
      });
    } catch (err) {
      if (err instanceof RequestFailedError) throw err;
      const detail = err instanceof Error ? err.message : String(err);
      throw new RequestFailedError(`Error making request: ${detail}`, err);
    }
  }

  protected abstract dispatch(request: TransportRequest): Promise<RawResponse>;
}
