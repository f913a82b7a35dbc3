import { TransportAdapter, type RawResponse, type TransportRequest } from "./base.js";

type StubReply = RawResponse | Error;

/**
 * In-process transport that replays queued responses and records every
 * request it receives. An `Error` in the queue is thrown from `dispatch`, the
 * way a real transport failure would surface.
 */
export class StubAdapter extends TransportAdapter {
  private readonly replies: StubReply[] = [];
  private readonly sent: TransportRequest[] = [];

  public constructor(accessToken = "stub-token") {
    super(accessToken);
  }

  /** Queue a response. Replies are consumed in order. */
  public reply(statusCode: number, reason: string, body: unknown): this {
    this.replies.push({
      statusCode,
      reason,
      body: typeof body === "string" ? body : JSON.stringify(body),
    });
    return this;
  }

  public fail(error: Error): this {
    this.replies.push(error);
    return this;
  }

  protected async dispatch(request: TransportRequest): Promise<RawResponse> {
    this.sent.push(request);
    const next = this.replies.shift();
    if (!next) {
      return { statusCode: 404, reason: "Not Found", body: JSON.stringify({ detail: "not stubbed" }) };
    }
    if (next instanceof Error) throw next;
    return next;
  }

  public get sentRequests(): TransportRequest[] {
    return [...this.sent];
  }
}
