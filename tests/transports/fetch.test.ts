import { describe, it, expect, vi, beforeEach } from "vitest";
import { Agent, Response } from "undici";
import { InvalidArgumentError, RequestFailedError } from "../../src/errors.js";
import { FetchAdapter, type FetchFn } from "../../src/transports/fetch.js";

const ENDPOINT = "https://api.example.test/v2/usercollection/daily_sleep";

const mockFetch = vi.fn<FetchFn>();

function textResponse(status: number, statusText: string, body: string): Response {
  return new Response(body, { status, statusText });
}

beforeEach(() => {
  mockFetch.mockReset();
});

describe("FetchAdapter", () => {
  it("sends one request with the bearer header and query params", async () => {
    mockFetch.mockResolvedValue(textResponse(200, "OK", '{"data":[]}'));
    const adapter = new FetchAdapter({ accessToken: "test-token", fetch: mockFetch });

    const raw = await adapter.send("GET", ENDPOINT, {
      start_date: "2025-02-10",
      end_date: "2025-02-11",
    });

    expect(raw).toEqual({ statusCode: 200, reason: "OK", body: '{"data":[]}' });
    expect(mockFetch).toHaveBeenCalledOnce();
    const [input, init] = mockFetch.mock.calls[0];
    expect(input).toBe(`${ENDPOINT}?start_date=2025-02-10&end_date=2025-02-11`);
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({ Authorization: "Bearer test-token" });
    expect(init?.body).toBeUndefined();
  });

  it("sends a POST body as JSON", async () => {
    mockFetch.mockResolvedValue(textResponse(200, "OK", "{}"));
    const adapter = new FetchAdapter({ accessToken: "test-token", fetch: mockFetch });

    await adapter.send("POST", ENDPOINT, undefined, { note: "hello" });

    const [, init] = mockFetch.mock.calls[0];
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      Authorization: "Bearer test-token",
      "Content-Type": "application/json",
    });
    expect(init?.body).toBe('{"note":"hello"}');
  });

  it("returns non-2xx responses untouched", async () => {
    mockFetch.mockResolvedValue(textResponse(401, "Unauthorized", '{"detail":"bad token"}'));
    const adapter = new FetchAdapter({ accessToken: "test-token", fetch: mockFetch });

    const raw = await adapter.send("GET", ENDPOINT);

    expect(raw).toEqual({ statusCode: 401, reason: "Unauthorized", body: '{"detail":"bad token"}' });
  });

  it("wraps fetch failures in RequestFailedError", async () => {
    const cause = new TypeError("fetch failed");
    mockFetch.mockRejectedValue(cause);
    const adapter = new FetchAdapter({ accessToken: "test-token", fetch: mockFetch });

    const err = await adapter.send("GET", ENDPOINT).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RequestFailedError);
    expect(err).toMatchObject({ message: "Error making request: fetch failed", cause });
  });

  it("rejects an unparseable URL as an invalid argument without calling fetch", async () => {
    const adapter = new FetchAdapter({ accessToken: "test-token", fetch: mockFetch });

    await expect(adapter.send("GET", "not a url")).rejects.toThrow(InvalidArgumentError);
    await expect(adapter.send("GET", "not a url")).rejects.toThrow('Invalid request URL "not a url".');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("verifies TLS by default", async () => {
    mockFetch.mockResolvedValue(textResponse(200, "OK", "{}"));
    const adapter = new FetchAdapter({ accessToken: "test-token", fetch: mockFetch });

    await adapter.send("GET", ENDPOINT);

    expect(mockFetch.mock.calls[0][1]?.dispatcher).toBeUndefined();
  });

  it("uses a dedicated dispatcher when TLS verification is off", async () => {
    mockFetch.mockResolvedValue(textResponse(200, "OK", "{}"));
    const adapter = new FetchAdapter({ accessToken: "test-token", sslVerify: false, fetch: mockFetch });

    await adapter.send("GET", ENDPOINT);

    expect(mockFetch.mock.calls[0][1]?.dispatcher).toBeInstanceOf(Agent);
  });

  it("attaches an abort signal only when a timeout is set", async () => {
    mockFetch.mockResolvedValue(textResponse(200, "OK", "{}"));
    const withTimeout = new FetchAdapter({ accessToken: "test-token", timeoutMs: 5_000, fetch: mockFetch });
    const withoutTimeout = new FetchAdapter({ accessToken: "test-token", fetch: mockFetch });

    await withTimeout.send("GET", ENDPOINT);
    mockFetch.mockResolvedValue(textResponse(200, "OK", "{}"));
    await withoutTimeout.send("GET", ENDPOINT);

    expect(mockFetch.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
    expect(mockFetch.mock.calls[1][1]?.signal).toBeUndefined();
  });
});
