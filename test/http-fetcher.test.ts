import { afterEach, describe, expect, it, vi } from "vitest";

import { HttpStatusError } from "../src/errors";
import { buildPageUrl, HttpDocumentFetcher } from "../src/httpFetcher";
import { OutageType } from "../src/types";

const BASE_URL = "https://wylaczenia-eneaoperator.pl/index.php";

const OPTIONS = {
  baseUrl: BASE_URL,
  requestTimeoutMs: 1_000,
  userAgent: "test-agent/1.0",
};

describe("httpFetcher", () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.useRealTimers();
    vi.clearAllMocks();
  });

  it("builds the page URL with a percent-encoded region", () => {
    expect(buildPageUrl(BASE_URL, "Poznań", OutageType.UNPLANNED)).toBe(
      `${BASE_URL}?page=awarie&oddzial=Pozna%C5%84`
    );
    expect(buildPageUrl(BASE_URL, "Bydgoszcz", OutageType.PLANNED)).toBe(
      `${BASE_URL}?page=planowane&oddzial=Bydgoszcz`
    );
  });

  it("sends exactly one GET with the configured user agent", async () => {
    const fetchMock = vi.fn(async (_url: string, init?: RequestInit) => {
      const headers = new Headers(init?.headers);
      expect(init?.method).toBe("GET");
      expect(headers.get("user-agent")).toBe("test-agent/1.0");
      return new Response("<html>ok</html>", { status: 200 });
    });
    globalThis.fetch = fetchMock as unknown as typeof fetch;

    const html = await new HttpDocumentFetcher(OPTIONS).fetchDocument(
      "Poznań",
      OutageType.UNPLANNED
    );

    expect(html).toBe("<html>ok</html>");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      `${BASE_URL}?page=awarie&oddzial=Pozna%C5%84`
    );
  });

  it("raises HttpStatusError for non-2xx responses", async () => {
    globalThis.fetch = vi.fn(
      async () => new Response("boom", { status: 500, statusText: "Internal Server Error" })
    ) as unknown as typeof fetch;

    const attempt = new HttpDocumentFetcher(OPTIONS).fetchDocument(
      "Poznań",
      OutageType.UNPLANNED
    );

    await expect(attempt).rejects.toBeInstanceOf(HttpStatusError);
    await expect(attempt).rejects.toMatchObject({
      status: 500,
      url: `${BASE_URL}?page=awarie&oddzial=Pozna%C5%84`,
    });
  });

  it("passes transport errors through unchanged", async () => {
    const failure = new TypeError("fetch failed");
    globalThis.fetch = vi.fn(async () => {
      throw failure;
    }) as unknown as typeof fetch;

    await expect(
      new HttpDocumentFetcher(OPTIONS).fetchDocument("Poznań", OutageType.PLANNED)
    ).rejects.toBe(failure);
  });

  it("aborts requests that exceed the timeout", async () => {
    vi.useFakeTimers();
    globalThis.fetch = vi.fn(
      (_url: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () =>
            reject(new Error("request aborted"))
          );
        })
    ) as unknown as typeof fetch;

    const attempt = new HttpDocumentFetcher(OPTIONS).fetchDocument(
      "Poznań",
      OutageType.UNPLANNED
    );
    const assertion = expect(attempt).rejects.toThrow("request aborted");

    await vi.advanceTimersByTimeAsync(1_000);
    await assertion;
  });
});
