import { describe, expect, it, vi } from "vitest";
import { DwdApiError } from "./errors.js";
import { createHttpTransport } from "./transport.js";

const jsonResponse = (body: unknown, init: ResponseInit = { status: 200 }) =>
  new Response(JSON.stringify(body), init);

describe("createHttpTransport", () => {
  it("requests the endpoint under the base URL with query parameters", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ stations: [] }));
    const transport = createHttpTransport({ baseUrl: "https://dwd.example.test/", fetch: fetchMock });

    const body = await transport("/stationOverviewExtended", { stationIds: "10382,10384" });

    expect(body).toEqual({ stations: [] });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      "https://dwd.example.test/stationOverviewExtended?stationIds=10382%2C10384",
    );
    expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({
      headers: { "User-Agent": "dwd-weather-mcp/0.1.0", Accept: "application/json" },
    });
  });

  it("omits the query string when there are no parameters", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse([]));
    const transport = createHttpTransport({ baseUrl: "https://dwd.example.test", fetch: fetchMock });

    await transport("/warnings_nowcast.json");

    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://dwd.example.test/warnings_nowcast.json");
  });

  it("passes a timeout signal to fetch", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse([]));
    const transport = createHttpTransport({ fetch: fetchMock, timeoutMs: 5_000 });

    await transport("/warnings_nowcast.json");

    expect(fetchMock.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
  });

  it("raises DwdApiError for a non-2xx status", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ message: "down" }, { status: 503, statusText: "Service Unavailable" }),
    );
    const transport = createHttpTransport({ baseUrl: "https://dwd.example.test", fetch: fetchMock });

    const failure = transport("/warnings_nowcast.json");

    await expect(failure).rejects.toBeInstanceOf(DwdApiError);
    await expect(failure).rejects.toMatchObject({
      message:
        "Failed to fetch data from https://dwd.example.test/warnings_nowcast.json: HTTP 503 Service Unavailable",
      endpoint: "/warnings_nowcast.json",
      status: 503,
    });
  });

  it("releases the body of a failed response", async () => {
    const response = new Response("upstream error page", { status: 500, statusText: "Internal Server Error" });
    const transport = createHttpTransport({
      baseUrl: "https://dwd.example.test",
      fetch: vi.fn<typeof fetch>(async () => response),
    });

    await expect(transport("/warnings_nowcast.json")).rejects.toMatchObject({ status: 500 });
    expect(response.bodyUsed).toBe(true);
  });

  it("wraps connection failures", async () => {
    const cause = new TypeError("fetch failed");
    const fetchMock = vi.fn<typeof fetch>(async () => {
      throw cause;
    });
    const transport = createHttpTransport({ baseUrl: "https://dwd.example.test", fetch: fetchMock });

    await expect(transport("/crowd_meldungen_overview_v2.json")).rejects.toMatchObject({
      name: "DwdApiError",
      message: "Failed to fetch data from https://dwd.example.test/crowd_meldungen_overview_v2.json: fetch failed",
      cause,
    });
  });

  it("rejects a body that is not JSON", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response("<html>maintenance</html>", { status: 200 }));
    const transport = createHttpTransport({ baseUrl: "https://dwd.example.test", fetch: fetchMock });

    await expect(transport("/warnings_nowcast.json")).rejects.toThrow(
      /^Failed to fetch data from https:\/\/dwd\.example\.test\/warnings_nowcast\.json: invalid JSON body/,
    );
  });
});
