import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from "./config.js";
import { DwdApiError } from "./errors.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";
import { SERVER_NAME, SERVER_VERSION } from "./version.js";

export type QueryParams = Record<string, string>;

/** Issues one GET against the upstream API and resolves to the decoded JSON body. */
export type Transport = (endpoint: string, params?: QueryParams) => Promise<unknown>;

export interface HttpTransportOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

const DWD_HEADERS = {
  "User-Agent": `${SERVER_NAME}/${SERVER_VERSION}`,
  Accept: "application/json",
};

export function createHttpTransport(options: HttpTransportOptions = {}): Transport {
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl = options.fetch ?? fetch;
  const logger = options.logger ?? createLogger();

  return async (endpoint, params = {}) => {
    const query = new URLSearchParams(params).toString();
    const url = query ? `${baseUrl}${endpoint}?${query}` : `${baseUrl}${endpoint}`;

    const fail = (reason: string, status?: number, cause?: unknown): DwdApiError => {
      logger.error("DWD request failed", { url, reason });
      return new DwdApiError(`Failed to fetch data from ${url}: ${reason}`, {
        endpoint,
        url,
        status,
        cause,
      });
    };

    let response: Response;
    try {
      response = await fetchImpl(url, {
        headers: DWD_HEADERS,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw fail(errorMessage(error), undefined, error);
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw fail(`HTTP ${response.status} ${response.statusText}`.trim(), response.status);
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw fail(`invalid JSON body (${errorMessage(error)})`, response.status, error);
    }
  };
}
