export interface DwdApiErrorDetails {
  endpoint: string;
  url: string;
  status?: number;
  cause?: unknown;
}

/**
 * Raised when a feed request fails as a whole: network failure, timeout,
 * non-2xx status or a body that is not JSON.
 */
export class DwdApiError extends Error {
  readonly endpoint: string;
  readonly url: string;
  readonly status?: number;

  constructor(message: string, details: DwdApiErrorDetails) {
    super(message, { cause: details.cause });
    this.name = "DwdApiError";
    this.endpoint = details.endpoint;
    this.url = details.url;
    this.status = details.status;
  }
}
