import { HttpStatusError, RequestTimeoutError } from "../errors/rpc.js";
import { type Logger, logger as defaultLogger } from "../logger.js";
import { authorizationHeader, isValidHttpHeaders, requestHeadersWithDefaults } from "../utils/rpc.js";
import type { IHttpTransportConfig } from "./types/IHttpTransportConfig.js";
import type { ISendOptions } from "./types/ISendOptions.js";
import type { ITransport } from "./types/ITransport.js";

const getIsomorphicFetch = (): typeof fetch => {
  if (typeof globalThis.fetch === "function") {
    return globalThis.fetch.bind(globalThis);
  }

  throw new Error("No fetch implementation found");
};

/**
 * HttpTransport sends messages as HTTP POST requests through `fetch`.
 *
 * @class HttpTransport
 * @typedef {HttpTransport}
 * @implements {ITransport}
 */
class HttpTransport implements ITransport {
  /**
   * The timeout for the requests.
   */
  public timeout: number;

  /**
   * The headers to be used in the requests.
   */
  public headers: Record<string, string>;

  /**
   * The fetcher to be used in the requests.
   */
  public fetcher: typeof fetch;

  /**
   * Controllers of the requests in flight, aborted on close.
   */
  private readonly inFlight = new Set<AbortController>();

  private closed = false;

  private readonly logger: Logger;

  constructor({ timeout = 20000, headers, fetcher, logger }: IHttpTransportConfig = {}) {
    this.timeout = timeout;
    this.headers = requestHeadersWithDefaults(headers);
    this.fetcher = fetcher ?? getIsomorphicFetch();
    this.logger = (logger ?? defaultLogger).child({ module: "HttpTransport" });
  }

  /**
   * Sends a payload to the endpoint.
   *
   * @public
   * @async
   * @param endpoint The URL to post to.
   * @param payload The encoded message.
   * @param options Per-send headers, credentials, fetch options and signal.
   * @returns The response body.
   * @throws {HttpStatusError} For a non-2xx reply.
   * @throws {RequestTimeoutError} If the request outlives {@link HttpTransport.timeout}.
   */
  public async send(
    endpoint: string,
    payload: string,
    { headers, auth, fetchOptions, signal }: ISendOptions = {},
  ): Promise<string> {
    if (this.closed) {
      throw new Error("Transport is closed");
    }
    if (headers !== undefined) {
      isValidHttpHeaders(headers);
    }

    const abortController = new AbortController();
    this.inFlight.add(abortController);

    /**
     * Aborted by close(), by the timeout or by the caller, whichever comes first.
     */
    const timeoutSignal = AbortSignal.timeout(this.timeout);
    const signals = [abortController.signal, timeoutSignal];
    if (signal) {
      signals.push(signal);
    }

    try {
      const response = await this.fetcher(endpoint, {
        ...fetchOptions,
        method: "POST",
        headers: { ...this.headers, ...headers, ...authorizationHeader(auth) },
        body: payload,
        signal: AbortSignal.any(signals),
      });

      if (!response.ok) {
        throw new HttpStatusError(response.status, response.statusText);
      }

      return await response.text();
    } catch (error) {
      if (timeoutSignal.aborted && !signal?.aborted) {
        this.logger.debug({ endpoint, timeout: this.timeout }, "request timed out");
        throw new RequestTimeoutError(this.timeout, error);
      }

      throw error;
    } finally {
      this.inFlight.delete(abortController);
    }
  }

  /**
   * Aborts the requests in flight and rejects further sends.
   * Closing twice is a no-op.
   */
  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.logger.debug({ inFlight: this.inFlight.size }, "closing transport");
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }
}

export { HttpTransport };
