import type { Logger } from "../../logger.js";

/**
 * The interface representing the configuration of the HTTP transport.
 */
type IHttpTransportConfig = {
  /**
   * The request timeout.
   * If the request is not completed within the timeout, it will be rejected.
   * @example 1000
   * @default 20000
   */
  timeout?: number;
  /**
   * The fetch function to be used for making requests.
   * This is useful for testing purposes and leveraging signals/etc.
   * @default globalThis.fetch
   */
  fetcher?: typeof fetch;
  /**
   * The headers to be sent with every request, over the defaults.
   * @example { 'My-header': 'my-value' }
   * @default {}
   */
  headers?: Record<string, string>;
  /**
   * The logger the transport writes to.
   * @default the shared `jsonrpcjs` logger
   */
  logger?: Logger;
};

export type { IHttpTransportConfig };
