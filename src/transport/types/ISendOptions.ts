import type { IAuthCredentials } from "../../utils/rpc.js";

/**
 * Options forwarded to `fetch` as they are. The transport owns `method`, `body` and `signal`,
 * headers go through {@link ISendOptions.headers}.
 */
type IFetchOptions = Omit<RequestInit, "method" | "body" | "headers" | "signal">;

/**
 * The per-send options a client passes to its transport.
 */
type ISendOptions = {
  /**
   * Headers merged over the transport's own.
   * @example { 'X-Request-Source': 'billing' }
   */
  headers?: Record<string, string>;
  /**
   * Credentials turned into an `Authorization` header.
   */
  auth?: IAuthCredentials;
  /**
   * Passed verbatim to the underlying HTTP call.
   */
  fetchOptions?: IFetchOptions;
  /**
   * Aborts the send when signalled.
   */
  signal?: AbortSignal;
};

export type { ISendOptions, IFetchOptions };
