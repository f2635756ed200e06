import type { JsonRpcNamedParams } from "../../rpc/types.js";

/**
 * Options of a single round trip.
 */
type RequestOptions = {
  /**
   * Cancels the call. The abort reason is rethrown to the caller as-is.
   */
  signal?: AbortSignal;
};

/**
 * Options of a call that may be sent as a notification.
 */
type CallOptions = RequestOptions & {
  /**
   * Send without an id and do not wait for a reply body.
   */
  notification?: boolean;
};

/**
 * One member of a batch.
 */
type BatchCall = {
  method: string;
  args?: readonly unknown[];
  kwargs?: JsonRpcNamedParams;
};

export type { RequestOptions, CallOptions, BatchCall };
