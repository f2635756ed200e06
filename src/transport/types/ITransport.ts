import type { ISendOptions } from "./ISendOptions.js";

/**
 * The transport interface.
 */
abstract class ITransport {
  /**
   * Sends an encoded message and resolves with the raw reply body.
   * @param endpoint - The URL to send to.
   * @param payload - The encoded message.
   * @param options - Headers, credentials and passthrough options.
   * @returns The response body as text.
   */
  abstract send(endpoint: string, payload: string, options?: ISendOptions): Promise<string>;

  /**
   * Releases the resources held by the transport.
   */
  abstract close(): Promise<void>;
}

export { ITransport };
