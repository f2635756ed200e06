import { type Logger, logger as defaultLogger } from "../logger.js";
import { isPlainObject } from "../rpc/envelope.js";
import { RPCErrorCode } from "../rpc/types.js";
import type { ISendOptions } from "./types/ISendOptions.js";
import type { ITransport } from "./types/ITransport.js";

/**
 * What the handler of a {@link MockTransport} receives for each send.
 */
type MockTransportRequest = {
  endpoint: string;
  /**
   * The decoded payload: a message object, or an array for a batch.
   */
  message: unknown;
  options: ISendOptions;
};

/**
 * Produces the reply to a send. A string is used as the raw body, `undefined` as an
 * empty body, and anything else is JSON-encoded.
 */
type MockTransportHandler = (request: MockTransportRequest) => unknown;

/**
 * Implementations of remote methods for {@link MockTransport.fromMethods}.
 */
type MockMethods = Record<string, (params: unknown) => unknown>;

const abortable = <T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> => {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }

    signal.addEventListener("abort", onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
};

/**
 * The MockTransport is a transport class for testing purposes.
 * It hands every decoded message to a handler instead of the network.
 *
 * @class MockTransport
 * @typedef {MockTransport}
 * @implements {ITransport}
 */
class MockTransport implements ITransport {
  /**
   * The handler to be used in the transport.
   */
  private handler: MockTransportHandler;

  private readonly logger: Logger;

  /**
   * Whether {@link MockTransport.close} has been called.
   */
  public closed = false;

  /**
   * Creates an instance of MockTransport.
   *
   * @constructor
   * @param handler The testing handler.
   * @param logger The logger to write requests and replies to.
   */
  constructor(handler: MockTransportHandler, logger: Logger = defaultLogger) {
    this.handler = handler;
    this.logger = logger.child({ module: "MockTransport" });
  }

  /**
   * Serves JSON-RPC from a map of method implementations, keyed by the full dotted name.
   * Unknown methods answer with a `-32601` error, notifications with an empty body.
   *
   * @example
   * const transport = MockTransport.fromMethods({
   *   "math.subtract": (params) => Array.isArray(params) ? params[0] - params[1] : 0,
   * });
   */
  static fromMethods(methods: MockMethods, logger?: Logger): MockTransport {
    const answer = (message: unknown): unknown => {
      if (!isPlainObject(message) || typeof message.method !== "string") {
        return {
          jsonrpc: "2.0",
          error: { code: RPCErrorCode.InvalidRequest, message: "Invalid Request" },
          id: null,
        };
      }

      const id = message.id;
      const implementation = Object.hasOwn(methods, message.method)
        ? methods[message.method]
        : undefined;

      if (id === undefined) {
        implementation?.(message.params);
        return undefined;
      }
      if (!implementation) {
        return {
          jsonrpc: "2.0",
          error: { code: RPCErrorCode.MethodNotFound, message: "Method not found" },
          id,
        };
      }

      return { jsonrpc: "2.0", result: implementation(message.params), id };
    };

    return new MockTransport(({ message }) => {
      if (Array.isArray(message)) {
        return message.map(answer).filter((reply) => reply !== undefined);
      }

      return answer(message);
    }, logger);
  }

  /**
   * Decodes the payload, passes it to the handler and encodes the reply.
   *
   * @public
   * @async
   * @param endpoint The endpoint the client targets.
   * @param payload The encoded message.
   * @param options The per-send options, handed to the handler.
   * @returns The reply body.
   */
  public async send(endpoint: string, payload: string, options: ISendOptions = {}): Promise<string> {
    if (this.closed) {
      throw new Error("Transport is closed");
    }

    const message: unknown = JSON.parse(payload);
    this.logger.debug({ message }, "MockTransport: request");

    const reply = await abortable(
      Promise.resolve().then(() => this.handler({ endpoint, message, options })),
      options.signal,
    );
    const body = reply === undefined ? "" : typeof reply === "string" ? reply : JSON.stringify(reply);

    this.logger.debug({ body }, "MockTransport: response");

    return body;
  }

  public async close(): Promise<void> {
    this.closed = true;
  }
}

export { MockTransport };
export type { MockTransportRequest, MockTransportHandler, MockMethods };
