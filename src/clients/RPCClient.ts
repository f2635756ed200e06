import { type IJsonCodec, createJsonCodec } from "../codec/json.js";
import {
  HttpStatusError,
  ParseError,
  ProtocolError,
  RequestTimeoutError,
  TransportError,
  UsageError,
} from "../errors/rpc.js";
import { type Logger, logger as defaultLogger } from "../logger.js";
import { RequestIdGenerator } from "../rpc/RequestIdGenerator.js";
import { createMessage } from "../rpc/envelope.js";
import { decodeBody, parseResponse, readResult, validateResponse } from "../rpc/response.js";
import {
  type JsonRpcMessage,
  type JsonRpcNamedParams,
  type JsonRpcRequest,
  isRequest,
} from "../rpc/types.js";
import { HttpTransport } from "../transport/HttpTransport.js";
import type { ISendOptions } from "../transport/types/ISendOptions.js";
import type { ITransport } from "../transport/types/ITransport.js";
import { ClientConfigSchema, type IRPCClientConfig } from "./types/Configs.js";
import type { BatchCall, CallOptions, RequestOptions } from "./types/RPC.js";

const BATCH_LABEL = "batch";

/**
 * RPCClient builds JSON-RPC messages, sends them through its transport and turns the
 * replies into results or errors.
 * @class RPCClient
 */
class RPCClient {
  /**
   * The URL every message is sent to.
   */
  readonly endpoint: string;

  private readonly config: IRPCClientConfig;

  /**
   * The id source of this client. Ids are unique for its whole lifetime.
   */
  private readonly ids = new RequestIdGenerator();

  private readonly codec: IJsonCodec;

  private readonly logger: Logger;

  private readonly borrowedTransport?: ITransport;

  private ownedTransport?: HttpTransport;

  private closed = false;

  /**
   * Creates an instance of RPCClient.
   * @constructor
   * @param {IRPCClientConfig} config The endpoint, the transport or its settings, and call defaults.
   * @throws {UsageError} If the configuration is invalid.
   */
  constructor(config: IRPCClientConfig) {
    const parsed = ClientConfigSchema.safeParse({
      endpoint: config.endpoint,
      timeout: config.timeout,
      headers: config.headers,
      auth: config.auth,
    });
    if (!parsed.success) {
      throw new UsageError(
        `Invalid client configuration: ${parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")}`,
        { cause: parsed.error },
      );
    }

    this.config = config;
    this.endpoint = config.endpoint;
    this.borrowedTransport = config.transport;
    this.codec = createJsonCodec({ decode: config.decode });
    this.logger = (config.logger ?? defaultLogger).child({
      module: "RPCClient",
      endpoint: config.endpoint,
    });
  }

  /**
   * The transport in use. A transport the caller supplied is returned as-is,
   * otherwise an {@link HttpTransport} is created on first access.
   * @throws {UsageError} If the client is closed and never created its transport.
   */
  get transport(): ITransport {
    if (this.borrowedTransport) {
      return this.borrowedTransport;
    }

    if (!this.ownedTransport) {
      this.assertOpen();
      this.ownedTransport = new HttpTransport({
        timeout: this.config.timeout,
        fetcher: this.config.fetcher,
        logger: this.config.logger,
      });
    }

    return this.ownedTransport;
  }

  /**
   * Whether {@link RPCClient.close} releases the transport.
   */
  get ownsTransport(): boolean {
    return this.borrowedTransport === undefined;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Calls a remote method and resolves with its result.
   * @param method The dotted method name.
   * @param args Positional arguments. A sole plain object is sent by-name.
   * @param kwargs Keyword arguments. Cannot be combined with `args`.
   * @param options The call options.
   * @example
   * await client.request("subtract", [42, 23]); // 19
   * await client.request("subtract", [], { minuend: 42, subtrahend: 23 }); // 19
   */
  public async request(
    method: string,
    args: readonly unknown[] = [],
    kwargs: JsonRpcNamedParams = {},
    options: RequestOptions = {},
  ): Promise<unknown> {
    this.assertOpen();
    const message = createMessage({ method, args, kwargs }, this.ids);
    return this.dispatch(message, options);
  }

  /**
   * Sends a notification. Resolves once the transport accepted it, the reply body is ignored.
   * @param method The dotted method name.
   * @param args Positional arguments. A sole plain object is sent by-name.
   * @param kwargs Keyword arguments. Cannot be combined with `args`.
   * @param options The call options.
   */
  public async notify(
    method: string,
    args: readonly unknown[] = [],
    kwargs: JsonRpcNamedParams = {},
    options: RequestOptions = {},
  ): Promise<void> {
    this.assertOpen();
    const message = createMessage({ method, args, kwargs, notification: true }, this.ids);
    await this.dispatch(message, options);
  }

  /**
   * Calls a remote method by name, as a request or, with `options.notification`, as a
   * notification. This is also how methods named like a reserved handle name are reached.
   * @returns The result, or `undefined` for a notification.
   */
  public async call(
    method: string,
    args: readonly unknown[] = [],
    kwargs: JsonRpcNamedParams = {},
    { notification = false, ...options }: CallOptions = {},
  ): Promise<unknown> {
    if (notification) {
      await this.notify(method, args, kwargs, options);
      return undefined;
    }

    return this.request(method, args, kwargs, options);
  }

  /**
   * Sends several requests as one JSON-RPC batch and matches the replies by id.
   * @param calls The calls, keyed by a name of the caller's choice.
   * @param options The call options.
   * @returns The results under the same names.
   * @throws {ProtocolError} For the first error reply, in reply order.
   * @throws {ParseError} If the reply is not an array or its ids do not match the requests.
   * @example
   * const { sum, diff } = await client.batch({
   *   sum: { method: "math.add", args: [1, 2] },
   *   diff: { method: "math.subtract", kwargs: { minuend: 5, subtrahend: 3 } },
   * });
   */
  public async batch(
    calls: Readonly<Record<string, BatchCall>>,
    options: RequestOptions = {},
  ): Promise<Record<string, unknown>> {
    this.assertOpen();

    const entries = Object.entries(calls);
    if (entries.length === 0) {
      throw new UsageError("A batch must contain at least one call", { method: BATCH_LABEL });
    }

    const pending = new Map<number, { name: string; request: JsonRpcRequest }>();
    const requests = entries.map(([name, { method, args, kwargs }]) => {
      const request = createMessage({ method, args, kwargs }, this.ids);
      pending.set(request.id, { name, request });
      return request;
    });

    this.logger.debug({ size: requests.length }, "sending batch");
    const body = await this.send(BATCH_LABEL, this.codec.encode(requests), options);
    const payload = decodeBody(body, this.codec, BATCH_LABEL);

    if (!Array.isArray(payload)) {
      const response = validateResponse(payload, BATCH_LABEL, body);
      if ("error" in response) {
        const { code, message, data } = response.error;
        throw new ProtocolError(message, { method: BATCH_LABEL, code, data, id: response.id });
      }

      throw new ParseError("Batch response must be an array", { method: BATCH_LABEL, body });
    }

    const results = new Map<string, unknown>();
    for (const item of payload) {
      const response = validateResponse(item, BATCH_LABEL, body);
      const match = typeof response.id === "number" ? pending.get(response.id) : undefined;

      if (!match) {
        if ("error" in response && response.id === null) {
          const { code, message, data } = response.error;
          throw new ProtocolError(message, { method: BATCH_LABEL, code, data, id: null });
        }

        throw new ParseError(`Batch response contains unknown id ${JSON.stringify(response.id)}`, {
          method: BATCH_LABEL,
          body,
        });
      }

      pending.delete(match.request.id);
      results.set(match.name, readResult(response, match.request, body));
    }

    if (pending.size > 0) {
      throw new ParseError(`Batch response is missing ids ${[...pending.keys()].join(", ")}`, {
        method: BATCH_LABEL,
        body,
      });
    }

    this.logger.debug({ size: results.size }, "batch completed");
    return Object.fromEntries(entries.map(([name]): [string, unknown] => [name, results.get(name)]));
  }

  /**
   * Releases the transport if this client created it. Later calls fail with {@link UsageError}.
   * Closing twice is a no-op.
   */
  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    if (this.ownedTransport) {
      await this.ownedTransport.close();
    }
    this.logger.debug("client closed");
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new UsageError("Client is closed");
    }
  }

  private async dispatch(message: JsonRpcMessage, options: RequestOptions): Promise<unknown> {
    const log = this.logger.child(
      isRequest(message) ? { method: message.method, id: message.id } : { method: message.method },
    );

    log.debug(isRequest(message) ? "sending request" : "sending notification");
    const body = await this.send(message.method, this.codec.encode(message), options);

    if (!isRequest(message)) {
      log.debug("notification delivered");
      return undefined;
    }

    try {
      const result = parseResponse(body, message, this.codec);
      log.debug("received result");
      return result;
    } catch (error) {
      log.debug({ err: error }, "call failed");
      throw error;
    }
  }

  /**
   * Hands a payload to the transport. Failures are wrapped in {@link TransportError},
   * except a cancellation by the caller, whose abort reason is rethrown as-is.
   */
  private async send(method: string, payload: string, { signal }: RequestOptions): Promise<string> {
    const { headers, auth, fetchOptions } = this.config;
    const sendOptions: ISendOptions = { headers, auth, fetchOptions, signal };
    const { transport } = this;

    try {
      return await transport.send(this.endpoint, payload, sendOptions);
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }

      const reason =
        error instanceof HttpStatusError || error instanceof RequestTimeoutError
          ? error.message
          : "Transport Error";
      this.logger.debug({ err: error, method }, "transport failed");
      throw new TransportError(reason, { method, cause: error });
    }
  }
}

export { RPCClient };
