import type { JSONRPCID } from "json-rpc-2.0";
import { BaseError, type IBaseErrorParameters } from "./BaseError.js";

/**
 * Raised when the transport fails to deliver a message or to receive its reply.
 * The original failure is kept as `cause`.
 */
class TransportError extends BaseError {
  constructor(reason: string, parameters: IBaseErrorParameters = {}) {
    super(
      parameters.method === undefined
        ? reason
        : `Error calling method '${parameters.method}': ${reason}`,
      parameters,
    );
  }
}

/**
 * Raised when a response body is not JSON or does not match the JSON-RPC response envelope.
 */
class ParseError extends BaseError {
  /**
   * The raw response body, if one was received.
   */
  public readonly body?: string;

  constructor(message: string, parameters: IBaseErrorParameters & { body?: string } = {}) {
    super(message, parameters);
    this.body = parameters.body;
  }
}

/**
 * The parameters of {@link ProtocolError}.
 */
type IProtocolErrorParameters = IBaseErrorParameters & {
  code: number;
  data?: unknown;
  id?: JSONRPCID;
};

/**
 * Raised for a well-formed JSON-RPC error response.
 * `message` is the server's message as-is.
 */
class ProtocolError extends BaseError {
  /**
   * The JSON-RPC error code, see {@link RPCErrorCode}.
   */
  public readonly code: number;

  /**
   * The optional `data` member of the error object.
   */
  public readonly data?: unknown;

  /**
   * The id of the response. `null` when the server could not determine the request id.
   */
  public readonly id?: JSONRPCID;

  constructor(message: string, { code, data, id, ...parameters }: IProtocolErrorParameters) {
    super(message, parameters);
    this.code = code;
    this.data = data;
    this.id = id;
  }
}

/**
 * Raised when the caller breaks the calling contract, before anything is sent.
 */
class UsageError extends BaseError {}

/**
 * Raised by HTTP transports for a non-2xx reply.
 */
class HttpStatusError extends BaseError {
  public readonly status: number;
  public readonly statusText: string;

  constructor(status: number, statusText: string) {
    super(`HTTP ${status} ${statusText}`);
    this.status = status;
    this.statusText = statusText;
  }
}

/**
 * Raised by transports when a request outlives the configured timeout.
 */
class RequestTimeoutError extends BaseError {
  public readonly timeout: number;

  constructor(timeout: number, cause?: unknown) {
    super(`Request timed out after ${timeout}ms`, { cause });
    this.timeout = timeout;
  }
}

export {
  TransportError,
  ParseError,
  ProtocolError,
  UsageError,
  HttpStatusError,
  RequestTimeoutError,
};
export type { IProtocolErrorParameters };
