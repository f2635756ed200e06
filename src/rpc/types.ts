import type { JSONRPC, JSONRPCError, JSONRPCID } from "json-rpc-2.0";

/**
 * Named parameters of a call.
 */
type JsonRpcNamedParams = { readonly [name: string]: unknown };

/**
 * The `params` member: by-position through an array or by-name through an object.
 */
type JsonRpcParams = readonly unknown[] | JsonRpcNamedParams;

interface JsonRpcNotification {
  readonly jsonrpc: JSONRPC;
  readonly method: string;
  readonly params?: JsonRpcParams;
}

interface JsonRpcRequest extends JsonRpcNotification {
  readonly id: number;
}

/**
 * Anything the client puts on the wire as a single message.
 */
type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification;

interface JsonRpcSuccessResponse<T = unknown> {
  jsonrpc: JSONRPC;
  id: JSONRPCID;
  result: T;
}

interface JsonRpcErrorResponse {
  jsonrpc: JSONRPC;
  id: JSONRPCID;
  error: JSONRPCError;
}

type JsonRpcResponse<T = unknown> = JsonRpcSuccessResponse<T> | JsonRpcErrorResponse;

/**
 * The error codes reserved by JSON-RPC 2.0.
 */
const RPCErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
} as const;

/**
 * Checks whether the code lies in the -32000..-32099 range left to server implementations.
 * @param code The error code.
 */
const isServerErrorCode = (code: number): boolean => code <= -32000 && code >= -32099;

const isRequest = (message: JsonRpcMessage): message is JsonRpcRequest => "id" in message;

export { RPCErrorCode, isServerErrorCode, isRequest };
export type {
  JsonRpcNamedParams,
  JsonRpcParams,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcMessage,
  JsonRpcSuccessResponse,
  JsonRpcErrorResponse,
  JsonRpcResponse,
};
