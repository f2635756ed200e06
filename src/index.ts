export { RPCClient } from "./clients/RPCClient.js";
export { createRPCClient, withRPCClient } from "./clients/createRPCClient.js";
export type { RPCClientOptions } from "./clients/createRPCClient.js";
export { createMethodProxy, RESERVED_ROOT_NAMES } from "./clients/methodProxy.js";
export type { ClientHandle, ClientFacilities, RemoteMethod } from "./clients/methodProxy.js";
export { MethodPath } from "./clients/MethodPath.js";
export type { Dispatch } from "./clients/MethodPath.js";
export { KeywordArguments, kwargs, notification } from "./clients/KeywordArguments.js";
export type { IRPCClientConfig } from "./clients/types/Configs.js";
export type { BatchCall, CallOptions, RequestOptions } from "./clients/types/RPC.js";

export { HttpTransport } from "./transport/HttpTransport.js";
export { MockTransport } from "./transport/MockTransport.js";
export type {
  MockMethods,
  MockTransportHandler,
  MockTransportRequest,
} from "./transport/MockTransport.js";
export { ITransport } from "./transport/types/ITransport.js";
export type { IHttpTransportConfig } from "./transport/types/IHttpTransportConfig.js";
export type { IFetchOptions, ISendOptions } from "./transport/types/ISendOptions.js";

export { RequestIdGenerator } from "./rpc/RequestIdGenerator.js";
export { buildParams, createMessage, createNotification, createRequest } from "./rpc/envelope.js";
export type { CallDescriptor } from "./rpc/envelope.js";
export { parseResponse, validateResponse } from "./rpc/response.js";
export { RPCErrorCode, isServerErrorCode } from "./rpc/types.js";
export type {
  JsonRpcErrorResponse,
  JsonRpcMessage,
  JsonRpcNamedParams,
  JsonRpcNotification,
  JsonRpcParams,
  JsonRpcRequest,
  JsonRpcResponse,
  JsonRpcSuccessResponse,
} from "./rpc/types.js";

export { createJsonCodec, defaultJsonCodec } from "./codec/json.js";
export type { IJsonCodec } from "./codec/json.js";

export { BaseError } from "./errors/BaseError.js";
export {
  HttpStatusError,
  ParseError,
  ProtocolError,
  RequestTimeoutError,
  TransportError,
  UsageError,
} from "./errors/rpc.js";

export { logger } from "./logger.js";
export type { Logger } from "./logger.js";
export type { IAuthCredentials } from "./utils/rpc.js";
export { version } from "./version.js";
