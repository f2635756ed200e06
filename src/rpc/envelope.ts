import { UsageError } from "../errors/rpc.js";
import { assertIsValidMethodName } from "../utils/assert.js";
import type { RequestIdGenerator } from "./RequestIdGenerator.js";
import type {
  JsonRpcMessage,
  JsonRpcNamedParams,
  JsonRpcNotification,
  JsonRpcParams,
  JsonRpcRequest,
} from "./types.js";

/**
 * A call as the caller expressed it, before it is shaped into a message.
 */
type CallDescriptor = {
  method: string;
  args?: readonly unknown[];
  kwargs?: JsonRpcNamedParams;
  notification?: boolean;
};

/**
 * Checks whether the value is a plain object: not an array, with `Object.prototype`
 * or `null` as its prototype.
 * @param value The value to check.
 */
const isPlainObject = (value: unknown): value is JsonRpcNamedParams => {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }

  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

/**
 * Shapes call arguments into the `params` member.
 *
 * A sole positional plain object is sent by-name. Any other positional arguments are
 * sent by-position, keyword arguments by-name, and no arguments at all leave `params` out.
 *
 * @param method The method name, used in the error message.
 * @param args The positional arguments.
 * @param kwargs The keyword arguments.
 * @returns The params, or `undefined` when there are none.
 * @throws {UsageError} If both positional and keyword arguments are given.
 */
const buildParams = (
  method: string,
  args: readonly unknown[] = [],
  kwargs: JsonRpcNamedParams = {},
): JsonRpcParams | undefined => {
  const hasKwargs = Object.keys(kwargs).length > 0;

  if (args.length > 0 && hasKwargs) {
    throw new UsageError("JSON-RPC forbids mixing positional and keyword arguments", { method });
  }

  if (args.length === 1) {
    const [sole] = args;
    if (isPlainObject(sole)) {
      return { ...sole };
    }
  }

  if (hasKwargs) {
    return { ...kwargs };
  }

  if (args.length > 0) {
    return [...args];
  }

  return undefined;
};

const createNotification = (method: string, params?: JsonRpcParams): JsonRpcNotification =>
  params === undefined ? { jsonrpc: "2.0", method } : { jsonrpc: "2.0", method, params };

const createRequest = (method: string, params: JsonRpcParams | undefined, id: number): JsonRpcRequest => ({
  ...createNotification(method, params),
  id,
});

/**
 * Builds the message for a call. Requests take the next id from `ids`.
 * Notifications take none and carry no `id` key.
 *
 * @example
 * createMessage({ method: "foo", args: [1, 2] }, ids);
 * // { jsonrpc: "2.0", method: "foo", params: [1, 2], id: 1 }
 */
function createMessage(
  descriptor: CallDescriptor & { notification: true },
  ids: RequestIdGenerator,
): JsonRpcNotification;
function createMessage(
  descriptor: CallDescriptor & { notification?: false },
  ids: RequestIdGenerator,
): JsonRpcRequest;
function createMessage(descriptor: CallDescriptor, ids: RequestIdGenerator): JsonRpcMessage;
function createMessage(
  { method, args, kwargs, notification = false }: CallDescriptor,
  ids: RequestIdGenerator,
): JsonRpcMessage {
  assertIsValidMethodName(method);
  const params = buildParams(method, args, kwargs);

  if (notification) {
    return createNotification(method, params);
  }

  return createRequest(method, params, ids.next());
}

export { isPlainObject, buildParams, createNotification, createRequest, createMessage };
export type { CallDescriptor };
