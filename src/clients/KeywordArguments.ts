import type { JsonRpcNamedParams } from "../rpc/types.js";
import type { CallOptions } from "./types/RPC.js";

/**
 * Marks the last argument of a fluent call as keyword arguments plus call options.
 * Only recognised in last position. The options never reach `params`.
 */
class KeywordArguments {
  constructor(
    public readonly values: JsonRpcNamedParams = {},
    public readonly options: CallOptions = {},
  ) {}
}

/**
 * Passes keyword arguments, and optionally call options, to a fluent call.
 * @example
 * await rpc.subtract(kwargs({ minuend: 42, subtrahend: 23 }));
 * await rpc.slow.report(kwargs({}, { signal: controller.signal }));
 */
const kwargs = (values: JsonRpcNamedParams = {}, options: CallOptions = {}): KeywordArguments =>
  new KeywordArguments(values, options);

/**
 * Sends a fluent call as a notification.
 * @example
 * await rpc.audit.log("login", notification());
 * await rpc.audit.log(notification({ event: "login" }));
 */
const notification = (
  values: JsonRpcNamedParams = {},
  options: Omit<CallOptions, "notification"> = {},
): KeywordArguments => new KeywordArguments(values, { ...options, notification: true });

/**
 * Splits fluent call arguments into positional arguments, keyword arguments and options.
 * @param args The arguments as passed to the handle.
 */
const splitArguments = (
  args: readonly unknown[],
): { positional: readonly unknown[]; keyword: JsonRpcNamedParams; options: CallOptions } => {
  const last = args.at(-1);
  if (last instanceof KeywordArguments) {
    return { positional: args.slice(0, -1), keyword: last.values, options: last.options };
  }

  return { positional: args, keyword: {}, options: {} };
};

export { KeywordArguments, kwargs, notification, splitArguments };
