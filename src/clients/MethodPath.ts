import { UsageError } from "../errors/rpc.js";
import type { JsonRpcNamedParams } from "../rpc/types.js";
import { assertIsValidMethodSegment } from "../utils/assert.js";
import { splitArguments } from "./KeywordArguments.js";
import type { CallOptions } from "./types/RPC.js";

/**
 * Sends a call once a path is invoked.
 */
type Dispatch = (
  method: string,
  args: readonly unknown[],
  kwargs: JsonRpcNamedParams,
  options: CallOptions,
) => Promise<unknown>;

/**
 * An immutable dotted method name under construction.
 * Each {@link MethodPath.descend} links a new node to its parent, so paths share their
 * prefixes and appending is constant time.
 */
class MethodPath {
  private constructor(
    private readonly dispatch: Dispatch,
    private readonly parent?: MethodPath,
    private readonly segment?: string,
  ) {}

  /**
   * Creates the empty path every name is built from.
   * @param dispatch Sends the call when a path is invoked.
   */
  static root(dispatch: Dispatch): MethodPath {
    return new MethodPath(dispatch);
  }

  get isRoot(): boolean {
    return this.segment === undefined;
  }

  /**
   * The segments in access order.
   */
  get segments(): string[] {
    const segments: string[] = [];
    let node: MethodPath | undefined = this;
    while (node !== undefined && node.segment !== undefined) {
      segments.unshift(node.segment);
      node = node.parent;
    }
    return segments;
  }

  /**
   * The dotted method name, e.g. `app.users.getUsers`.
   */
  get name(): string {
    return this.segments.join(".");
  }

  /**
   * Returns a new path with `segment` appended. This path is left unchanged.
   * @throws {UsageError} If the segment is empty, dotted, private or starts with a digit.
   */
  descend(segment: string): MethodPath {
    assertIsValidMethodSegment(segment);
    return new MethodPath(this.dispatch, this, segment);
  }

  /**
   * Calls the method this path names. A trailing {@link KeywordArguments} supplies keyword
   * arguments and call options.
   */
  call(...args: unknown[]): Promise<unknown> {
    if (this.isRoot) {
      return Promise.reject(new UsageError("Cannot call the client itself, access a method first"));
    }

    const { positional, keyword, options } = splitArguments(args);
    return this.dispatch(this.name, positional, keyword, options);
  }
}

export { MethodPath };
export type { Dispatch };
