import type { ITransport } from "../transport/types/ITransport.js";
import { MethodPath } from "./MethodPath.js";
import type { RPCClient } from "./RPCClient.js";

/**
 * A remote method reached through property access. Calling it sends the call, accessing
 * a property descends to a nested method.
 */
interface RemoteMethod {
  (...args: unknown[]): Promise<unknown>;
  readonly [name: string]: RemoteMethod;
}

/**
 * The client facilities the root handle exposes instead of remote methods.
 */
type ClientFacilities = {
  readonly transport: ITransport;
  close(): Promise<void>;
  call: RPCClient["call"];
  batch: RPCClient["batch"];
};

/**
 * The root of the fluent API: `rpc.app.users.getUsers(1)` calls `app.users.getUsers`.
 *
 * The names in {@link RESERVED_ROOT_NAMES} resolve to client facilities, so remote methods
 * with those top-level names are only reachable through `rpc.call("close", ...)`.
 * `then` is reserved at every level so that handles are never mistaken for promises, and
 * `toString`, `valueOf` and `toJSON` return the dotted name instead of calling the server.
 */
type ClientHandle = ClientFacilities & { readonly [name: string]: RemoteMethod };

const RESERVED_ROOT_NAMES = ["transport", "close", "call", "batch"] as const;

type ReservedRootName = (typeof RESERVED_ROOT_NAMES)[number];

const CONVERSION_NAMES = ["toString", "valueOf", "toJSON"] as const;

const isConversionName = (name: string): boolean =>
  CONVERSION_NAMES.some((conversion) => conversion === name);

const isReservedRootName = (name: string): name is ReservedRootName =>
  RESERVED_ROOT_NAMES.some((reserved) => reserved === name);

const facility = (client: RPCClient, name: ReservedRootName): unknown => {
  switch (name) {
    case "transport":
      return client.transport;
    case "close":
      return () => client.close();
    case "call":
      return client.call.bind(client);
    case "batch":
      return client.batch.bind(client);
  }
};

/**
 * Builds the proxy around a path. Property reads go through the reserved-name check
 * before {@link MethodPath.descend}, invocation goes to {@link MethodPath.call}.
 */
const proxyFor = (client: RPCClient, path: MethodPath): unknown => {
  const target = () => undefined;

  return new Proxy(target, {
    get: (_target, key) => {
      if (typeof key === "symbol" || key === "then") {
        return undefined;
      }
      if (isConversionName(key)) {
        return () => path.name;
      }
      if (path.isRoot && isReservedRootName(key)) {
        return facility(client, key);
      }

      return proxyFor(client, path.descend(key));
    },
    has: (_target, key) => typeof key === "string" && key !== "then",
    apply: (_target, _thisArg, args: unknown[]) => path.call(...args),
  });
};

/**
 * Proxies report every string key but `then`, and only the root carries the facilities.
 */
const isClientHandle = (value: unknown): value is ClientHandle =>
  typeof value === "function" && RESERVED_ROOT_NAMES.every((name) => name in value);

/**
 * Creates the fluent root handle of a client.
 * @param client The client that sends the calls.
 * @example
 * const rpc = createMethodProxy(client);
 * await rpc.app.users.getUsers({ active: true });
 */
const createMethodProxy = (client: RPCClient): ClientHandle => {
  const root = MethodPath.root((method, args, kwargs, options) =>
    client.call(method, args, kwargs, options),
  );
  const handle = proxyFor(client, root);

  if (!isClientHandle(handle)) {
    throw new TypeError("Method proxy does not expose the client facilities");
  }

  return handle;
};

export { createMethodProxy, RESERVED_ROOT_NAMES };
export type { RemoteMethod, ClientHandle, ClientFacilities };
