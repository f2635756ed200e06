import { type ClientHandle, createMethodProxy } from "./methodProxy.js";
import { RPCClient } from "./RPCClient.js";
import type { IRPCClientConfig } from "./types/Configs.js";

/**
 * The options for the RPC client.
 */
type RPCClientOptions = Omit<IRPCClientConfig, "endpoint">;

/**
 * Creates a new RPC client and returns its fluent handle.
 * The client uses an HTTP transport unless one is supplied in the options.
 * @example
 * const rpc = createRPCClient(RPC_ENDPOINT);
 * const users = await rpc.app.users.getUsers();
 * await rpc.close();
 */
const createRPCClient = (endpoint: string, options: RPCClientOptions = {}): ClientHandle =>
  createMethodProxy(new RPCClient({ ...options, endpoint }));

/**
 * Runs `fn` with a client and closes it afterwards, whether `fn` resolves or throws.
 * @param config The client configuration.
 * @param fn Receives the fluent handle and the client.
 * @returns What `fn` resolves with.
 * @example
 * const total = await withRPCClient({ endpoint: RPC_ENDPOINT }, (rpc) => rpc.cart.total());
 */
const withRPCClient = async <T>(
  config: IRPCClientConfig,
  fn: (rpc: ClientHandle, client: RPCClient) => Promise<T>,
): Promise<T> => {
  const client = new RPCClient(config);
  try {
    return await fn(createMethodProxy(client), client);
  } finally {
    await client.close();
  }
};

export { createRPCClient, withRPCClient };
export type { RPCClientOptions };
