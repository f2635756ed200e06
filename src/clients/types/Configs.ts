import { z } from "zod";
import type { IJsonCodec } from "../../codec/json.js";
import type { Logger } from "../../logger.js";
import type { IFetchOptions } from "../../transport/types/ISendOptions.js";
import type { ITransport } from "../../transport/types/ITransport.js";
import type { IAuthCredentials } from "../../utils/rpc.js";

/**
 * The configuration of {@link RPCClient}.
 */
type IRPCClientConfig = {
  /**
   * The URL of the JSON-RPC server.
   * @example 'https://rpc.example.com'
   */
  endpoint: string;
  /**
   * A transport managed by the caller. The client borrows it and never closes it.
   * Without one, the client creates an {@link HttpTransport} on first use and closes it on close.
   */
  transport?: ITransport;
  /**
   * The timeout of the created HTTP transport.
   * @default 20000
   */
  timeout?: number;
  /**
   * The fetch function of the created HTTP transport.
   */
  fetcher?: typeof fetch;
  /**
   * Headers sent with every call, over the transport defaults.
   */
  headers?: Record<string, string>;
  /**
   * Credentials sent with every call.
   */
  auth?: IAuthCredentials;
  /**
   * Options passed verbatim to `fetch` on every call.
   */
  fetchOptions?: IFetchOptions;
  /**
   * Replaces `JSON.parse` for response bodies.
   */
  decode?: IJsonCodec["decode"];
  /**
   * The logger the client and its transport write to.
   */
  logger?: Logger;
};

const AuthCredentialsSchema = z.union([
  z.object({ username: z.string(), password: z.string() }).strict(),
  z.object({ token: z.string().min(1) }).strict(),
]);

/**
 * Validates the data members of {@link IRPCClientConfig}.
 */
const ClientConfigSchema = z.object({
  endpoint: z.string().url(),
  timeout: z.number().int().positive().optional(),
  headers: z.record(z.string()).optional(),
  auth: AuthCredentialsSchema.optional(),
});

export { ClientConfigSchema };
export type { IRPCClientConfig };
