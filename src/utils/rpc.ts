import { UsageError } from "../errors/rpc.js";
import { version } from "../version.js";

/**
 * Credentials sent with every request: HTTP Basic or a Bearer token.
 */
type IAuthCredentials = { username: string; password: string } | { token: string };

/**
 * Checks that the headers are a flat record of string values.
 * @throws {UsageError} If they are not.
 */
const isValidHttpHeaders = (headers: unknown): void => {
  if (headers === null || typeof headers !== "object" || Array.isArray(headers)) {
    throw new UsageError("Invalid headers provided.");
  }

  const isValidObj = Object.entries(headers).every(
    ([key, value]) => typeof key === "string" && typeof value === "string",
  );

  if (!isValidObj) {
    throw new UsageError("Invalid http headers provided.");
  }
};

const requestHeadersWithDefaults = (headers: Record<string, string> = {}) => {
  isValidHttpHeaders(headers);

  const defaultHeaders = {
    "Client-Version": `jsonrpcjs/${version}`,
    "Content-Type": "application/json",
    Accept: "application/json-rpc",
  };

  return { ...defaultHeaders, ...headers };
};

/**
 * Builds the `Authorization` header for the credentials.
 * @param auth The credentials, if any.
 * @returns A record with the header, empty without credentials.
 */
const authorizationHeader = (auth?: IAuthCredentials): Record<string, string> => {
  if (auth === undefined) {
    return {};
  }

  if ("token" in auth) {
    return { Authorization: `Bearer ${auth.token}` };
  }

  const encoded = Buffer.from(`${auth.username}:${auth.password}`, "utf8").toString("base64");
  return { Authorization: `Basic ${encoded}` };
};

export { isValidHttpHeaders, requestHeadersWithDefaults, authorizationHeader };
export type { IAuthCredentials };
