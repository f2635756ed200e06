import type { ZodError } from "zod";
import type { IJsonCodec } from "../codec/json.js";
import { ParseError, ProtocolError } from "../errors/rpc.js";
import { JsonRpcErrorObjectSchema, JsonRpcResponseEnvelopeSchema } from "./schemas.js";
import type { JsonRpcRequest, JsonRpcResponse } from "./types.js";

const formatIssues = (error: ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");

/**
 * Decodes a response body with the codec.
 * @throws {ParseError} If the codec rejects the body.
 */
const decodeBody = (body: string, codec: IJsonCodec, method?: string): unknown => {
  try {
    return codec.decode(body);
  } catch (error) {
    throw new ParseError("Cannot deserialize response body", { method, cause: error, body });
  }
};

/**
 * Validates a decoded value against the JSON-RPC 2.0 response grammar.
 * @param payload The decoded value.
 * @param method The method the response answers, used in error messages.
 * @param body The raw body, kept on the error.
 * @throws {ParseError} If the value is not a response.
 */
const validateResponse = (payload: unknown, method?: string, body?: string): JsonRpcResponse => {
  if (payload === null || typeof payload !== "object" || Array.isArray(payload)) {
    throw new ParseError("Response must be a JSON object", { method, body });
  }

  const hasResult = Object.hasOwn(payload, "result");
  const hasError = Object.hasOwn(payload, "error");

  if (hasResult && hasError) {
    throw new ParseError("Response must not contain both result and error", { method, body });
  }
  if (!hasResult && !hasError) {
    throw new ParseError("Response must contain either result or error", { method, body });
  }

  const envelope = JsonRpcResponseEnvelopeSchema.safeParse(payload);
  if (!envelope.success) {
    throw new ParseError(`Invalid response envelope: ${formatIssues(envelope.error)}`, {
      method,
      body,
      cause: envelope.error,
    });
  }

  const { id } = envelope.data;

  if (hasError) {
    const error = JsonRpcErrorObjectSchema.safeParse(envelope.data.error);
    if (!error.success) {
      throw new ParseError(`Invalid error object: ${formatIssues(error.error)}`, {
        method,
        body,
        cause: error.error,
      });
    }

    return { jsonrpc: "2.0", id, error: error.data };
  }

  return { jsonrpc: "2.0", id, result: envelope.data.result };
};

/**
 * Turns a validated response to `request` into its result.
 * An error response may carry a `null` id, a success response must echo the request id.
 *
 * @throws {ProtocolError} For an error response.
 * @throws {ParseError} If the response id does not belong to the request.
 */
const readResult = (response: JsonRpcResponse, request: JsonRpcRequest, body?: string): unknown => {
  const { method } = request;

  if ("error" in response) {
    if (response.id !== null && response.id !== request.id) {
      throw new ParseError(
        `Response id ${JSON.stringify(response.id)} does not match request id ${request.id}`,
        { method, body },
      );
    }

    const { code, message, data } = response.error;
    throw new ProtocolError(message, { method, code, data, id: response.id });
  }

  if (response.id !== request.id) {
    throw new ParseError(
      `Response id ${JSON.stringify(response.id)} does not match request id ${request.id}`,
      { method, body },
    );
  }

  return response.result;
};

/**
 * Decodes and validates the reply to a single request and returns its result unchanged.
 * @param body The raw response body.
 * @param request The request the body answers.
 * @param codec The codec used to decode the body.
 */
const parseResponse = (body: string, request: JsonRpcRequest, codec: IJsonCodec): unknown => {
  const payload = decodeBody(body, codec, request.method);
  const response = validateResponse(payload, request.method, body);
  return readResult(response, request, body);
};

export { decodeBody, validateResponse, readResult, parseResponse };
