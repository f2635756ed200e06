import { expect, vi } from "vitest";
import { createJsonCodec, defaultJsonCodec } from "../codec/json.js";
import { ParseError, ProtocolError } from "../errors/rpc.js";
import { createRequest } from "./envelope.js";
import { parseResponse } from "./response.js";
import { RPCErrorCode, isServerErrorCode } from "./types.js";

const request = createRequest("foo", [1], 7);

const parse = (body: string) => parseResponse(body, request, defaultJsonCodec);

const failure = (body: string): unknown => {
  try {
    parse(body);
  } catch (error) {
    return error;
  }
  throw new Error("expected the response to be rejected");
};

test("returns the result unchanged", () => {
  expect(parse('{"jsonrpc":"2.0","result":{"a":[1,2]},"id":7}')).toEqual({ a: [1, 2] });
  expect(parse('{"jsonrpc":"2.0","result":"31","id":7}')).toBe("31");
  expect(parse('{"jsonrpc":"2.0","result":null,"id":7}')).toBeNull();
});

test("raises ProtocolError for an error response", () => {
  const error = failure(
    '{"jsonrpc":"2.0","error":{"code":-32601,"message":"Method not found","data":{"hint":"x"}},"id":7}',
  );

  expect(error).toBeInstanceOf(ProtocolError);
  expect(error).toMatchObject({
    name: "ProtocolError",
    code: RPCErrorCode.MethodNotFound,
    message: "Method not found",
    data: { hint: "x" },
    id: 7,
    method: "foo",
  });
});

test("accepts a null id on error responses", () => {
  const error = failure('{"jsonrpc":"2.0","error":{"code":-32700,"message":"Parse error"},"id":null}');

  expect(error).toBeInstanceOf(ProtocolError);
  expect(error).toMatchObject({ code: -32700, id: null });
});

test("raises ParseError for a body that is not JSON", () => {
  const error = failure("not json");

  expect(error).toBeInstanceOf(ParseError);
  expect(error).toMatchObject({ message: "Cannot deserialize response body", body: "not json" });
  expect(error instanceof ParseError && error.cause).toBeInstanceOf(SyntaxError);
});

test("raises ParseError for values that are not response objects", () => {
  expect(() => parse("[1]")).toThrow("Response must be a JSON object");
  expect(() => parse("42")).toThrow("Response must be a JSON object");
});

test("requires exactly one of result and error", () => {
  expect(() =>
    parse('{"jsonrpc":"2.0","result":1,"error":{"code":1,"message":"x"},"id":7}'),
  ).toThrow("Response must not contain both result and error");
  expect(() => parse('{"jsonrpc":"2.0","id":7}')).toThrow(
    "Response must contain either result or error",
  );
});

test("requires the 2.0 version tag", () => {
  expect(() => parse('{"result":1,"id":7}')).toThrow(/^Invalid response envelope: jsonrpc/);
  expect(() => parse('{"jsonrpc":"1.0","result":1,"id":7}')).toThrow(
    /^Invalid response envelope: jsonrpc/,
  );
});

test("requires an id", () => {
  expect(() => parse('{"jsonrpc":"2.0","result":1}')).toThrow(/^Invalid response envelope: id/);
});

test("requires the id of the request", () => {
  expect(() => parse('{"jsonrpc":"2.0","result":1,"id":8}')).toThrow(
    "Response id 8 does not match request id 7",
  );
  expect(() =>
    parse('{"jsonrpc":"2.0","error":{"code":-32000,"message":"busy"},"id":"7"}'),
  ).toThrow('Response id "7" does not match request id 7');
});

test("raises ParseError for a malformed error object", () => {
  const error = failure('{"jsonrpc":"2.0","error":{"code":"oops"},"id":7}');

  expect(error).toBeInstanceOf(ParseError);
  expect(error instanceof ParseError && error.message).toMatch(/^Invalid error object: code/);
});

test("decodes with the configured codec", () => {
  const decode = vi.fn((text: string): unknown => JSON.parse(text));
  const codec = createJsonCodec({ decode });

  expect(parseResponse('{"jsonrpc":"2.0","result":19,"id":7}', request, codec)).toBe(19);
  expect(decode).toHaveBeenCalledTimes(1);
  expect(decode).toHaveBeenCalledWith('{"jsonrpc":"2.0","result":19,"id":7}');
});

test("recognises the server-defined error range", () => {
  expect(isServerErrorCode(-32000)).toBe(true);
  expect(isServerErrorCode(-32099)).toBe(true);
  expect(isServerErrorCode(-32100)).toBe(false);
  expect(isServerErrorCode(RPCErrorCode.InternalError)).toBe(false);
});
