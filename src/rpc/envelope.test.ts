import { expect } from "vitest";
import { UsageError } from "../errors/rpc.js";
import { RequestIdGenerator } from "./RequestIdGenerator.js";
import { buildParams, createMessage, isPlainObject } from "./envelope.js";

describe("buildParams", () => {
  test("omits params when there are no arguments", () => {
    expect(buildParams("foo")).toBeUndefined();
    expect(buildParams("foo", [], {})).toBeUndefined();
  });

  test("keeps positional arguments in order", () => {
    expect(buildParams("foo", [3, "a", null])).toEqual([3, "a", null]);
  });

  test("sends a sole plain object by-name as a copy", () => {
    const named = { foo: "bar" };
    const params = buildParams("foo", [named]);

    expect(params).toEqual({ foo: "bar" });
    expect(params).not.toBe(named);
  });

  test("keeps the array form when an object is not the only argument", () => {
    expect(buildParams("foo", [{ a: 1 }, 2])).toEqual([{ a: 1 }, 2]);
  });

  test("keeps a sole array or class instance positional", () => {
    expect(buildParams("foo", [[1, 2]])).toEqual([[1, 2]]);
    expect(buildParams("foo", [new Date(0)])).toEqual([new Date(0)]);
  });

  test("sends keyword arguments by-name", () => {
    expect(buildParams("foo", [], { bar: 1, baz: 2 })).toEqual({ bar: 1, baz: 2 });
  });

  test("rejects positional and keyword arguments together", () => {
    expect(() => buildParams("foo", [1], { a: 1 })).toThrow(UsageError);
    expect(() => buildParams("foo", [1], { a: 1 })).toThrow(
      "JSON-RPC forbids mixing positional and keyword arguments",
    );
  });
});

test("isPlainObject accepts only object literals and null-prototype objects", () => {
  const bare: Record<string, number> = Object.create(null);
  bare.x = 1;

  expect(isPlainObject({ a: 1 })).toBe(true);
  expect(isPlainObject(bare)).toBe(true);
  expect(isPlainObject([])).toBe(false);
  expect(isPlainObject(null)).toBe(false);
  expect(isPlainObject(new Map())).toBe(false);
});

describe("createMessage", () => {
  test("numbers requests from 1 and serializes them in wire order", () => {
    const ids = new RequestIdGenerator();

    expect(JSON.stringify(createMessage({ method: "foo", args: [1, 2] }, ids))).toBe(
      '{"jsonrpc":"2.0","method":"foo","params":[1,2],"id":1}',
    );
    expect(JSON.stringify(createMessage({ method: "foo", kwargs: { bar: 1, baz: 2 } }, ids))).toBe(
      '{"jsonrpc":"2.0","method":"foo","params":{"bar":1,"baz":2},"id":2}',
    );
  });

  test("builds notifications without an id and without consuming one", () => {
    const ids = new RequestIdGenerator();
    const message = createMessage(
      { method: "foo.bar", kwargs: { baz: 1 }, notification: true },
      ids,
    );

    expect(JSON.stringify(message)).toBe('{"jsonrpc":"2.0","method":"foo.bar","params":{"baz":1}}');
    expect("id" in message).toBe(false);
    expect(ids.next()).toBe(1);
  });

  test("leaves the params key out of calls without arguments", () => {
    const message = createMessage({ method: "ping" }, new RequestIdGenerator());

    expect(Object.keys(message)).toEqual(["jsonrpc", "method", "id"]);
  });

  test("the same call twice differs only by id", () => {
    const ids = new RequestIdGenerator();
    const { id: first, ...firstRest } = createMessage({ method: "foo", args: [1] }, ids);
    const { id: second, ...secondRest } = createMessage({ method: "foo", args: [1] }, ids);

    expect(firstRest).toEqual(secondRest);
    expect(first).not.toBe(second);
  });

  test("survives a JSON round trip", () => {
    const ids = new RequestIdGenerator();
    const withParams = createMessage({ method: "foo", args: [{ a: [1, "b"] }, null] }, ids);
    const withoutParams = createMessage({ method: "bar" }, ids);

    expect(JSON.parse(JSON.stringify(withParams))).toEqual(withParams);
    expect(JSON.parse(JSON.stringify(withoutParams))).toStrictEqual(withoutParams);
  });

  test("rejects malformed calls before taking an id", () => {
    const ids = new RequestIdGenerator();

    expect(() => createMessage({ method: "" }, ids)).toThrow(UsageError);
    expect(() => createMessage({ method: "a..b" }, ids)).toThrow(UsageError);
    expect(() => createMessage({ method: "1abc" }, ids)).toThrow(UsageError);
    expect(() => createMessage({ method: "foo", args: [1], kwargs: { a: 1 } }, ids)).toThrow(
      UsageError,
    );
    expect(ids.next()).toBe(1);
  });
});
