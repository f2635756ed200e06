import { pino } from "pino";
import { expect } from "vitest";
import { MockTransport, createRPCClient } from "../src/index.js";

const ENDPOINT = "https://rpc.example.com";

const capture = () => {
  const lines: string[] = [];
  const logger = pino({ level: "debug" }, { write: (line: string) => lines.push(line) });
  const entries = () => lines.map((line): Record<string, unknown> => JSON.parse(line));
  return { logger, entries };
};

test("logs each call with its method and id", async () => {
  const { logger, entries } = capture();
  const rpc = createRPCClient(ENDPOINT, {
    transport: MockTransport.fromMethods({ ping: () => "pong" }),
    logger,
  });

  await rpc.ping();

  const sent = entries().find((entry) => entry.msg === "sending request");
  expect(sent).toMatchObject({
    level: 20,
    module: "RPCClient",
    endpoint: ENDPOINT,
    method: "ping",
    id: 1,
  });
  expect(entries().find((entry) => entry.msg === "received result")).toMatchObject({
    method: "ping",
    id: 1,
  });
});

test("logs failed calls", async () => {
  const { logger, entries } = capture();
  const rpc = createRPCClient(ENDPOINT, {
    transport: MockTransport.fromMethods({}),
    logger,
  });

  await expect(rpc.nope()).rejects.toThrow("Method not found");

  expect(entries().find((entry) => entry.msg === "call failed")).toMatchObject({
    method: "nope",
    id: 1,
    err: { type: "ProtocolError", message: "Method not found" },
  });
});

test("writes nothing below the configured level", async () => {
  const lines: string[] = [];
  const logger = pino({ level: "info" }, { write: (line: string) => lines.push(line) });
  const rpc = createRPCClient(ENDPOINT, {
    transport: MockTransport.fromMethods({ ping: () => "pong" }),
    logger,
  });

  await rpc.ping();

  expect(lines).toEqual([]);
});
