import { type Logger, pino } from "pino";
import { PinoPretty } from "pino-pretty";

const prettyTransport = PinoPretty({
  colorize: true,
  translateTime: true,
});

/**
 * The shared library logger. Silent unless `JSONRPCJS_LOG_LEVEL` is set,
 * e.g. `JSONRPCJS_LOG_LEVEL=debug`.
 */
const logger: Logger = pino(
  {
    name: "jsonrpcjs",
    level: process.env.JSONRPCJS_LOG_LEVEL ?? "silent",
  },
  prettyTransport,
);

export { logger };
export type { Logger };
