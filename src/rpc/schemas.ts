import { z } from "zod";

/**
 * Decoders that keep numeric precision may hand integers over as `bigint`.
 * Ids and codes are small, so they are read back as numbers.
 */
const IntegerSchema = z.union([
  z.number().int(),
  z.bigint().transform((value) => Number(value)),
]);

const JsonRpcIdSchema = z.union([
  z.number(),
  z.bigint().transform((value) => Number(value)),
  z.string(),
  z.null(),
]);

const JsonRpcErrorObjectSchema = z.object({
  code: IntegerSchema,
  message: z.string(),
  data: z.unknown().optional(),
});

/**
 * The members shared by success and error responses. Whether `result` or `error` is
 * present is checked separately, since `z.unknown()` cannot tell a missing key from `undefined`.
 */
const JsonRpcResponseEnvelopeSchema = z
  .object({
    jsonrpc: z.literal("2.0"),
    id: JsonRpcIdSchema,
  })
  .passthrough();

export { JsonRpcIdSchema, JsonRpcErrorObjectSchema, JsonRpcResponseEnvelopeSchema };
