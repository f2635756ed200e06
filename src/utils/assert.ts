import { UsageError } from "../errors/rpc.js";

const LEADING_DIGIT_REGEX = /^[0-9]/;

/**
 * Checks that the method name is a non-empty dotted name whose segments are non-empty
 * and do not start with a digit.
 * @param method The method name.
 * @throws {UsageError} If the name is malformed.
 */
const assertIsValidMethodName = (method: string): void => {
  if (typeof method !== "string" || method.length === 0) {
    throw new UsageError("Method name must be a non-empty string");
  }

  for (const segment of method.split(".")) {
    if (segment.length === 0) {
      throw new UsageError(`Invalid method name '${method}': empty segment`);
    }
    if (LEADING_DIGIT_REGEX.test(segment)) {
      throw new UsageError(`Invalid method name '${method}': segment '${segment}' starts with a digit`);
    }
  }
};

/**
 * Checks a single name appended through property access.
 * Names starting with `_` are private and never resolve to remote methods.
 * @param segment The appended name.
 * @throws {UsageError} If the name cannot be a segment.
 */
const assertIsValidMethodSegment = (segment: string): void => {
  if (segment.length === 0) {
    throw new UsageError("Method name segment must not be empty");
  }
  if (segment.includes(".")) {
    throw new UsageError(`Invalid attribute '${segment}': segments must not contain '.'`);
  }
  if (segment.startsWith("_")) {
    throw new UsageError(`Invalid attribute '${segment}'`);
  }
  if (LEADING_DIGIT_REGEX.test(segment)) {
    throw new UsageError(`Invalid attribute '${segment}': segments must not start with a digit`);
  }
};

export { assertIsValidMethodName, assertIsValidMethodSegment };
