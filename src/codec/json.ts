/**
 * Turns messages into text and replies back into values.
 */
type IJsonCodec = {
  encode: (value: unknown) => string;
  /**
   * Parses a response body. Replace it to control number handling, e.g. to keep
   * integers beyond `Number.MAX_SAFE_INTEGER` as strings.
   */
  decode: (text: string) => unknown;
};

const defaultJsonCodec: IJsonCodec = {
  encode: (value) => JSON.stringify(value),
  decode: (text) => JSON.parse(text),
};

/**
 * Builds a codec from the defaults and the given overrides.
 * @param overrides The functions to replace.
 */
const createJsonCodec = ({ encode, decode }: Partial<IJsonCodec> = {}): IJsonCodec => ({
  encode: encode ?? defaultJsonCodec.encode,
  decode: decode ?? defaultJsonCodec.decode,
});

export { defaultJsonCodec, createJsonCodec };
export type { IJsonCodec };
