/**
 * The parameters of {@link BaseError}.
 */
type IBaseErrorParameters = {
  /**
   * The name of the remote method the error relates to, if any.
   */
  method?: string;
  /**
   * The underlying error.
   */
  cause?: unknown;
};

/**
 * BaseError is the base class for every error raised by the library.
 * @class BaseError
 * @extends {Error}
 */
class BaseError extends Error {
  /**
   * The name of the remote method the error relates to.
   */
  public readonly method?: string;

  constructor(message: string, { method, cause }: IBaseErrorParameters = {}) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.method = method;
  }
}

export { BaseError };
export type { IBaseErrorParameters };
