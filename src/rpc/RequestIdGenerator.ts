/**
 * A monotonic source of request ids, scoped to one client.
 * Ids start at 1 and are never reused.
 */
class RequestIdGenerator {
  private current = 0;

  /**
   * Returns the next id. Increment and read happen in one step, so concurrent calls
   * never observe the same value.
   */
  public next(): number {
    this.current += 1;
    return this.current;
  }
}

export { RequestIdGenerator };
