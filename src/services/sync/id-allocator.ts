/**
 * Hands out PubIDs above the highest one already in Cristin.
 */
export class IdAllocator {
  private current: number;

  constructor(currentMax: number) {
    if (!Number.isSafeInteger(currentMax) || currentMax < 0) {
      throw new RangeError(
        `Current max PubID must be a non-negative integer, got ${String(currentMax)}`
      );
    }
    this.current = currentMax;
  }

  /** Highest id handed out so far (the seed before the first allocation) */
  get last(): number {
    return this.current;
  }

  allocate(): number {
    this.current += 1;
    return this.current;
  }
}
