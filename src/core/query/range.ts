/**
 * A closed (`min..max`) or half-open (`min...max`) interval used as a
 * condition operand.
 */
export class Range<T = unknown> {
  constructor(
    readonly min: T,
    readonly max: T,
    readonly excludeEnd = false,
  ) {}

  static inclusive<T>(min: T, max: T): Range<T> {
    return new Range(min, max, false);
  }

  static exclusive<T>(min: T, max: T): Range<T> {
    return new Range(min, max, true);
  }

  toString(): string {
    return `${String(this.min)}${this.excludeEnd ? '...' : '..'}${String(this.max)}`;
  }
}
