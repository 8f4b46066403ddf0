/**
 * @graphdex/support — TimeSet
 *
 * An immutable set of instants represented as a list of disjoint, sorted,
 * non-adjacent inclusive ranges at millisecond granularity. Either end of a
 * range may be unbounded (`null`).
 *
 * Because ranges are always normalized, two sets containing the same
 * instants have identical range lists and `equals` is a structural check.
 */

import { InvalidValueError } from './errors.js';

/** Inclusive range of epoch milliseconds; `null` means unbounded. */
interface MillisRange {
  readonly start: number | null;
  readonly end: number | null;
}

/** Bounds accepted by {@link TimeSet.ofRange}. */
export interface TimeRangeBounds {
  gt?: Date | null;
  gte?: Date | null;
  lt?: Date | null;
  lte?: Date | null;
}

export interface TimeSetRange {
  /** Inclusive lower bound, or null when unbounded */
  readonly gte: Date | null;
  /** Inclusive upper bound, or null when unbounded */
  readonly lte: Date | null;
}

export class TimeSet {
  static readonly ALL = new TimeSet([{ start: null, end: null }]);
  static readonly EMPTY = new TimeSet([]);

  private constructor(private readonly millisRanges: readonly MillisRange[]) {}

  /**
   * Build a set from a single range.
   *
   * `gt t` is treated as `gte t + 1ms` and `lt t` as `lte t - 1ms`.
   *
   * @throws InvalidValueError when both lower or both upper bounds are given
   */
  static ofRange(bounds: TimeRangeBounds): TimeSet {
    const { gt, gte, lt, lte } = bounds;
    if (gt && gte) {
      throw new InvalidValueError('A time range cannot specify both `gt` and `gte`.');
    }
    if (lt && lte) {
      throw new InvalidValueError('A time range cannot specify both `lt` and `lte`.');
    }

    const start = gte ? gte.getTime() : gt ? gt.getTime() + 1 : null;
    const end = lte ? lte.getTime() : lt ? lt.getTime() - 1 : null;
    return TimeSet.fromMillisRanges([{ start, end }]);
  }

  /** A set containing exactly the given instants. */
  static ofTimes(times: Iterable<Date>): TimeSet {
    return TimeSet.fromMillisRanges(
      Array.from(times, (time) => ({ start: time.getTime(), end: time.getTime() })),
    );
  }

  private static fromMillisRanges(ranges: readonly MillisRange[]): TimeSet {
    const sorted = ranges
      .filter((range) => range.start === null || range.end === null || range.start <= range.end)
      .sort((a, b) => compareStarts(a.start, b.start));

    const merged: MillisRange[] = [];
    for (const range of sorted) {
      const last = merged[merged.length - 1];
      if (last && (last.end === null || (range.start !== null && range.start <= last.end + 1))) {
        merged[merged.length - 1] = { start: last.start, end: maxEnd(last.end, range.end) };
      } else {
        merged.push(range);
      }
    }

    return new TimeSet(merged);
  }

  get ranges(): TimeSetRange[] {
    return this.millisRanges.map((range) => ({
      gte: range.start === null ? null : new Date(range.start),
      lte: range.end === null ? null : new Date(range.end),
    }));
  }

  has(time: Date): boolean {
    const millis = time.getTime();
    return this.millisRanges.some(
      (range) => (range.start === null || range.start <= millis) && (range.end === null || millis <= range.end),
    );
  }

  isEmpty(): boolean {
    return this.millisRanges.length === 0;
  }

  intersects(other: TimeSet): boolean {
    return !this.intersection(other).isEmpty();
  }

  intersection(other: TimeSet): TimeSet {
    const ranges: MillisRange[] = [];
    for (const a of this.millisRanges) {
      for (const b of other.millisRanges) {
        ranges.push({ start: maxStart(a.start, b.start), end: minEnd(a.end, b.end) });
      }
    }
    return TimeSet.fromMillisRanges(ranges);
  }

  union(other: TimeSet): TimeSet {
    return TimeSet.fromMillisRanges([...this.millisRanges, ...other.millisRanges]);
  }

  difference(other: TimeSet): TimeSet {
    return this.intersection(other.negate());
  }

  negate(): TimeSet {
    const gaps: MillisRange[] = [];
    let lower: number | null = null;

    for (const range of this.millisRanges) {
      if (range.start !== null) gaps.push({ start: lower, end: range.start - 1 });
      if (range.end === null) return new TimeSet(gaps);
      lower = range.end + 1;
    }

    gaps.push({ start: lower, end: null });
    return new TimeSet(gaps);
  }

  equals(other: TimeSet): boolean {
    return (
      this.millisRanges.length === other.millisRanges.length &&
      this.millisRanges.every(
        (range, i) => range.start === other.millisRanges[i]?.start && range.end === other.millisRanges[i]?.end,
      )
    );
  }

  toString(): string {
    if (this.isEmpty()) return 'TimeSet{}';
    const parts = this.ranges.map(
      (range) => `[${range.gte?.toISOString() ?? '-∞'}, ${range.lte?.toISOString() ?? '∞'}]`,
    );
    return `TimeSet{${parts.join(', ')}}`;
  }
}

function compareStarts(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a - b;
}

function maxStart(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.max(a, b);
}

function minEnd(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.min(a, b);
}

function maxEnd(a: number | null, b: number | null): number | null {
  if (a === null || b === null) return null;
  return Math.max(a, b);
}
