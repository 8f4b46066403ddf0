/**
 * @graphdex/datastore-core — A concrete index derived from a rollover template
 */

import type { TimeSet } from '@graphdex/support';
import type { Index } from './index.js';

export class RolloverIndex {
  constructor(
    /** The concrete index */
    readonly index: Index,
    /** Timestamps whose records live in this index */
    readonly timeSet: TimeSet,
  ) {}

  get name(): string {
    return this.index.name;
  }

  equals(other: RolloverIndex): boolean {
    return this.index.name === other.index.name && this.timeSet.equals(other.timeSet);
  }

  toString(): string {
    return `#<RolloverIndex ${this.name} ${this.timeSet}>`;
  }
}
