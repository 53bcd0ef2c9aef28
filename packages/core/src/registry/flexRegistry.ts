/**
 * packages/core/src/registry/flexRegistry.ts — Ordered item registry.
 *
 * Why: Each record pairs a layout item with its consumer list, so the two can
 * never fall out of step. All lookups by content are identity (`===`) linear
 * scans; container child counts are small.
 *
 * The registry stores what it is given. Argument validation happens in the
 * container before values reach it.
 */

import type { FlexEntry, LayoutProbe } from "../layout/types.js";

export class FlexRegistry<C extends LayoutProbe> {
  private records: FlexEntry<C>[] = [];

  get size(): number {
    return this.records.length;
  }

  at(index: number): FlexEntry<C> | undefined {
    return this.records[index];
  }

  /** Index of the first record holding `content`, or -1. */
  indexOf(content: C | null): number {
    for (let i = 0; i < this.records.length; i++) {
      if (this.records[i]?.content === content) return i;
    }
    return -1;
  }

  entries(): readonly FlexEntry<C>[] {
    return this.records;
  }

  /** Frozen copy for one layout pass; later mutations do not affect it. */
  snapshot(): readonly FlexEntry<C>[] {
    return Object.freeze(this.records.slice());
  }

  add(content: C | null, fixedSize: number, proportion: number, focus: boolean): number {
    this.records.push(
      Object.freeze({ content, fixedSize, proportion, focus, consumers: Object.freeze([]) }),
    );
    return this.records.length - 1;
  }

  /** Remove every record holding `content`, keeping the order of the rest. Returns the count removed. */
  remove(content: C | null): number {
    const before = this.records.length;
    this.records = this.records.filter((r) => r.content !== content);
    return before - this.records.length;
  }

  clear(): void {
    this.records = [];
  }

  /** Update sizes of every record holding `content`. Returns the count updated. */
  resize(content: C | null, fixedSize: number, proportion: number): number {
    return this.update(content, (r) => ({ ...r, fixedSize, proportion }));
  }

  /** Replace the consumer list of every record holding `content`. Returns the count updated. */
  setConsumers(content: C | null, consumers: readonly number[]): number {
    const frozen = Object.freeze(consumers.slice());
    return this.update(content, (r) => ({ ...r, consumers: frozen }));
  }

  /** Replace the consumer list of the record at `index`. */
  setConsumersAt(index: number, consumers: readonly number[]): boolean {
    const r = this.records[index];
    if (r === undefined) return false;
    this.records[index] = Object.freeze({ ...r, consumers: Object.freeze(consumers.slice()) });
    return true;
  }

  private update(content: C | null, fn: (r: FlexEntry<C>) => FlexEntry<C>): number {
    let n = 0;
    for (let i = 0; i < this.records.length; i++) {
      const r = this.records[i];
      if (r === undefined || r.content !== content) continue;
      this.records[i] = Object.freeze(fn(r));
      n++;
    }
    return n;
  }
}
