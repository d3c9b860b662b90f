/**
 * Killer-move table.
 *
 * Remembers the move masks that most recently caused a beta cut-off so
 * sibling lists elsewhere in the tree can try them first. Bounded FIFO:
 * pushing past capacity drops the oldest mask. Entries only bias move
 * ordering; a stale killer never changes a search value.
 */
export class KillerTable {
  private readonly masks: number[] = [];
  readonly capacity: number;

  constructor(capacity: number = 4) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Killer capacity must be a non-negative integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  push(mask: number): void {
    if (this.capacity === 0) return;
    this.masks.push(mask);
    if (this.masks.length > this.capacity) {
      this.masks.shift();
    }
  }

  has(mask: number): boolean {
    return this.masks.includes(mask);
  }

  /**
   * Stable partition: killers first, everything else in list order.
   */
  reorder<T>(items: readonly T[], maskOf: (item: T) => number): T[] {
    if (this.masks.length === 0) return [...items];
    const killers: T[] = [];
    const rest: T[] = [];
    for (const item of items) {
      (this.has(maskOf(item)) ? killers : rest).push(item);
    }
    return [...killers, ...rest];
  }

  entries(): readonly number[] {
    return [...this.masks];
  }

  get size(): number {
    return this.masks.length;
  }

  clear(): void {
    this.masks.length = 0;
  }
}
