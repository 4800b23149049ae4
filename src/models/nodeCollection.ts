import { Emitter, Event } from "../utils/emitter";

/**
 * Collection notifications are always resets: observers re-read the whole collection. Replacing
 * the contents produces two of them, one after clearing and one after adding the new range.
 */
export interface CollectionResetEvent {
  readonly action: "reset";
  readonly phase: "clear" | "addRange";
}

/** Read side of a node's filtered children, as handed to callers. */
export interface ReadonlyNodeCollection<T> extends Iterable<T> {
  readonly length: number;
  at(index: number): T | undefined;
  toArray(): T[];
  readonly onDidReset: Event<CollectionResetEvent>;
}

export class NodeCollection<T> implements ReadonlyNodeCollection<T> {
  private items: T[] = [];

  private readonly _onDidReset = new Emitter<CollectionResetEvent>();
  readonly onDidReset: Event<CollectionResetEvent> = this._onDidReset.event;

  get length(): number {
    return this.items.length;
  }

  at(index: number): T | undefined {
    return this.items.at(index);
  }

  toArray(): T[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  /** Does the collection hold exactly these items, in this order? */
  hasSameItems(items: readonly T[]): boolean {
    return (
      items.length === this.items.length && items.every((item, i) => item === this.items[i])
    );
  }

  /** Clear, then add the given range, publishing a reset after each step. */
  replaceAll(items: readonly T[]): void {
    this.items = [];
    this._onDidReset.fire({ action: "reset", phase: "clear" });
    this.items = [...items];
    this._onDidReset.fire({ action: "reset", phase: "addRange" });
  }
}
