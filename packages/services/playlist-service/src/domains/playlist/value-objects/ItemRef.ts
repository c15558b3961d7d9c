/**
 * Opaque handle to one stored item. A ref stays valid while its item is in
 * the store, whatever renumbering happens around it; resolving a ref whose
 * item has been removed yields null.
 */
export class ItemRef {
  private static nextKey = 1;

  private constructor(readonly key: number) {}

  static issue(): ItemRef {
    return new ItemRef(ItemRef.nextKey++);
  }

  toString(): string {
    return `item#${this.key}`;
  }
}
