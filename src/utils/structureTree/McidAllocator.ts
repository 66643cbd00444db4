/**
 * Session-scoped marked-content id allocator.
 *
 * One instance per tagging session. Ids are unique across every page of the
 * session and strictly increase in allocation order.
 */
export class McidAllocator {
  private nextId = 0;
  private readonly issued: number[] = [];

  next(): number {
    const id = this.nextId++;
    this.issued.push(id);
    return id;
  }

  /** Make sure no future id is <= `mcid` (ids already in a content stream). */
  reserveAbove(mcid: number): void {
    if (mcid >= this.nextId) this.nextId = mcid + 1;
  }

  get assigned(): readonly number[] {
    return this.issued;
  }

  get peek(): number {
    return this.nextId;
  }

  reset(): void {
    this.nextId = 0;
    this.issued.length = 0;
  }
}
