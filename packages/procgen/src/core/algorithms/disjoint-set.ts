/**
 * Disjoint-set (union-find) forest over room identifiers.
 *
 * Uses path compression and union by size, and keeps a live count of
 * components so callers can tell when every room has been joined.
 *
 * @example
 * ```typescript
 * const set = new DisjointSet([0, 1, 2, 3]);
 * set.union(0, 1);
 * set.union(2, 3);
 * set.count;           // 2
 * set.connected(0, 2); // false
 * set.union(1, 2);
 * set.isSingleSet();   // true
 * ```
 */
export class DisjointSet {
  private readonly parent = new Map<number, number>();
  private readonly size = new Map<number, number>();
  private components = 0;

  /**
   * @param ids - Element identifiers; each starts in its own set
   */
  constructor(ids: Iterable<number>) {
    for (const id of ids) {
      this.add(id);
    }
  }

  /**
   * Add a new singleton set. Adding a known id does nothing.
   */
  add(id: number): void {
    if (this.parent.has(id)) return;
    this.parent.set(id, id);
    this.size.set(id, 1);
    this.components++;
  }

  has(id: number): boolean {
    return this.parent.has(id);
  }

  /**
   * Number of disjoint sets.
   */
  get count(): number {
    return this.components;
  }

  /**
   * Number of tracked elements.
   */
  get elementCount(): number {
    return this.parent.size;
  }

  /**
   * Representative of the set containing `id`.
   * @throws {Error} If `id` was never added
   */
  find(id: number): number {
    let root = this.parentOf(id);
    while (root !== this.parentOf(root)) {
      root = this.parentOf(root);
    }

    // Path compression
    let current = id;
    while (current !== root) {
      const next = this.parentOf(current);
      this.parent.set(current, root);
      current = next;
    }

    return root;
  }

  /**
   * Merge the sets containing `a` and `b`.
   * @returns True if a merge was performed, false if already in the same set
   */
  union(a: number, b: number): boolean {
    let rootA = this.find(a);
    let rootB = this.find(b);
    if (rootA === rootB) return false;

    // Attach the smaller tree below the larger one
    if (this.sizeOfRoot(rootA) < this.sizeOfRoot(rootB)) {
      [rootA, rootB] = [rootB, rootA];
    }
    this.parent.set(rootB, rootA);
    this.size.set(rootA, this.sizeOfRoot(rootA) + this.sizeOfRoot(rootB));
    this.components--;
    return true;
  }

  connected(a: number, b: number): boolean {
    return this.find(a) === this.find(b);
  }

  /**
   * Number of elements in the set containing `id`.
   */
  sizeOf(id: number): number {
    return this.sizeOfRoot(this.find(id));
  }

  /**
   * True when every element belongs to one set (or there are none).
   */
  isSingleSet(): boolean {
    return this.components <= 1;
  }

  private parentOf(id: number): number {
    const parent = this.parent.get(id);
    if (parent === undefined) {
      throw new Error(`DisjointSet: unknown element ${id}`);
    }
    return parent;
  }

  private sizeOfRoot(root: number): number {
    return this.size.get(root) ?? 1;
  }
}
