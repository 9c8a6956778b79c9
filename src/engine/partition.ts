/**
 * Disjoint sets over cell indices, with set sizes and a way to walk every
 * member of a set from any one of its cells.
 *
 * Besides the usual parent/size arrays, `next` links the members of each set
 * into a cycle. Merging two sets swaps the successors of their roots, which
 * splices the two cycles into one, so the cycles always match the sets.
 */
export class Partition {
  private readonly parent: Int32Array;
  private readonly sizes: Int32Array;
  private readonly next: Int32Array;

  constructor(readonly length: number) {
    this.parent = new Int32Array(length);
    this.sizes = new Int32Array(length);
    this.next = new Int32Array(length);
    this.reset();
  }

  /** Back to `length` singletons */
  reset(): void {
    for (let i = 0; i < this.length; i++) {
      this.parent[i] = i;
      this.sizes[i] = 1;
      this.next[i] = i;
    }
  }

  canonify(x: number): number {
    let root = x;
    while (this.parent[root] !== root) root = this.parent[root];
    // path compression
    while (this.parent[x] !== root) {
      const up = this.parent[x];
      this.parent[x] = root;
      x = up;
    }
    return root;
  }

  size(x: number): number {
    return this.sizes[this.canonify(x)];
  }

  /** Returns false when `a` and `b` were already in one set */
  merge(a: number, b: number): boolean {
    let ra = this.canonify(a);
    let rb = this.canonify(b);
    if (ra === rb) return false;

    // the lower index stays the root, so a set's root is its first cell
    if (ra > rb) {
      const tmp = ra;
      ra = rb;
      rb = tmp;
    }
    this.parent[rb] = ra;
    this.sizes[ra] += this.sizes[rb];

    const succ = this.next[ra];
    this.next[ra] = this.next[rb];
    this.next[rb] = succ;
    return true;
  }

  /** Every member of the set containing `x`, starting with `x` itself */
  *members(x: number): IterableIterator<number> {
    let cur = x;
    do {
      yield cur;
      cur = this.next[cur];
    } while (cur !== x);
  }
}
