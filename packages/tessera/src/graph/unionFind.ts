/** Disjoint sets over string ids with path halving and union by size. */
export class UnionFind {
  private parent = new Map<string, string>();
  private size = new Map<string, number>();

  constructor(ids: Iterable<string> = []) {
    for (const id of ids) this.add(id);
  }

  add(id: string): void {
    if (this.parent.has(id)) return;
    this.parent.set(id, id);
    this.size.set(id, 1);
  }

  find(id: string): string {
    this.add(id);
    let x = id;
    for (;;) {
      const p = this.parent.get(x) ?? x;
      if (p === x) return x;
      const gp = this.parent.get(p) ?? p;
      this.parent.set(x, gp);
      x = gp;
    }
  }

  union(a: string, b: string): boolean {
    let ra = this.find(a);
    let rb = this.find(b);
    if (ra === rb) return false;
    const sa = this.size.get(ra) ?? 1;
    const sb = this.size.get(rb) ?? 1;
    if (sa < sb) [ra, rb] = [rb, ra];
    this.parent.set(rb, ra);
    this.size.set(ra, sa + sb);
    return true;
  }

  /** Component sizes, largest first. */
  componentSizes(): number[] {
    const counts = new Map<string, number>();
    for (const id of this.parent.keys()) {
      const root = this.find(id);
      counts.set(root, (counts.get(root) ?? 0) + 1);
    }
    return [...counts.values()].sort((a, b) => b - a);
  }

  count(): number {
    return this.componentSizes().length;
  }
}
