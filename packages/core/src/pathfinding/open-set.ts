interface OpenEntry {
  index: number;
  priority: number;
  sequence: number;
}

/**
 * Binary min-heap of cell indices. Equal priorities pop in insertion order,
 * and the same cell may be queued more than once.
 */
export class OpenSet {
  #entries: OpenEntry[] = [];
  #nextSequence = 0;

  get size() {
    return this.#entries.length;
  }

  push(index: number, priority: number) {
    this.#entries.push({ index, priority, sequence: this.#nextSequence++ });
    this.#siftUp(this.#entries.length - 1);
  }

  pop(): number | undefined {
    const a = this.#entries;
    const top = a[0];
    if (!top) return undefined;
    const last = a.pop();
    if (last && a.length > 0) {
      a[0] = last;
      this.#siftDown(0);
    }
    return top.index;
  }

  #before(a: OpenEntry, b: OpenEntry) {
    return a.priority < b.priority || (a.priority === b.priority && a.sequence < b.sequence);
  }

  #siftUp(i: number) {
    const a = this.#entries;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.#before(a[i], a[p])) break;
      [a[i], a[p]] = [a[p], a[i]];
      i = p;
    }
  }

  #siftDown(i: number) {
    const a = this.#entries;
    const n = a.length;
    while (true) {
      let s = i;
      const l = i * 2 + 1;
      const r = l + 1;
      if (l < n && this.#before(a[l], a[s])) s = l;
      if (r < n && this.#before(a[r], a[s])) s = r;
      if (s === i) break;
      [a[i], a[s]] = [a[s], a[i]];
      i = s;
    }
  }
}
