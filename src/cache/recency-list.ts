const NIL = -1;

type Node<K> = {
  key: K;
  prev: number;
  next: number;
};

/**
 * Doubly-linked list of keys kept in an arena.
 *
 * Nodes are addressed by slot number and link to each other by slot number,
 * never by reference. Front = most recently used, back = least.
 */
export class RecencyList<K> {
  private nodes: (Node<K> | null)[] = [];
  private free: number[] = [];
  private head = NIL;
  private tail = NIL;
  private count = 0;

  get size(): number {
    return this.count;
  }

  get front(): K | undefined {
    return this.head === NIL ? undefined : this.at(this.head).key;
  }

  get back(): K | undefined {
    return this.tail === NIL ? undefined : this.at(this.tail).key;
  }

  pushFront(key: K): number {
    const slot = this.alloc(key);
    this.linkFront(slot);
    this.count++;
    return slot;
  }

  moveToFront(slot: number): void {
    this.at(slot);
    if (slot === this.head) return;
    this.unlink(slot);
    this.linkFront(slot);
  }

  remove(slot: number): K {
    const { key } = this.at(slot);
    this.unlink(slot);
    this.nodes[slot] = null;
    this.free.push(slot);
    this.count--;
    return key;
  }

  popBack(): K {
    if (this.tail === NIL) {
      throw new Error("[lru]: cannot pop from an empty list");
    }
    return this.remove(this.tail);
  }

  /**
   * front to back, over a snapshot taken at the call
   */
  keys(): IterableIterator<K> {
    const keys: K[] = [];
    for (let slot = this.head; slot !== NIL; slot = this.at(slot).next) {
      keys.push(this.at(slot).key);
    }
    return keys.values();
  }

  clear(): void {
    this.nodes = [];
    this.free = [];
    this.head = NIL;
    this.tail = NIL;
    this.count = 0;
  }

  // freed slots are handed out again before the arena grows
  private alloc(key: K): number {
    const node: Node<K> = { key, prev: NIL, next: NIL };
    const reused = this.free.pop();
    if (reused !== undefined) {
      this.nodes[reused] = node;
      return reused;
    }
    this.nodes.push(node);
    return this.nodes.length - 1;
  }

  private at(slot: number): Node<K> {
    const node = this.nodes[slot];
    if (!node) {
      throw new Error(`[lru]: slot ${slot} is not linked`);
    }
    return node;
  }

  private linkFront(slot: number): void {
    const node = this.at(slot);
    node.prev = NIL;
    node.next = this.head;
    if (this.head !== NIL) this.at(this.head).prev = slot;
    this.head = slot;
    if (this.tail === NIL) this.tail = slot;
  }

  private unlink(slot: number): void {
    const node = this.at(slot);

    if (node.prev === NIL) this.head = node.next;
    else this.at(node.prev).next = node.next;

    if (node.next === NIL) this.tail = node.prev;
    else this.at(node.next).prev = node.prev;

    node.prev = NIL;
    node.next = NIL;
  }
}
