/**
 * O(1) ordered key queue using a doubly-linked list + Map.
 *
 * Keys are kept in arrival order (oldest at the head). Used as the
 * per-frequency bucket of the LFU policy and as the recency / insertion
 * order of the LRU and FIFO policies.
 *
 * Operations, all O(1):
 * - append(key): add key at the tail (newest end)
 * - moveToTail(key): re-append an existing key
 * - popOldest(): remove and return the head key
 * - remove(key): remove an arbitrary key
 */

interface KeyNode {
  key: string;
  prev: KeyNode | null;
  next: KeyNode | null;
}

export class KeyQueue {
  /** Map from key to node for O(1) lookup */
  private nodeMap: Map<string, KeyNode> = new Map();
  /** Sentinel head node (oldest side) */
  private readonly head: KeyNode;
  /** Sentinel tail node (newest side) */
  private readonly tail: KeyNode;

  constructor() {
    this.head = { key: '__HEAD__', prev: null, next: null };
    this.tail = { key: '__TAIL__', prev: null, next: null };
    this.head.next = this.tail;
    this.tail.prev = this.head;
  }

  get size(): number {
    return this.nodeMap.size;
  }

  isEmpty(): boolean {
    return this.nodeMap.size === 0;
  }

  has(key: string): boolean {
    return this.nodeMap.has(key);
  }

  /**
   * Append key at the tail. An existing key is moved to the tail instead of
   * being duplicated.
   */
  append(key: string): void {
    const existing = this.nodeMap.get(key);
    if (existing) {
      this.unlink(existing);
      this.linkBeforeTail(existing);
      return;
    }

    const node: KeyNode = { key, prev: null, next: null };
    this.linkBeforeTail(node);
    this.nodeMap.set(key, node);
  }

  /**
   * Move an existing key to the tail. No-op for unknown keys.
   */
  moveToTail(key: string): void {
    const node = this.nodeMap.get(key);
    if (!node) return;

    this.unlink(node);
    this.linkBeforeTail(node);
  }

  peekOldest(): string | null {
    const oldest = this.head.next;
    if (!oldest || oldest === this.tail) {
      return null;
    }
    return oldest.key;
  }

  popOldest(): string | null {
    const oldest = this.head.next;
    if (!oldest || oldest === this.tail) {
      return null;
    }

    this.unlink(oldest);
    this.nodeMap.delete(oldest.key);
    return oldest.key;
  }

  remove(key: string): boolean {
    const node = this.nodeMap.get(key);
    if (!node) return false;

    this.unlink(node);
    this.nodeMap.delete(key);
    return true;
  }

  clear(): void {
    this.nodeMap.clear();
    this.head.next = this.tail;
    this.tail.prev = this.head;
  }

  /**
   * All keys, oldest first.
   */
  keys(): string[] {
    const result: string[] = [];
    let current = this.head.next;
    while (current && current !== this.tail) {
      result.push(current.key);
      current = current.next;
    }
    return result;
  }

  private unlink(node: KeyNode): void {
    const prev = node.prev;
    const next = node.next;
    if (prev) prev.next = next;
    if (next) next.prev = prev;
    node.prev = null;
    node.next = null;
  }

  private linkBeforeTail(node: KeyNode): void {
    const prev = this.tail.prev;
    node.prev = prev;
    node.next = this.tail;
    if (prev) prev.next = node;
    this.tail.prev = node;
  }
}
