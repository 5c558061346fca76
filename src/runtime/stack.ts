/**
 * Stack
 * Last-in-first-out container owned by a single stage call
 */

export class Stack<T> {
  private readonly items: T[] = [];

  push(item: T): void {
    this.items.push(item);
  }

  /** @throws {RangeError} When the stack is empty */
  pop(): T {
    const item = this.items.pop();
    if (item === undefined) {
      throw new RangeError('Stack is empty');
    }
    return item;
  }

  peek(): T | undefined {
    return this.items[this.items.length - 1];
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  get size(): number {
    return this.items.length;
  }
}
