export type CellListener = () => void;

/**
 * A shared mutable value with one exclusive writer at a time. Subscribers are
 * notified after every write view is released, including writes that throw.
 */
export class Cell<T> {
  private value: T;
  private writing = false;
  private revision = 0;
  private readonly listeners = new Set<CellListener>();

  constructor(initial: T, private readonly label = "cell") {
    this.value = initial;
  }

  /** Monotonic counter bumped on every released write; usable as a snapshot key. */
  get version(): number {
    return this.revision;
  }

  read(): T {
    return this.value;
  }

  /**
   * Runs `fn` with exclusive access to the value. `fn` either mutates the value
   * in place or hands a new one to `replace`.
   */
  write<R>(fn: (value: T, replace: (next: T) => void) => R): R {
    if (this.writing) {
      throw new Error(`[cell] ${this.label} is already being written`);
    }
    this.writing = true;
    try {
      return fn(this.value, (next) => {
        this.value = next;
      });
    } finally {
      this.writing = false;
      this.revision += 1;
      this.notify();
    }
  }

  set(next: T): void {
    this.write((_, replace) => replace(next));
  }

  subscribe(listener: CellListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    for (const listener of [...this.listeners]) {
      listener();
    }
  }
}
