/**
 * Minimal callback list shared by the provider adapters.
 */
export class CallbackSet<T> {
  private readonly callbacks = new Set<(value: T) => void>();

  add(cb: (value: T) => void): () => void {
    this.callbacks.add(cb);
    return () => {
      this.callbacks.delete(cb);
    };
  }

  emit(value: T): void {
    for (const cb of [...this.callbacks]) {
      cb(value);
    }
  }

  clear(): void {
    this.callbacks.clear();
  }

  get size(): number {
    return this.callbacks.size;
  }
}
