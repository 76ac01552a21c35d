/**
 * Named-field carrier for request/response payloads and per-call locals.
 *
 * Reading a missing field yields `null` and never inserts it, so the set of
 * keys is always exactly what was written (or decoded off the wire).
 */
export class Container {
  private readonly fields = new Map<string, unknown>();

  constructor(initial?: Record<string, unknown>) {
    if (initial) this.update(initial);
  }

  get(key: string): unknown {
    return this.fields.has(key) ? this.fields.get(key) : null;
  }

  set(key: string, value: unknown): this {
    this.fields.set(key, value);
    return this;
  }

  has(key: string): boolean {
    return this.fields.has(key);
  }

  delete(key: string): boolean {
    return this.fields.delete(key);
  }

  clear(): void {
    this.fields.clear();
  }

  update(record: Record<string, unknown>): this {
    for (const [key, value] of Object.entries(record)) {
      this.fields.set(key, value);
    }
    return this;
  }

  keys(): string[] {
    return [...this.fields.keys()];
  }

  get size(): number {
    return this.fields.size;
  }

  toRecord(): Record<string, unknown> {
    return Object.fromEntries(this.fields);
  }
}
