/**
 * Variable Table
 *
 * Per-run map from symbol to value. Seeded from the caller's inputs and
 * grown by step outputs; a later binding of the same symbol replaces the
 * earlier one. Never shared between runs.
 *
 * @module context
 */

export class VariableTable {
  private readonly values = new Map<string, unknown>();

  constructor(seed: Readonly<Record<string, unknown>> = {}) {
    for (const [symbol, value] of Object.entries(seed)) {
      this.values.set(symbol, value);
    }
  }

  has(symbol: string): boolean {
    return this.values.has(symbol);
  }

  get(symbol: string): unknown {
    return this.values.get(symbol);
  }

  bind(symbol: string, value: unknown): void {
    this.values.set(symbol, value);
  }

  get size(): number {
    return this.values.size;
  }

  /**
   * Plain-object copy, in binding order
   */
  snapshot(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }
}
