import type { ExecutionStrategy } from './ExecutionStrategy.js';

/**
 * Named execution strategies. Built by the caller; there is no
 * process-wide instance.
 */
export class StrategyRegistry {
  private readonly strategies = new Map<string, ExecutionStrategy>();

  constructor(strategies: Iterable<ExecutionStrategy> = []) {
    for (const strategy of strategies) {
      this.register(strategy);
    }
  }

  /**
   * Register a strategy under its name, replacing any previous one
   */
  register(strategy: ExecutionStrategy): this {
    this.strategies.set(strategy.name, strategy);
    return this;
  }

  unregister(name: string): boolean {
    return this.strategies.delete(name);
  }

  get(name: string): ExecutionStrategy | undefined {
    return this.strategies.get(name);
  }

  has(name: string): boolean {
    return this.strategies.has(name);
  }

  /**
   * Registered names, in registration order
   */
  list(): string[] {
    return [...this.strategies.keys()];
  }
}
