/**
 * Timeout Manager
 *
 * Races an async operation against a timer. The timer is always cleared
 * once the race settles, so nothing is left pending.
 *
 * @module automation
 */

export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    public readonly operation?: string
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export interface TimeoutConfig {
  timeoutMs: number;
  /** Operation name for error messages */
  operation?: string;
}

export class TimeoutManager {
  /**
   * Execute operation with timeout
   *
   * @throws TimeoutError if the operation does not settle in time
   */
  static async execute<T>(operation: () => Promise<T>, config: TimeoutConfig): Promise<T> {
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          new TimeoutError(
            config.operation
              ? `${config.operation} timed out after ${config.timeoutMs} ms`
              : `Operation timed out after ${config.timeoutMs} ms`,
            config.timeoutMs,
            config.operation
          )
        );
      }, config.timeoutMs);
    });

    try {
      return await Promise.race([operation(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Parse a duration such as "500ms", "30s", "5m" or a bare number of ms
   */
  static parseTimeout(value: string | number): number {
    if (typeof value === 'number') {
      return value;
    }
    const match = /^(\d+(?:\.\d+)?)\s*(ms|s|m)?$/.exec(value.trim());
    if (!match) {
      throw new Error(`Invalid timeout format: "${value}". Use e.g. "500ms", "30s" or "5m".`);
    }
    const amount = Number(match[1]);
    switch (match[2]) {
      case 's':
        return amount * 1000;
      case 'm':
        return amount * 60_000;
      default:
        return amount;
    }
  }
}
