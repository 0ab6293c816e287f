import { LogLevel, type EngineLoggerConfig } from '../types/log-types.js';
import { EngineLogger } from './EngineLogger.js';

/**
 * Process-wide default logger
 *
 * The engine itself takes its logger through PlanEngine options so that
 * several engines can log differently. Entry points (the CLI) configure
 * this default once and pick it up wherever a logger is not passed in.
 *
 * ```typescript
 * LoggerManager.initialize({ level: LogLevel.INFO, source: 'gridplan' });
 * const logger = LoggerManager.getLogger();
 * ```
 */
export class LoggerManager {
  private static instance: EngineLogger | null = null;

  /**
   * Configure the default logger. A second call replaces the first.
   */
  static initialize(config: EngineLoggerConfig): EngineLogger {
    this.instance = new EngineLogger({
      format: 'text',
      colors: true,
      timestamp: true,
      source: 'GridPlan',
      ...config,
    });
    return this.instance;
  }

  /**
   * The default logger; a silent one when nothing was initialized
   */
  static getLogger(): EngineLogger {
    if (!this.instance) {
      this.instance = new EngineLogger({ level: LogLevel.SILENT });
    }
    return this.instance;
  }

  static isReady(): boolean {
    return this.instance !== null;
  }

  /**
   * Forget the default logger (tests)
   */
  static reset(): void {
    this.instance = null;
  }
}
