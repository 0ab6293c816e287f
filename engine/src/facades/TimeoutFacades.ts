/**
 * Timeout decorators for facades
 *
 * A call that does not settle within the budget becomes an ordinary
 * failure result ("... timed out after N ms"); the engine handles it like
 * any other facade failure. Errors the inner facade throws pass through.
 *
 * @module facades
 */

import { TimeoutError, TimeoutManager } from '../automation/TimeoutManager.js';
import {
  retrievalFailure,
  toolFailure,
  type RetrievalFacade,
  type RetrievalResult,
  type ToolFacade,
  type ToolResult,
} from './FacadeTypes.js';

export class TimeoutToolFacade implements ToolFacade {
  constructor(
    private readonly inner: ToolFacade,
    readonly timeoutMs: number
  ) {}

  async invoke(toolName: string, args: Readonly<Record<string, unknown>>): Promise<ToolResult> {
    try {
      return await TimeoutManager.execute(() => this.inner.invoke(toolName, args), {
        timeoutMs: this.timeoutMs,
        operation: `Tool "${toolName}"`,
      });
    } catch (error) {
      if (error instanceof TimeoutError) {
        return toolFailure(error.message);
      }
      throw error;
    }
  }
}

export class TimeoutRetrievalFacade implements RetrievalFacade {
  constructor(
    private readonly inner: RetrievalFacade,
    readonly timeoutMs: number
  ) {}

  async query(text: string): Promise<RetrievalResult> {
    try {
      return await TimeoutManager.execute(() => this.inner.query(text), {
        timeoutMs: this.timeoutMs,
        operation: 'Retrieval query',
      });
    } catch (error) {
      if (error instanceof TimeoutError) {
        return retrievalFailure(error.message);
      }
      throw error;
    }
  }
}

/**
 * Wrap a tool facade with a per-call timeout
 */
export function withToolTimeout(facade: ToolFacade, timeoutMs: number): ToolFacade {
  return new TimeoutToolFacade(facade, timeoutMs);
}

/**
 * Wrap a retrieval facade with a per-call timeout
 */
export function withRetrievalTimeout(facade: RetrievalFacade, timeoutMs: number): RetrievalFacade {
  return new TimeoutRetrievalFacade(facade, timeoutMs);
}
