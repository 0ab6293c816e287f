/**
 * ExecutionEvents - typed pub/sub for plan executions
 *
 * - Map-based lookup, no routing
 * - Synchronous: handlers run in registration order before emit returns
 * - Error-isolated: a throwing handler is logged and never affects the run
 * - Wildcard support: `onAny` receives every event
 *
 * @example
 * ```ts
 * const events = new ExecutionEvents();
 * events.on(EngineEventType.STEP_COMPLETED, (event) => {
 *   console.log(event.payload.stepId, event.payload.outputs);
 * });
 * ```
 */

import type { EngineLogger } from '../logging/EngineLogger.js';
import {
  EngineEventType,
  type EngineEvent,
  type EventListener,
  type EventPayloads,
  type WildcardListener,
} from './EngineEvents.js';

type ListenerTable = { [E in EngineEventType]: Set<EventListener<E>> };

/**
 * Identifies the run an event belongs to
 */
export interface EventOrigin {
  executionId: string;
  planId: string;
}

export class ExecutionEvents {
  private readonly listeners: ListenerTable = {
    [EngineEventType.EXECUTION_STARTED]: new Set(),
    [EngineEventType.STEP_STARTED]: new Set(),
    [EngineEventType.STEP_COMPLETED]: new Set(),
    [EngineEventType.STEP_FAILED]: new Set(),
    [EngineEventType.EXECUTION_COMPLETED]: new Set(),
    [EngineEventType.EXECUTION_FAILED]: new Set(),
    [EngineEventType.EXECUTION_CANCELLED]: new Set(),
  };
  private readonly wildcardListeners = new Set<WildcardListener>();

  constructor(private readonly logger?: EngineLogger) {}

  /**
   * Subscribe to one event type
   *
   * @returns Unsubscribe function
   */
  on<E extends EngineEventType>(type: E, listener: EventListener<E>): () => void {
    const set: Set<EventListener<E>> = this.listeners[type];
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  /**
   * Subscribe once; the listener is removed before it runs
   */
  once<E extends EngineEventType>(type: E, listener: EventListener<E>): () => void {
    const unsubscribe = this.on(type, (event) => {
      unsubscribe();
      listener(event);
    });
    return unsubscribe;
  }

  /**
   * Subscribe to every event
   */
  onAny(listener: WildcardListener): () => void {
    this.wildcardListeners.add(listener);
    return () => {
      this.wildcardListeners.delete(listener);
    };
  }

  emit<E extends EngineEventType>(type: E, origin: EventOrigin, payload: EventPayloads[E]): void {
    const event: EngineEvent<E> = {
      type,
      timestamp: Date.now(),
      executionId: origin.executionId,
      planId: origin.planId,
      payload,
    };

    const set: Set<EventListener<E>> = this.listeners[type];
    for (const listener of [...set]) {
      this.invoke(type, () => listener(event));
    }
    for (const listener of [...this.wildcardListeners]) {
      this.invoke(type, () => listener(event));
    }
  }

  listenerCount(type: EngineEventType): number {
    return this.listeners[type].size;
  }

  /**
   * Remove all listeners
   */
  clear(): void {
    for (const set of Object.values(this.listeners)) {
      set.clear();
    }
    this.wildcardListeners.clear();
  }

  private invoke(type: EngineEventType, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger?.warn(`Event listener for "${type}" threw; ignoring`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
