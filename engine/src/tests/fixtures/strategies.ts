import { ExecutionEvents } from '../../events/ExecutionEvents.js';
import type { StepGraphCache } from '../../execution/StepGraphCache.js';
import { SequentialStrategy } from '../../execution/strategies/SequentialStrategy.js';
import type { RetrievalFacade, ToolFacade } from '../../facades/FacadeTypes.js';
import type { EngineLogger } from '../../logging/EngineLogger.js';
import { LogLevel } from '../../types/log-types.js';
import { captureLogger } from './logger.js';

export interface SequentialSetup {
  tools: ToolFacade;
  retrieval: RetrievalFacade;
  graphCache?: StepGraphCache;
  logger?: EngineLogger;
}

export function sequentialStrategy(setup: SequentialSetup): { strategy: SequentialStrategy; events: ExecutionEvents } {
  const events = new ExecutionEvents();
  const strategy = new SequentialStrategy({
    tools: setup.tools,
    retrieval: setup.retrieval,
    graphCache: setup.graphCache,
    logger: setup.logger ?? captureLogger(LogLevel.SILENT).logger,
    events,
  });
  return { strategy, events };
}

/**
 * Event types in emission order
 */
export function recordEventTypes(events: ExecutionEvents): string[] {
  const seen: string[] = [];
  events.onAny((event) => {
    seen.push(event.type);
  });
  return seen;
}
