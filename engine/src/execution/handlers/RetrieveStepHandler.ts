import { PlaceholderResolver } from '../../context/PlaceholderResolver.js';
import { RetrievalError } from '../../errors/FacadeErrors.js';
import { errorMessage } from '../../errors/PlanEngineError.js';
import type { RetrievalFacade, RetrievalResult } from '../../facades/FacadeTypes.js';
import { StepKind, type RetrieveStep } from '../../types/plan-types.js';
import type { StepContext, StepHandler, StepOutputs } from './StepHandler.js';

/**
 * Resolves the query, asks the retrieval facade, binds the answer to the
 * first output and the raw result to any further outputs
 */
export class RetrieveStepHandler implements StepHandler<StepKind.RETRIEVE> {
  readonly kind = StepKind.RETRIEVE;

  constructor(private readonly retrieval: RetrievalFacade) {}

  async execute(step: RetrieveStep, context: StepContext): Promise<StepOutputs> {
    const { text, unresolved } = PlaceholderResolver.resolveText(step.query, context.variables);
    if (unresolved.length > 0) {
      context.logger.warn('Unresolved placeholders left in query', { stepId: step.id, symbols: unresolved });
    }

    let result: RetrievalResult;
    try {
      result = await this.retrieval.query(text);
    } catch (error) {
      throw new RetrievalError(text, errorMessage(error), error);
    }
    if (!result.success) {
      throw new RetrievalError(text, result.error);
    }

    const { answer } = result;
    const raw = result.raw ?? null;
    const outputs: StepOutputs = {};
    step.outputs.forEach((symbol, index) => {
      outputs[symbol] = index === 0 ? answer : raw;
    });
    return outputs;
  }
}
