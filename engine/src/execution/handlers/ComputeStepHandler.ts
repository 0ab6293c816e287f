import { PlaceholderResolver } from '../../context/PlaceholderResolver.js';
import { UnboundSymbolError } from '../../errors/FormulaErrors.js';
import { FormulaEvaluator } from '../../formula/FormulaEvaluator.js';
import { StepKind, type ComputeStep } from '../../types/plan-types.js';
import type { StepContext, StepHandler, StepOutputs } from './StepHandler.js';

/**
 * Evaluates the formula over the step's inputs. Formula operands name
 * input keys; an input placeholder with no value is fatal here.
 */
export class ComputeStepHandler implements StepHandler<StepKind.COMPUTE> {
  readonly kind = StepKind.COMPUTE;

  constructor(private readonly evaluator: FormulaEvaluator = new FormulaEvaluator()) {}

  async execute(step: ComputeStep, context: StepContext): Promise<StepOutputs> {
    const bindings: Record<string, unknown> = {};
    for (const [name, raw] of Object.entries(step.inputs)) {
      const { value, unresolved } = PlaceholderResolver.resolveValue(raw, context.variables);
      if (unresolved.length > 0) {
        throw new UnboundSymbolError(unresolved[0], step.formula);
      }
      bindings[name] = value;
    }

    const result = this.evaluator.evaluate(step.formula, bindings);
    const [output] = step.outputs;
    return output === undefined ? {} : { [output]: result };
  }
}
