import { PlaceholderResolver } from '../../context/PlaceholderResolver.js';
import { ToolInvocationError } from '../../errors/FacadeErrors.js';
import { errorMessage } from '../../errors/PlanEngineError.js';
import type { ToolFacade, ToolResult } from '../../facades/FacadeTypes.js';
import { StepKind, type ToolStep } from '../../types/plan-types.js';
import type { StepContext, StepHandler, StepOutputs } from './StepHandler.js';

export class ToolStepHandler implements StepHandler<StepKind.TOOL> {
  readonly kind = StepKind.TOOL;

  constructor(private readonly tools: ToolFacade) {}

  async execute(step: ToolStep, context: StepContext): Promise<StepOutputs> {
    const args: Record<string, unknown> = {};
    for (const [name, raw] of Object.entries(step.inputs)) {
      const { value, unresolved } = PlaceholderResolver.resolveValue(raw, context.variables);
      if (unresolved.length > 0) {
        context.logger.warn('Unresolved placeholders passed to tool', {
          stepId: step.id,
          input: name,
          symbols: unresolved,
        });
      }
      args[name] = value;
    }

    let result: ToolResult;
    try {
      result = await this.tools.invoke(step.toolName, args);
    } catch (error) {
      throw new ToolInvocationError(step.toolName, errorMessage(error), error);
    }
    if (!result.success) {
      throw new ToolInvocationError(step.toolName, result.error);
    }

    context.logger.debug('Tool returned', { stepId: step.id, tool: step.toolName, unit: result.unit });

    const [output] = step.outputs;
    return output === undefined ? {} : { [output]: result.value };
  }
}
