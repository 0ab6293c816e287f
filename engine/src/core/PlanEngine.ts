/**
 * Plan Engine - Main Public API
 *
 * Wires configuration, logging, facades, the complexity classifier, the
 * strategy router and the step graph cache behind one object.
 *
 * @module core
 *
 * @example
 * ```ts
 * const engine = new PlanEngine({ tools, retrieval, logLevel: LogLevel.DEBUG });
 * const plan = await engine.loadPlanFile('./plans/dc-limit.yaml');
 * const result = await engine.execute(plan, 'LineB tripped', { line: 'LineA' });
 * if (!result.success) {
 *   console.error(result.failedStep, result.errorMessage);
 * }
 * ```
 */

import { ComplexityClassifier } from '../analysis/ComplexityClassifier.js';
import type { ComplexityAnalysis } from '../analysis/ComplexityTypes.js';
import { PlanCatalog } from '../catalog/PlanCatalog.js';
import { PlanNotFoundError } from '../errors/ValidationErrors.js';
import { ExecutionEvents } from '../events/ExecutionEvents.js';
import { ExecutionStrategyRouter } from '../execution/ExecutionStrategyRouter.js';
import { StepGraphCache } from '../execution/StepGraphCache.js';
import { DelegatedStrategy } from '../execution/strategies/DelegatedStrategy.js';
import type { ExecutionStrategy } from '../execution/strategies/ExecutionStrategy.js';
import { SequentialStrategy } from '../execution/strategies/SequentialStrategy.js';
import { StrategyRegistry } from '../execution/strategies/StrategyRegistry.js';
import type { AgentFacade, RetrievalFacade, ToolFacade } from '../facades/FacadeTypes.js';
import { withRetrievalTimeout, withToolTimeout } from '../facades/TimeoutFacades.js';
import { PlanLoader } from '../loader/PlanLoader.js';
import { createEngineLogger, type EngineLogger } from '../logging/EngineLogger.js';
import { PlanParser } from '../parser/PlanParser.js';
import type { ExecuteOptions, ExecutionResult } from '../types/execution-types.js';
import type { Plan } from '../types/plan-types.js';
import { applyConfigDefaults, type EngineConfigInput, type ResolvedEngineConfig } from './EngineConfig.js';

export interface PlanEngineOptions extends EngineConfigInput {
  tools: ToolFacade;
  retrieval: RetrievalFacade;
  /** Enables the `delegated` strategy */
  agent?: AgentFacade;
  /** Registered after the built-in strategies; same name replaces */
  strategies?: readonly ExecutionStrategy[];
  logger?: EngineLogger;
  events?: ExecutionEvents;
  catalog?: PlanCatalog;
  /** Used instead of the engine's own cache, whatever `enableGraphCache` says */
  graphCache?: StepGraphCache;
  classifier?: ComplexityClassifier;
}

export class PlanEngine {
  readonly config: ResolvedEngineConfig;
  readonly logger: EngineLogger;
  readonly events: ExecutionEvents;
  readonly catalog: PlanCatalog;
  readonly strategies: StrategyRegistry;

  private readonly classifier: ComplexityClassifier;
  private readonly router: ExecutionStrategyRouter;
  private readonly graphCache?: StepGraphCache;
  private readonly history = new Map<string, ExecutionResult>();

  constructor(options: PlanEngineOptions) {
    const { tools, retrieval, agent, strategies, logger, events, catalog, graphCache, classifier, ...config } =
      options;

    this.config = applyConfigDefaults(config);
    this.logger =
      logger ??
      createEngineLogger(this.config.logLevel, {
        format: this.config.logFormat,
        colors: this.config.colors,
        source: 'PlanEngine',
      });
    this.events = events ?? new ExecutionEvents(this.logger.child('ExecutionEvents'));
    this.catalog = catalog ?? new PlanCatalog();
    this.classifier = classifier ?? new ComplexityClassifier({ logger: this.logger.child('ComplexityClassifier') });
    this.graphCache = graphCache ?? (this.config.enableGraphCache ? new StepGraphCache() : undefined);

    const timeoutMs = this.config.facadeTimeoutMs;
    const toolFacade = timeoutMs === undefined ? tools : withToolTimeout(tools, timeoutMs);
    const retrievalFacade = timeoutMs === undefined ? retrieval : withRetrievalTimeout(retrieval, timeoutMs);

    this.strategies = new StrategyRegistry([
      new SequentialStrategy({
        tools: toolFacade,
        retrieval: retrievalFacade,
        graphCache: this.graphCache,
        logger: this.logger.child('SequentialStrategy'),
        events: this.events,
      }),
    ]);
    if (agent) {
      this.strategies.register(
        new DelegatedStrategy({ agent, logger: this.logger.child('DelegatedStrategy'), events: this.events })
      );
    }
    for (const strategy of strategies ?? []) {
      this.strategies.register(strategy);
    }
    this.router = new ExecutionStrategyRouter(this.strategies);
  }

  /**
   * Validate a raw plan document
   *
   * @throws SchemaError
   */
  loadPlan(raw: unknown): Plan {
    return PlanParser.parse(raw);
  }

  /**
   * @throws PlanFileNotFoundError, SchemaError
   */
  loadPlanFile(filePath: string): Promise<Plan> {
    return PlanLoader.fromFile(filePath);
  }

  classify(plan: Plan): ComplexityAnalysis {
    return this.classifier.classify(plan);
  }

  /**
   * Run a plan. Step failures come back as `success: false`; caller
   * mistakes are thrown.
   *
   * @throws MissingInputError, UnknownStrategyError, StaleStepGraphError
   */
  async execute(
    plan: Plan,
    scenario: string,
    inputs: Readonly<Record<string, unknown>> = {},
    options: ExecuteOptions = {}
  ): Promise<ExecutionResult> {
    const analysis = this.classify(plan);
    const { strategy, reason } = this.router.resolve(analysis, options.strategy ?? this.config.defaultStrategy);
    this.logger.info(`Running plan "${plan.planId}" with ${strategy.name}`, { level: analysis.level, reason });

    const result = await strategy.execute(plan, { scenario, inputs, signal: options.signal });
    this.remember(result);
    return result;
  }

  /**
   * Pick a plan from the catalog for the scenario and run it
   *
   * @throws PlanNotFoundError when no plan matches and no fallback is set
   */
  async processScenario(
    scenario: string,
    inputs: Readonly<Record<string, unknown>> = {},
    options: ExecuteOptions = {}
  ): Promise<ExecutionResult> {
    const match = this.catalog.select(scenario);
    if (!match) {
      throw PlanNotFoundError.forScenario(scenario, this.catalog.size);
    }

    if (match.fallback) {
      this.logger.warn(`No plan matched the scenario; using fallback "${match.plan.planId}"`);
    } else {
      this.logger.info(`Selected plan "${match.plan.planId}"`, { score: match.score, matched: match.matched });
    }
    return this.execute(match.plan, scenario, inputs, options);
  }

  /**
   * Drop the cached step graph of a plan whose body changed
   */
  invalidatePlan(planId: string): boolean {
    return this.graphCache?.invalidate(planId) ?? false;
  }

  getExecution(executionId: string): ExecutionResult | undefined {
    return this.history.get(executionId);
  }

  /**
   * Remembered executions, oldest first
   */
  listExecutions(): ExecutionResult[] {
    return [...this.history.values()];
  }

  private remember(result: ExecutionResult): void {
    const limit = this.config.historyLimit;
    if (limit === 0) {
      return;
    }
    this.history.set(result.executionId, result);
    while (this.history.size > limit) {
      const oldest = this.history.keys().next();
      if (oldest.done) break;
      this.history.delete(oldest.value);
    }
  }
}
