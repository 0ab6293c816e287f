/**
 * Engine Configuration
 *
 * User-facing configuration for PlanEngine. Every option is optional;
 * `applyConfigDefaults` validates the input and fills in defaults.
 *
 * @module core
 */

import { z } from 'zod';
import { ConfigError } from '../errors/ValidationErrors.js';
import { LogLevel } from '../types/log-types.js';

export const EngineConfigSchema = z
  .object({
    /** Minimum log level */
    logLevel: z.nativeEnum(LogLevel).default(LogLevel.INFO),

    /** Log output format */
    logFormat: z.enum(['text', 'json']).default('text'),

    /** ANSI colors in text logs */
    colors: z.boolean().default(true),

    /**
     * Strategy used when execute() is not given one explicitly.
     * Unset means: follow the classifier's recommendation.
     */
    defaultStrategy: z.string().min(1).optional(),

    /**
     * When set, tool and retrieval facades are wrapped with timeout
     * decorators using this budget per call
     */
    facadeTimeoutMs: z.number().int().positive().optional(),

    /** Cache compiled step graphs per plan id */
    enableGraphCache: z.boolean().default(true),

    /** Executions kept in memory for getExecution()/listExecutions() */
    historyLimit: z.number().int().nonnegative().default(100),
  })
  .strict();

/**
 * Configuration as callers write it
 *
 * @example
 * ```ts
 * const engine = new PlanEngine({
 *   logLevel: LogLevel.DEBUG,
 *   facadeTimeoutMs: 5_000,
 *   tools,
 *   retrieval,
 * });
 * ```
 */
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/**
 * Configuration with defaults applied
 */
export type ResolvedEngineConfig = z.output<typeof EngineConfigSchema>;

/**
 * Validate configuration and apply defaults
 *
 * @throws ConfigError naming the first offending option
 */
export function applyConfigDefaults(config: EngineConfigInput = {}): ResolvedEngineConfig {
  return parseConfig(config);
}

function parseConfig(raw: unknown): ResolvedEngineConfig {
  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.join('.');
    throw new ConfigError(
      path ? `Invalid engine config "${path}": ${issue.message}` : `Invalid engine config: ${issue.message}`,
      path || undefined,
      { issues: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) }
    );
  }
  return result.data;
}

/**
 * Read configuration from environment variables
 *
 * - GRIDPLAN_LOG_LEVEL: debug | info | warn | error | fatal | silent
 * - GRIDPLAN_LOG_FORMAT: text | json
 * - GRIDPLAN_FACADE_TIMEOUT_MS: positive integer
 * - GRIDPLAN_STRATEGY: default strategy name
 * - NO_COLOR: any non-empty value disables colors
 *
 * Values are passed through unvalidated; `applyConfigDefaults` rejects bad ones.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (env.GRIDPLAN_LOG_LEVEL) {
    config.logLevel = env.GRIDPLAN_LOG_LEVEL.trim().toLowerCase();
  }
  if (env.GRIDPLAN_LOG_FORMAT) {
    config.logFormat = env.GRIDPLAN_LOG_FORMAT.trim().toLowerCase();
  }
  if (env.GRIDPLAN_FACADE_TIMEOUT_MS) {
    config.facadeTimeoutMs = Number(env.GRIDPLAN_FACADE_TIMEOUT_MS);
  }
  if (env.GRIDPLAN_STRATEGY) {
    config.defaultStrategy = env.GRIDPLAN_STRATEGY.trim();
  }
  if (env.NO_COLOR) {
    config.colors = false;
  }

  return config;
}

/**
 * Environment configuration merged under explicit overrides, validated
 */
export function loadConfig(
  overrides: EngineConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedEngineConfig {
  return parseConfig({ ...configFromEnv(env), ...stripUndefined(overrides) });
}

function stripUndefined(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}
