/**
 * Facade contracts
 *
 * The engine reaches external collaborators only through these narrow
 * interfaces. A facade reports failure through its result; a facade
 * that throws is treated the same way by the engine.
 *
 * @module facades
 */

export interface ToolSuccess {
  readonly success: true;
  readonly value: unknown;
  readonly unit?: string;
}

export interface ToolFailure {
  readonly success: false;
  readonly error: string;
}

export type ToolResult = ToolSuccess | ToolFailure;

export interface ToolFacade {
  /**
   * Invoke a named tool with keyword arguments.
   * An unknown tool name is a failure result, not a throw.
   */
  invoke(toolName: string, args: Readonly<Record<string, unknown>>): Promise<ToolResult>;
}

export interface RetrievalSuccess {
  readonly success: true;
  /** Free-text answer, bound to the first output symbol */
  readonly answer: string;
  /** Structured payload, bound to any further output symbols */
  readonly raw?: unknown;
  readonly confidence?: number;
  readonly sources?: readonly string[];
}

export interface RetrievalFailure {
  readonly success: false;
  readonly error: string;
}

export type RetrievalResult = RetrievalSuccess | RetrievalFailure;

export interface RetrievalFacade {
  query(text: string): Promise<RetrievalResult>;
}

export interface AgentSuccess {
  readonly success: true;
  readonly answer: string;
}

export interface AgentFailure {
  readonly success: false;
  readonly error: string;
}

export type AgentResult = AgentSuccess | AgentFailure;

export interface AgentFacade {
  /**
   * Hand a whole task description to an agent; returns its free-text answer
   */
  run(task: string): Promise<AgentResult>;
}

export function toolSuccess(value: unknown, unit?: string): ToolSuccess {
  return unit === undefined ? { success: true, value } : { success: true, value, unit };
}

export function toolFailure(error: string): ToolFailure {
  return { success: false, error };
}

export function retrievalSuccess(
  answer: string,
  extra: Omit<RetrievalSuccess, 'success' | 'answer'> = {}
): RetrievalSuccess {
  return { success: true, answer, ...extra };
}

export function retrievalFailure(error: string): RetrievalFailure {
  return { success: false, error };
}

export function agentSuccess(answer: string): AgentSuccess {
  return { success: true, answer };
}

export function agentFailure(error: string): AgentFailure {
  return { success: false, error };
}
