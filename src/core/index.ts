/**
 * Core orchestration module.
 * Coordinates triage → risk → plan → dispatch → synthesis per task.
 * Pure logic apart from provider calls; no CLI.
 */

export { Orchestrator } from './orchestrator.js';
export type {
  OrchestratorEvent,
  OrchestratorListener,
  OrchestratorOptions,
  TaskStatus,
} from './orchestrator.js';
export { OrchestrationEngine, isTerminalState } from './engine.js';
export type {
  EngineDeps,
  EngineEvent,
  SuspendedState,
  TaskOutcome,
  TaskSnapshot,
} from './engine.js';
export {
  PlannerError,
  TRIAGE_STEP,
  buildPlan,
  describePlan,
  planAgents,
  planFromSteps,
  planSteps,
  toNodes,
} from './planner.js';
export { classifyRisk, compareTiers, branchPolicy } from './risk.js';
export type { BranchPolicy } from './risk.js';
export { evaluateCondition, latestResponse } from './decisions.js';
export type { ConditionResult } from './decisions.js';
export { TaskContext, ContextConflictError } from './context.js';
export type { InvocationOutcome } from './context.js';
export { dispatchStep, dispatchGroup, validateResponse } from './dispatcher.js';
export type { DispatchOptions } from './dispatcher.js';
export {
  PolicyEscalationSink,
  QueueEscalationSink,
  checkDecisionConflict,
  severityOf,
} from './escalation.js';
export type { EscalationSink, EscalationTrigger } from './escalation.js';
export { synthesize } from './synthesis.js';
export { MetricsCollector } from './metrics.js';
export type { InvocationStats, OrchestrationMetrics } from './metrics.js';
export {
  IllegalTransitionError,
  InvalidDecisionError,
  InvalidTaskError,
  TaskAbortedError,
  UnknownTaskError,
} from './errors.js';
