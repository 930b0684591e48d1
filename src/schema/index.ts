/**
 * Schema module: the single source of truth for task, agent and audit shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './alert.js';
export * from './agent.js';
export * from './task.js';
export * from './plan.js';
export * from './escalation.js';
export * from './audit.js';
export * from './config.js';
