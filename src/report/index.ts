/**
 * Audit output module.
 * Deterministic: builds, renders and stores the audit record of a task.
 */

export { buildAuditRecord } from './audit.js';
export type { AuditInput } from './audit.js';
export { generateMarkdown, serializeAuditJSON, formatDuration } from './reporter.js';
export { MemoryAuditSink, FileAuditSink } from './sinks.js';
export type { AuditSink } from './sinks.js';
