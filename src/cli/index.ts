/**
 * CLI module: thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 */

export {
  registerAnalyzeCommand,
  registerRunCommand,
  registerPlanCommand,
  registerAgentsCommand,
  exitCodeFor,
  exitCodeOf,
  EXIT,
} from './run.js';
