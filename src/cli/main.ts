#!/usr/bin/env node

/**
 * socflow CLI entry point.
 * Thin wrapper: all logic delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import {
  registerAgentsCommand,
  registerAnalyzeCommand,
  registerPlanCommand,
  registerRunCommand,
} from './index.js';

const program = new Command();

program
  .name('socflow')
  .description(
    'Security operations orchestrator. Triage alerts, plan by risk tier, dispatch specialist agents, escalate to humans.',
  )
  .version('0.1.0');

registerAnalyzeCommand(program);
registerRunCommand(program);
registerPlanCommand(program);
registerAgentsCommand(program);

await program.parseAsync();
