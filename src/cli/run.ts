import type { Command } from 'commander';

import { loadConfigOrDefaults, loadEnvConfig, loadTaskFile } from '../config/index.js';
import { AGENT_IDS, escalationPolicySchema, taskTypeSchema } from '../schema/index.js';
import type { FileConfig } from '../schema/index.js';
import { createRegistryFromConfig, providerLimits } from '../providers/index.js';
import {
  InvalidDecisionError,
  InvalidTaskError,
  Orchestrator,
  PolicyEscalationSink,
  buildPlan,
  classifyRisk,
  describePlan,
} from '../core/index.js';
import type { OrchestrationMetrics, TaskOutcome } from '../core/index.js';
import { FileAuditSink, formatDuration, serializeAuditJSON } from '../report/index.js';
import { stableStringify } from '../utils/json.js';
import * as log from '../utils/logger.js';

// ── Exit codes ───────────────────────────────────────────────

export const EXIT = {
  DONE: 0,
  ABORTED: 1,
  SUSPENDED: 2,
  INVALID: 3,
  ERROR: 4,
} as const;

export function exitCodeFor(outcome: TaskOutcome): number {
  if (outcome.status === 'suspended') return EXIT.SUSPENDED;
  return outcome.state === 'Aborted' ? EXIT.ABORTED : EXIT.DONE;
}

export function exitCodeOf(err: unknown): number {
  if (err instanceof InvalidTaskError || err instanceof InvalidDecisionError) {
    return err.exitCode;
  }
  return EXIT.ERROR;
}

function fail(err: unknown, prefix = 'Error'): void {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${prefix}: ${message}\n`);
  process.exitCode = exitCodeOf(err);
}

// ── Wiring ───────────────────────────────────────────────────

interface RunOptions {
  config: string;
  json?: true;
  auditDir?: string;
  onEscalation?: string;
}

function createOrchestrator(config: FileConfig, opts: RunOptions): Orchestrator {
  const policy = escalationPolicySchema.parse(opts.onEscalation ?? config.onEscalation);
  const orchestrator = new Orchestrator({
    registry: createRegistryFromConfig(config, loadEnvConfig()),
    escalationSink: new PolicyEscalationSink(policy),
    auditSink: new FileAuditSink(opts.auditDir ?? config.auditDir),
    criticalSystemCategories: config.criticalSystemCategories,
    retryBackoffMs: config.retryBackoffMs,
  });

  orchestrator.onEvent((event) => {
    if (event.type === 'high-risk-alert') {
      log.warn(`High-risk alert ${event.alertId ?? event.taskId} (score ${String(event.riskScore)})`);
    }
  });
  return orchestrator;
}

// ── Stderr summary ───────────────────────────────────────────

function printOutcome(taskId: string, outcome: TaskOutcome): void {
  process.stderr.write(`\n--- socflow result ---\n`);
  process.stderr.write(`Task:     ${taskId}\n`);

  if (outcome.status === 'suspended') {
    const { escalation } = outcome;
    process.stderr.write(`State:    ${outcome.state}\n`);
    process.stderr.write(`Reason:   ${escalation.reason} (${escalation.severity})\n`);
    process.stderr.write(`Detail:   ${escalation.detail}\n\n`);
    return;
  }

  const { record } = outcome;
  const failed = record.previousActions.filter((r) => r.status === 'failed').length;
  process.stderr.write(`State:    ${record.finalState}\n`);
  process.stderr.write(`Decision: ${record.finalDecision ?? '-'}\n`);
  process.stderr.write(`Reason:   ${record.terminationReason}\n`);
  process.stderr.write(
    `Agents:   ${String(record.previousActions.length)} invocations, ${String(failed)} failed\n`,
  );
  process.stderr.write(`Time:     ${formatDuration(record.durationMs)}\n\n`);
}

function printMetrics(metrics: OrchestrationMetrics): void {
  log.section('Agent latency');
  for (const [agentId, stats] of Object.entries(metrics.invocationsByAgent)) {
    log.detail(
      `${agentId}: ${String(stats.count)} calls, ${String(stats.failed)} failed, avg ${formatDuration(Math.round(stats.averageMs))}, max ${formatDuration(stats.maxMs)}`,
    );
  }
  const escalations = Object.entries(metrics.escalationsByReason)
    .map(([reason, n]) => `${reason} x${String(n)}`)
    .join(', ');
  if (escalations) log.detail(`Escalations: ${escalations}`);
}

function writeJSON(outcome: TaskOutcome): void {
  const body =
    outcome.status === 'terminal'
      ? serializeAuditJSON(outcome.record)
      : stableStringify({ state: outcome.state, escalation: outcome.escalation }, 2);
  process.stdout.write(body + '\n');
}

// ── Command registration ─────────────────────────────────────

function addRunOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Path to config file', '.socflow.yaml')
    .option('--json', 'Output JSON to stdout')
    .option('--audit-dir <dir>', 'Directory for audit records')
    .option('--on-escalation <policy>', 'What to do on escalation: hold, proceed or abort');
}

export function registerAnalyzeCommand(program: Command): void {
  addRunOptions(
    program
      .command('analyze')
      .description('Run one task from a JSON or YAML file')
      .argument('<task-file>', 'Task definition file'),
  ).action(async (taskFile: string, opts: RunOptions) => {
    try {
      const config = await loadConfigOrDefaults(opts.config);
      const orchestrator = createOrchestrator(config, opts);

      const taskId = orchestrator.submit(await loadTaskFile(taskFile));
      const outcome = await orchestrator.waitFor(taskId);

      if (opts.json) writeJSON(outcome);
      printOutcome(taskId, outcome);
      process.exitCode = exitCodeFor(outcome);
    } catch (err) {
      fail(err);
    }
  });
}

// ── Run command (config-driven multi-task) ──────────────────

export function registerRunCommand(program: Command): void {
  addRunOptions(
    program.command('run').description('Run every task defined in the config file concurrently'),
  ).action(async (opts: RunOptions) => {
    let config: FileConfig;
    try {
      config = await loadConfigOrDefaults(opts.config);
    } catch (err) {
      fail(err, 'Config error');
      return;
    }

    if (config.tasks.length === 0) {
      process.stderr.write('No tasks defined in config\n');
      process.exitCode = EXIT.ERROR;
      return;
    }

    let orchestrator: Orchestrator;
    try {
      orchestrator = createOrchestrator(config, opts);
    } catch (err) {
      fail(err);
      return;
    }

    log.section(`Running ${String(config.tasks.length)} tasks from ${opts.config}`);
    const results = await Promise.allSettled(
      config.tasks.map(async (input) => {
        const taskId = orchestrator.submit(input);
        return { taskId, outcome: await orchestrator.waitFor(taskId) };
      }),
    );

    let worstExitCode: number = EXIT.DONE;
    for (const [i, result] of results.entries()) {
      if (result.status === 'rejected') {
        const message = result.reason instanceof Error ? result.reason.message : String(result.reason);
        process.stderr.write(`Error [task ${String(i + 1)}]: ${message}\n`);
        worstExitCode = Math.max(worstExitCode, exitCodeOf(result.reason));
        continue;
      }
      const { taskId, outcome } = result.value;
      if (opts.json) writeJSON(outcome);
      printOutcome(taskId, outcome);
      worstExitCode = Math.max(worstExitCode, exitCodeFor(outcome));
    }

    printMetrics(orchestrator.metrics());
    process.exitCode = worstExitCode;
  });
}

// ── Plan command ─────────────────────────────────────────────

export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Print the plan skeleton for a task type')
    .argument('<task-type>', `One of: ${taskTypeSchema.options.join(', ')}`)
    .option('--risk-score <n>', 'Triage risk score (alert_analysis only)')
    .option('--json', 'Output JSON to stdout')
    .action((taskType: string, opts: { riskScore?: string; json?: true }) => {
      try {
        const type = taskTypeSchema.safeParse(taskType);
        if (!type.success) {
          throw new InvalidTaskError(`Unknown task type "${taskType}"`);
        }
        if (type.data === 'alert_analysis' && opts.riskScore === undefined) {
          throw new InvalidTaskError('alert_analysis plans need --risk-score');
        }

        const tier = opts.riskScore !== undefined ? classifyRisk(Number(opts.riskScore)) : undefined;
        const plan = buildPlan(type.data, tier);

        if (opts.json) {
          process.stdout.write(stableStringify(plan, 2) + '\n');
          return;
        }
        const heading = tier !== undefined ? `${type.data} (${tier} risk)` : type.data;
        process.stdout.write([heading, ...describePlan(plan, '  ')].join('\n') + '\n');
      } catch (err) {
        fail(err);
        if (err instanceof RangeError) process.exitCode = EXIT.INVALID;
      }
    });
}

// ── Agents command ───────────────────────────────────────────

export function registerAgentsCommand(program: Command): void {
  program
    .command('agents')
    .description('List the configured capability providers')
    .option('--config <path>', 'Path to config file', '.socflow.yaml')
    .action(async (opts: { config: string }) => {
      try {
        const config = await loadConfigOrDefaults(opts.config);
        for (const agentId of AGENT_IDS) {
          const entry = config.providers[agentId];
          const limits = providerLimits(config, agentId);
          const target = entry.url ?? entry.model ?? config.model ?? '';
          process.stdout.write(
            `${agentId.padEnd(9)} ${entry.kind.padEnd(10)} timeout ${formatDuration(limits.timeoutMs)}, budget ${formatDuration(limits.waitBudgetMs)}${target ? `  ${target}` : ''}\n`,
          );
        }
      } catch (err) {
        fail(err);
      }
    });
}
