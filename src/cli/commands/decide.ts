/**
 * `decision-copilot decide <scenario>`: run the engine over a scenario
 * and print one decision record per subject.
 */

import { Command, Option } from 'commander';
import { resolve } from 'node:path';
import { ConfigManager } from '../../core/config.js';
import type { AppConfigOverrides } from '../../core/types.js';
import { buildActionPlan, type ActionPlan } from '../../engine/action-plan.js';
import { DecisionEngine } from '../../engine/decision-engine.js';
import type { AggregatorConfig, DecisionRecord, RunSummary } from '../../engine/types.js';
import { loadScenario } from '../../scenario/loader.js';
import { CollectingSink, NdjsonSink, type ActionSink } from '../../sink/action-sink.js';
import { formatScore, initLogging, parseCount, parseScore, type GlobalOptions } from '../shared.js';

type OutputFormat = 'text' | 'json' | 'ndjson';

interface DecideOptions {
  topK?: number;
  minScore?: number;
  parallel?: number;
  subject?: string[];
  format: OutputFormat;
  plan?: boolean;
}

export function createDecideCommand(): Command {
  const cmd = new Command('decide');

  cmd
    .description('Evaluate every subject of a scenario and print ranked decisions')
    .argument('<scenario>', 'Scenario file (.yaml, .yml or .json)')
    .option('-k, --top-k <count>', 'Keep at most this many actions per subject', parseCount)
    .option('-m, --min-score <score>', 'Drop actions scoring below this', parseScore)
    .option('-p, --parallel <count>', 'Subjects evaluated at once', parseCount)
    .option('-s, --subject <ids...>', 'Only decide for these subjects')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['text', 'json', 'ndjson']).default('text'))
    .option('--plan', 'Attach the action plan report to each record')
    .action(async (scenarioPath: string, options: DecideOptions, command: Command) => {
      await decide(scenarioPath, options, command.optsWithGlobals<GlobalOptions>());
    });

  return cmd;
}

async function decide(scenarioPath: string, options: DecideOptions, globals: GlobalOptions): Promise<void> {
  const overrides: AppConfigOverrides = {};
  if (options.parallel !== undefined) overrides.run = { maxParallel: options.parallel };
  const config = new ConfigManager(resolve(globals.dir)).load(overrides);
  initLogging(config, globals.verbose);

  const scenario = loadScenario(scenarioPath);

  // Config files and env give defaults, the scenario refines them, flags win.
  const aggregation: Partial<AggregatorConfig> = { ...config.engine, ...scenario.aggregation };
  if (options.topK !== undefined) aggregation.topK = options.topK;
  if (options.minScore !== undefined) aggregation.minScore = options.minScore;

  const engine = new DecisionEngine(scenario.graph, scenario.rules, {
    aggregation,
    maxParallel: config.run.maxParallel,
    subjectTimeoutMs: config.run.subjectTimeoutMs,
  });

  const collector = new CollectingSink();
  const sink: ActionSink = options.format === 'ndjson' && !options.plan
    ? new NdjsonSink(process.stdout)
    : collector;

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);
  const stopWarnings = engine.events.on('subject:timeout', ({ subjectId, timeoutMs }) => {
    console.error(`  ! ${subjectId} timed out after ${timeoutMs}ms; record discarded`);
  });

  let summary: RunSummary;
  try {
    summary = await engine.run(scenario.store, sink, {
      signal: controller.signal,
      subjectIds: options.subject,
    });
  } finally {
    process.off('SIGINT', onInterrupt);
    stopWarnings();
  }

  const records = collector.sorted();
  const plans = options.plan ? records.map(record => buildActionPlan(record, scenario.graph)) : [];

  switch (options.format) {
    case 'json':
      console.log(JSON.stringify({ summary, records: options.plan ? plans : records }, null, 2));
      break;
    case 'ndjson':
      for (const plan of plans) {
        console.log(JSON.stringify(plan));
      }
      break;
    case 'text':
      printText(records, plans, summary);
      break;
  }

  if (summary.cancelled) {
    process.exitCode = 130;
  }
}

function printText(records: readonly DecisionRecord[], plans: readonly ActionPlan[], summary: RunSummary): void {
  console.log();
  for (const record of records) {
    console.log(`  ${record.subjectId}`);
    if (record.actions.length === 0) {
      console.log('    (no actions)');
    }
    for (const action of record.actions) {
      console.log(`    ${formatScore(action.score)}  ${action.actionId.padEnd(22)} ${action.rationale}`);
    }

    const plan = plans.find(p => p.subjectId === record.subjectId);
    if (plan) {
      const { summary: s } = plan;
      console.log(
        `    plan: ${s.totalActions} action(s), ${s.byUrgency.immediate} immediate, ` +
        `${s.byUrgency.critical} critical, ${s.budgetItems} budget item(s), ${s.approvalsRequired} approval(s)`,
      );
    }
    console.log();
  }

  const state = summary.cancelled ? 'cancelled' : 'complete';
  console.log(
    `  Run ${summary.runId} ${state}: ${summary.emitted}/${summary.subjects} emitted, ` +
    `${summary.discarded} discarded, ${summary.timedOut} timed out (${summary.durationMs}ms)`,
  );
  console.log();
}
