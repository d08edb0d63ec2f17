/**
 * `decision-copilot validate <scenario>`: load a scenario and report
 * what it contains. Any load-time error fails the command.
 */

import { Command } from 'commander';
import { loadScenario } from '../../scenario/loader.js';

export function createValidateCommand(): Command {
  const cmd = new Command('validate');

  cmd
    .description('Validate a scenario and print graph and rule statistics')
    .argument('<scenario>', 'Scenario file (.yaml, .yml or .json)')
    .option('--json', 'Output as JSON')
    .action((scenarioPath: string, options: { json?: boolean }) => {
      validate(scenarioPath, options);
    });

  return cmd;
}

function validate(scenarioPath: string, options: { json?: boolean }): void {
  const scenario = loadScenario(scenarioPath);
  const stats = scenario.graph.getStats();
  const rules = scenario.rules.ids();

  if (options.json) {
    console.log(JSON.stringify({
      source: scenario.source,
      graph: stats,
      rules,
      subjects: scenario.store.size,
    }, null, 2));
    return;
  }

  console.log();
  console.log(`  ${scenario.source} is valid`);
  console.log('  ' + '─'.repeat(30));
  console.log(`  Nodes: ${stats.totalNodes}`);
  for (const [type, count] of Object.entries(stats.nodeTypes)) {
    console.log(`    ${type}: ${count}`);
  }
  console.log(`  Edges: ${stats.totalEdges}`);
  for (const [relation, count] of Object.entries(stats.relations)) {
    console.log(`    ${relation}: ${count}`);
  }
  console.log(`  Rules (evaluation order): ${rules.join(', ')}`);
  console.log(`  Feature vectors: ${scenario.store.size}`);
  console.log();
}
