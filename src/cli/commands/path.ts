/**
 * `decision-copilot path <scenario> <from> <to>`: bounded reachability
 * over outgoing edges.
 */

import { Command } from 'commander';
import { DecisionError } from '../../core/errors.js';
import { loadScenario } from '../../scenario/loader.js';
import { parseCount } from '../shared.js';

export function createPathCommand(): Command {
  const cmd = new Command('path');

  cmd
    .description('Check whether one node reaches another within a hop limit')
    .argument('<scenario>', 'Scenario file (.yaml, .yml or .json)')
    .argument('<from>', 'Source node id')
    .argument('<to>', 'Target node id')
    .option('-n, --max-hops <count>', 'Hop limit', parseCount, 3)
    .action((scenarioPath: string, from: string, to: string, options: { maxHops: number }) => {
      const { graph } = loadScenario(scenarioPath);
      for (const id of [from, to]) {
        if (!graph.hasNode(id)) {
          throw new DecisionError(`Unknown node: ${id}`, 'UNKNOWN_NODE', 'run');
        }
      }

      const hops = graph.hopsBetween(from, to, options.maxHops);
      if (hops === null) {
        console.log(`${from} does not reach ${to} within ${options.maxHops} hop(s)`);
      } else {
        console.log(`${from} reaches ${to} in ${hops} hop(s)`);
      }
    });

  return cmd;
}
