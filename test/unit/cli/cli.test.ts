import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { fileURLToPath } from 'node:url';
import { createCLI } from '../../../src/cli/index.js';

const WORKFORCE = fileURLToPath(new URL('../../../scenarios/workforce.yaml', import.meta.url));

describe('CLI', () => {
  let output: string[];

  beforeEach(() => {
    output = [];
    vi.spyOn(console, 'log').mockImplementation((message?: unknown) => {
      output.push(String(message ?? ''));
    });
    vi.stubEnv('DECISION_LOG_LEVEL', 'silent');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  async function run(...args: string[]): Promise<void> {
    const program = createCLI();
    program.exitOverride();
    for (const command of program.commands) {
      command.exitOverride();
    }
    await program.parseAsync(['node', 'decision-copilot', ...args]);
  }

  describe('path', () => {
    it('should report the hop count', async () => {
      await run('path', WORKFORCE, 'E1', 'graph_databases', '--max-hops', '1');
      expect(output).toEqual(['E1 reaches graph_databases in 1 hop(s)']);
    });

    it('should report an unreachable target', async () => {
      await run('path', WORKFORCE, 'E2', 'training_program', '-n', '2');
      expect(output).toEqual(['E2 does not reach training_program within 2 hop(s)']);
    });

    it('should fail on unknown nodes', async () => {
      await expect(run('path', WORKFORCE, 'E1', 'nobody')).rejects.toThrow('Unknown node: nobody');
    });
  });

  describe('validate', () => {
    it('should print scenario statistics as JSON', async () => {
      await run('validate', WORKFORCE, '--json');
      const report: unknown = JSON.parse(output.join('\n'));
      expect(report).toMatchObject({
        source: WORKFORCE,
        graph: { totalNodes: 20, totalEdges: 16, frozen: true },
        subjects: 5,
      });
    });
  });

  describe('decide', () => {
    it('should print records as JSON', async () => {
      await run('decide', WORKFORCE, '--format', 'json', '--subject', 'E4');
      const result: unknown = JSON.parse(output.join('\n'));
      expect(result).toMatchObject({
        summary: { subjects: 1, emitted: 1, cancelled: false },
        records: [{
          subjectId: 'E4',
          actions: [
            { actionId: 'mentorship', score: 0.6 },
            { actionId: 'one_on_one_meeting', score: 0.5 },
          ],
        }],
      });
    });

    it('should let flags override the scenario settings', async () => {
      await run('decide', WORKFORCE, '-f', 'json', '-s', 'E2', '--top-k', '1');
      const result: unknown = JSON.parse(output.join('\n'));
      expect(result).toMatchObject({
        records: [{ subjectId: 'E2', actions: [{ actionId: 'one_on_one_meeting' }] }],
      });
    });

    it('should attach action plans on request', async () => {
      await run('decide', WORKFORCE, '-f', 'json', '-s', 'E5', '--plan');
      const result: unknown = JSON.parse(output.join('\n'));
      expect(result).toMatchObject({
        records: [{
          subjectId: 'E5',
          summary: { totalActions: 2, budgetItems: 1, approvalsRequired: 1 },
        }],
      });
    });

    it('should reject a negative top-k', async () => {
      await expect(run('decide', WORKFORCE, '--top-k', '-1')).rejects.toThrow();
    });
  });
});
