/**
 * Bench command - time building and merging many hit lists
 *
 * @module commands/bench
 */

import { Command } from 'commander';
import { runMergeBenchmark } from '../../services/benchmark.js';
import { OutputFormatter, OutputFormat } from '../utils/output.js';
import { createRuntime, parseNumberOption } from '../utils/runtime.js';

interface BenchCommandOptions {
  hits: string;
  lists: string;
  seed: string;
}

export function createBenchCommand(): Command {
  return new Command('bench')
    .description('Benchmark sorting and merging of simulated hit lists')
    .option('-N, --hits <n>', 'Hits per list', '10000')
    .option('-M, --lists <n>', 'Number of lists to merge', '10')
    .option('-s, --seed <n>', 'Random seed for sort keys', '42')
    .action((options: BenchCommandOptions, command: Command) => {
      const json = command.optsWithGlobals<{ json?: boolean }>().json === true;
      const output = new OutputFormatter(json ? OutputFormat.JSON : OutputFormat.HUMAN);
      try {
        executeBench(options, output);
      } catch (error) {
        output.error('Benchmark failed', error);
        process.exit(1);
      }
    });
}

function executeBench(options: BenchCommandOptions, output: OutputFormatter): void {
  const runtime = createRuntime({ json: output.isJson() });
  if (runtime.isErr()) {
    throw runtime.error;
  }

  const hitsPerList = parseNumberOption('-N', options.hits) ?? 10000;
  const lists = parseNumberOption('-M', options.lists) ?? 10;
  if (!Number.isInteger(hitsPerList) || hitsPerList < 0 || !Number.isInteger(lists) || lists < 1) {
    throw new Error('-N must be a non-negative integer and -M a positive integer');
  }

  const result = runMergeBenchmark({
    lists,
    hitsPerList,
    seed: parseNumberOption('-s', options.seed) ?? 42,
    listOptions: runtime.value.listOptions,
  });
  if (result.isErr()) {
    throw result.error;
  }

  const { buildMs, mergeMs, ...rest } = result.value;
  output.success('Benchmark complete', {
    ...rest,
    buildMs: buildMs.toFixed(1),
    mergeMs: mergeMs.toFixed(1),
  });
  if (!result.value.ordered) {
    output.warning('Merged list is not in descending sort-key order');
    process.exitCode = 1;
  }
}
