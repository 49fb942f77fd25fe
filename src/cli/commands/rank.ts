/**
 * Rank command - merge per-worker hit lists and report the significant hits
 *
 * @module commands/rank
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadAndMerge } from '../../services/hit-list-loader.js';
import { ReportingThresholds } from '../../services/reporting-thresholds.js';
import { formatDomains, formatTargets, summarizeReported } from '../../services/report-formatter.js';
import { OutputFormatter, OutputFormat } from '../utils/output.js';
import { createRuntime, parseNumberOption } from '../utils/runtime.js';

interface RankCommandOptions {
  targetE?: string;
  targetT?: string;
  domE?: string;
  domT?: string;
  searchSpace?: string;
  domZ?: string;
  domains?: boolean;
  textw?: string;
  models?: boolean;
}

export function createRankCommand(): Command {
  return new Command('rank')
    .description('Merge hit-list files from search workers, rank and threshold them')
    .argument('<files...>', 'Hit-list JSON files, one per worker')
    .option('-E, --target-e <x>', 'Report targets with E-value <= x', '10')
    .option('-T, --target-t <x>', 'Report targets with score >= x (overrides -E)')
    .option('--dom-e <x>', 'Report domains with conditional E-value <= x', '10')
    .option('--dom-t <x>', 'Report domains with bit score >= x (overrides --dom-e)')
    .option('-Z, --search-space <x>', 'Number of targets searched (default: number of hits loaded)')
    .option('--dom-z <x>', 'Domain search-space size (default: number of reported targets)')
    .option('--domains', 'Print per-target domain tables')
    .option('--textw <n>', 'Maximum line width for descriptions (0 = unlimited)', '120')
    .option('--models', 'Targets are models rather than sequences')
    .action((files: string[], options: RankCommandOptions, command: Command) => {
      const json = command.optsWithGlobals<{ json?: boolean }>().json === true;
      const output = new OutputFormatter(json ? OutputFormat.JSON : OutputFormat.HUMAN);
      try {
        executeRank(files, options, output);
      } catch (error) {
        output.error('Rank failed', error);
        process.exit(1);
      }
    });
}

function executeRank(files: string[], options: RankCommandOptions, output: OutputFormatter): void {
  const runtime = createRuntime({ json: output.isJson() });
  if (runtime.isErr()) {
    throw runtime.error;
  }

  const loaded = loadAndMerge(files, runtime.value.listOptions);
  if (loaded.isErr()) {
    throw loaded.error;
  }

  const hits = loaded.value;
  hits.sort();

  const domZ = parseNumberOption('--dom-z', options.domZ);
  const thresholds = ReportingThresholds.fromConfig({
    targetE: parseNumberOption('-E', options.targetE),
    targetT: parseNumberOption('-T', options.targetT),
    domainE: parseNumberOption('--dom-e', options.domE),
    domainT: parseNumberOption('--dom-t', options.domT),
    Z: parseNumberOption('-Z', options.searchSpace) ?? Math.max(1, hits.size),
    domZ,
    domZSetBy: domZ === undefined ? 'ntargets' : 'option',
  });
  if (thresholds.isErr()) {
    hits.destroy();
    throw thresholds.error;
  }

  const summary = hits.threshold(thresholds.value);
  runtime.value.logger.info('Thresholded merged hit list', {
    files: files.length,
    hits: hits.size,
    reportedTargets: summary.targets,
    reportedDomains: summary.domains,
  });

  if (output.getFormat() === OutputFormat.JSON) {
    output.json({
      files,
      hits: hits.size,
      Z: thresholds.value.Z,
      domZ: thresholds.value.domZ,
      reported: summary,
      targets: summarizeReported(hits, thresholds.value),
    });
  } else {
    const reportOptions = {
      textWidth: parseNumberOption('--textw', options.textw) ?? 0,
      mode: options.models ? ('models' as const) : ('sequences' as const),
    };
    console.log(chalk.gray(`Merged ${hits.size} hits from ${files.length} file(s)\n`));
    output.lines(formatTargets(hits, thresholds.value, reportOptions));
    if (options.domains) {
      console.log();
      output.lines(formatDomains(hits, thresholds.value, reportOptions));
    }
  }

  hits.destroy();
}
