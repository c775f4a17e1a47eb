#!/usr/bin/env node
/**
 * qcgeom - coordinate extraction from Gaussian and MOLPRO files
 * Command line entry point
 */

import { parseArgs } from 'util';
import { exitCodeFor, extractBatch } from './io/batchRunner';
import { OutputFormat, renderFailure, renderReport } from './renderers';
import { createLogger } from './utils/logger';

const USAGE = `Usage: qcgeom [options] <files...>

Extract molecular coordinates from quantum chemistry files.

Supported file types:
  Gaussian: .com (input), .log (output)
  MOLPRO:   .in (input), .out (output)

Options:
  -f, --format <table|csv>  Output format (default: table)
  -c, --compact             Show only the summary line
  -d, --debug               Print debug output to stderr
  -h, --help                Show this help`;

export interface CliStreams {
  out(line: string): void;
  err(line: string): void;
}

interface CliOptions {
  files: string[];
  format: string;
  compact: boolean;
  debug: boolean;
  help: boolean;
}

const consoleStreams: CliStreams = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      format: { type: 'string', short: 'f', default: 'table' },
      compact: { type: 'boolean', short: 'c', default: false },
      debug: { type: 'boolean', short: 'd', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
  });
  return {
    files: positionals,
    format: values.format ?? 'table',
    compact: values.compact ?? false,
    debug: values.debug ?? false,
    help: values.help ?? false,
  };
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'table' || value === 'csv';
}

/**
 * Run the CLI and return the exit code:
 * 0 when at least one file was extracted, 1 when none was, 2 on bad options or internal errors.
 */
export function run(argv: string[], streams: CliStreams = consoleStreams): number {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    streams.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    streams.err(USAGE);
    return 2;
  }

  if (options.help) {
    streams.out(USAGE);
    return 0;
  }
  const format = options.format;
  if (!isOutputFormat(format)) {
    streams.err(`Error: unknown output format "${format}" (expected table or csv)`);
    return 2;
  }
  if (options.files.length === 0) {
    streams.err('Error: no input files given');
    streams.err(USAGE);
    return 1;
  }

  const logger = createLogger({ debug: options.debug, sink: streams.err });
  const paths = [...new Set(options.files)].sort();

  try {
    logger.debug(`Processing ${paths.length} file(s)`);
    const report = extractBatch(paths, { logger });

    for (const failure of report.failures) {
      logger.error(renderFailure(failure));
    }
    streams.out('');
    for (const line of renderReport(report, { format, compact: options.compact })) {
      streams.out(line);
    }
    if (report.status === 'failure') {
      logger.error(`Error: no coordinates extracted from: ${paths.join(', ')}`);
    }
    return exitCodeFor(report);
  } catch (error) {
    streams.err(`An unexpected error occurred: ${error instanceof Error ? error.message : String(error)}`);
    if (options.debug && error instanceof Error && error.stack) {
      streams.err(error.stack);
    }
    return 2;
  }
}

if (require.main === module) {
  process.exitCode = run(process.argv.slice(2));
}
