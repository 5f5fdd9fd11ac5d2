#!/usr/bin/env node
/**
 * Command line entry point: parses flags, runs one stability window against
 * the target, writes the JSON report and maps the result to an exit code.
 */

import { parseArgs } from 'util';
import dotenv from 'dotenv';
import { CliOptions, CliSettings, mergeWithEnv, resolveCliOptions } from './handlers/config';
import { DockerLogCollector } from './handlers/docker';
import { ConfigurationError, ReportSinkError, errorMessage } from './handlers/errors';
import { closeLogger, configureLogger, log } from './handlers/logger';
import { defaultReportPath, serializeReport, writeReport } from './handlers/report';
import { StabilityMonitor } from './monitor';
import { RunStatistics } from './types/probe';

export const EXIT_CODES = {
  ok: 0,
  thresholdNotMet: 1,
  configurationError: 2,
  reportSinkError: 3,
  unexpected: 4
} as const;

const CLI_OPTIONS = {
  url: { type: 'string' },
  duration: { type: 'string' },
  interval: { type: 'string' },
  timeout: { type: 'string' },
  expected: { type: 'string' },
  'expected-status': { type: 'string' },
  method: { type: 'string' },
  output: { type: 'string', short: 'o' },
  container: { type: 'string' },
  'log-tail': { type: 'string' },
  'log-file': { type: 'string' },
  'min-availability': { type: 'string' },
  help: { type: 'boolean', short: 'h' }
} as const;

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  createMonitor?: (options: CliOptions) => StabilityMonitor;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({ args: argv, options: CLI_OPTIONS, strict: true, allowPositionals: false });
}

function showHelp() {
  log(`
Stability Probe - HTTP availability and latency evidence

Usage:
  stability-probe --url=<url> --duration=<seconds> --interval=<seconds> [options]

Options:
  --url                Target URL (env PROBE_URL)
  --duration           Observation window in seconds (env PROBE_DURATION_SECONDS)
  --interval           Seconds between probes, at most the duration (env PROBE_INTERVAL_SECONDS)
  --timeout            Per-probe timeout in seconds, default min(5, interval) (env PROBE_TIMEOUT_SECONDS)
  --expected           Exact response body marker, e.g. OK (env PROBE_EXPECTED)
  --expected-status    Exact HTTP status to require (env PROBE_EXPECTED_STATUS)
  --method             GET, HEAD or POST, default GET; HEAD takes no --expected (env PROBE_METHOD)
  -o, --output         Report path, "-" for stdout (env PROBE_OUTPUT)
  --container          Container to collect docker logs from (env PROBE_CONTAINER)
  --log-tail           Lines of container logs to keep, default 200 (env PROBE_LOG_TAIL)
  --log-file           Also append log lines to this file (env PROBE_LOG_FILE)
  --min-availability   Exit 1 when availability (%) is below this (env PROBE_MIN_AVAILABILITY)
  -h, --help           Show this help message

Examples:
  stability-probe --url=http://localhost:8000/health --duration=60 --interval=2 --expected=OK
  stability-probe --url=http://localhost:8080/ --duration=300 --interval=5 --container=api --min-availability=99
`);
}

export function meetsThreshold(statistics: RunStatistics, minAvailability: number | null): boolean {
  return minAvailability === null || statistics.availabilityPct >= minAvailability;
}

function defaultMonitor(options: CliOptions): StabilityMonitor {
  return new StabilityMonitor({
    logCollector: options.containerId ? new DockerLogCollector(options.logTail) : undefined
  });
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const { env = process.env, signal, createMonitor = defaultMonitor } = deps;

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    log(errorMessage(error), 'error');
    return EXIT_CODES.configurationError;
  }
  const { values } = parsed;

  if (values.help) {
    showHelp();
    return EXIT_CODES.ok;
  }

  const flags: CliSettings = {
    url: values.url,
    duration: values.duration,
    interval: values.interval,
    timeout: values.timeout,
    expected: values.expected,
    expectedStatus: values['expected-status'],
    method: values.method,
    output: values.output,
    container: values.container,
    logTail: values['log-tail'],
    logFile: values['log-file'],
    minAvailability: values['min-availability']
  };

  let options: CliOptions;
  try {
    options = resolveCliOptions(mergeWithEnv(flags, env));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log(error.message, 'error');
      log('Run with --help for usage. No probes were sent.', 'error');
      return EXIT_CODES.configurationError;
    }
    throw error;
  }

  configureLogger({ filePath: options.logFile, stdout: options.output !== '-' });
  try {
    return await runAndReport(options, createMonitor(options), signal);
  } finally {
    await closeLogger();
  }
}

async function runAndReport(options: CliOptions, monitor: StabilityMonitor, signal?: AbortSignal): Promise<number> {
  const report = await monitor.run(options.config, { signal, containerId: options.containerId });

  const destination = options.output ?? defaultReportPath(report.generatedAt);
  try {
    const writtenTo = await writeReport(report, destination);
    log(`Report written to ${writtenTo}`, 'info');
  } catch (error) {
    if (error instanceof ReportSinkError) {
      log(error.message, 'error');
      log('Printing the report to stdout instead', 'warn');
      process.stdout.write(`${serializeReport(report)}\n`);
      return EXIT_CODES.reportSinkError;
    }
    throw error;
  }

  if (!meetsThreshold(report.statistics, options.minAvailability)) {
    log(
      `Availability ${report.statistics.availabilityPct.toFixed(2)}% is below the required ${options.minAvailability}%`,
      'error'
    );
    return EXIT_CODES.thresholdNotMet;
  }

  return EXIT_CODES.ok;
}

async function main() {
  dotenv.config();

  const controller = new AbortController();
  const stop = (signalName: NodeJS.Signals) => {
    log(`Received ${signalName}, finishing with the probes collected so far`, 'warn');
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
  } finally {
    process.removeListener('SIGINT', stop);
    process.removeListener('SIGTERM', stop);
  }
}

if (require.main === module) {
  main().catch(error => {
    log(`Unexpected error: ${errorMessage(error)}`, 'error');
    process.exit(EXIT_CODES.unexpected);
  });
}
