import { ConfigurationError } from './errors';
import { HttpMethod, RunConfig } from '../types/probe';

export const DEFAULT_TIMEOUT_SECONDS = 5;
export const DEFAULT_LOG_TAIL = 200;

const METHODS: readonly HttpMethod[] = ['GET', 'HEAD', 'POST'];

const SETTING_KEYS = [
  'url',
  'duration',
  'interval',
  'timeout',
  'expected',
  'expectedStatus',
  'method',
  'output',
  'container',
  'logTail',
  'logFile',
  'minAvailability'
] as const;

type SettingKey = (typeof SETTING_KEYS)[number];

/**
 * Raw settings as they arrive from flags or the environment. Every field is
 * optional here; `resolveRunConfig` decides what is required.
 */
export type CliSettings = Partial<Record<SettingKey, string>>;

export type RawRunSettings = Pick<
  CliSettings,
  'url' | 'duration' | 'interval' | 'timeout' | 'expected' | 'expectedStatus' | 'method'
>;

export interface CliOptions {
  config: Readonly<RunConfig>;
  output: string | null;
  containerId: string | null;
  logTail: number;
  logFile: string | null;
  minAvailability: number | null;
}

const ENV_KEYS: Record<SettingKey, string> = {
  url: 'PROBE_URL',
  duration: 'PROBE_DURATION_SECONDS',
  interval: 'PROBE_INTERVAL_SECONDS',
  timeout: 'PROBE_TIMEOUT_SECONDS',
  expected: 'PROBE_EXPECTED',
  expectedStatus: 'PROBE_EXPECTED_STATUS',
  method: 'PROBE_METHOD',
  output: 'PROBE_OUTPUT',
  container: 'PROBE_CONTAINER',
  logTail: 'PROBE_LOG_TAIL',
  logFile: 'PROBE_LOG_FILE',
  minAvailability: 'PROBE_MIN_AVAILABILITY'
};

function parseNumber(setting: string, raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigurationError(setting, `"${raw}" is not a number`);
  }
  return value;
}

function requirePositive(setting: string, raw: string | undefined): number {
  if (raw === undefined) {
    throw new ConfigurationError(setting, 'a value is required');
  }
  const value = parseNumber(setting, raw);
  if (value <= 0) {
    throw new ConfigurationError(setting, `must be greater than 0, got ${value}`);
  }
  return value;
}

function isHttpMethod(value: string): value is HttpMethod {
  return METHODS.some((method) => method === value);
}

/**
 * Checks an already-typed config. The scheduler calls this too, for configs
 * built in code rather than parsed from flags.
 */
export function validateRunConfig(config: RunConfig): Readonly<RunConfig> {
  let url: URL;
  try {
    url = new URL(config.url);
  } catch {
    throw new ConfigurationError('url', `"${config.url}" is not a valid URL`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError('url', `unsupported protocol ${url.protocol}`);
  }

  if (!Number.isFinite(config.durationSeconds) || config.durationSeconds <= 0) {
    throw new ConfigurationError('duration', `must be greater than 0, got ${config.durationSeconds}`);
  }
  if (!Number.isFinite(config.intervalSeconds) || config.intervalSeconds <= 0) {
    throw new ConfigurationError('interval', `must be greater than 0, got ${config.intervalSeconds}`);
  }
  if (config.intervalSeconds > config.durationSeconds) {
    throw new ConfigurationError(
      'interval',
      `must not exceed the duration (${config.intervalSeconds}s > ${config.durationSeconds}s)`
    );
  }
  if (!Number.isFinite(config.timeoutSeconds) || config.timeoutSeconds <= 0) {
    throw new ConfigurationError('timeout', `must be greater than 0, got ${config.timeoutSeconds}`);
  }
  if (!isHttpMethod(config.method)) {
    throw new ConfigurationError('method', `expected one of ${METHODS.join(', ')}`);
  }
  if (config.method === 'HEAD' && config.expected !== null) {
    throw new ConfigurationError('expected', 'a HEAD response has no body to match; use GET or POST');
  }
  if (
    config.expectedStatus !== null &&
    (!Number.isInteger(config.expectedStatus) || config.expectedStatus < 100 || config.expectedStatus > 599)
  ) {
    throw new ConfigurationError('expected-status', `must be an HTTP status code, got ${config.expectedStatus}`);
  }

  return Object.freeze({ ...config });
}

export function resolveRunConfig(settings: RawRunSettings): Readonly<RunConfig> {
  if (!settings.url) {
    throw new ConfigurationError('url', 'a value is required');
  }

  const durationSeconds = requirePositive('duration', settings.duration);
  const intervalSeconds = requirePositive('interval', settings.interval);
  const timeoutSeconds =
    settings.timeout !== undefined
      ? requirePositive('timeout', settings.timeout)
      : Math.min(DEFAULT_TIMEOUT_SECONDS, intervalSeconds);

  const method = (settings.method ?? 'GET').toUpperCase();
  if (!isHttpMethod(method)) {
    throw new ConfigurationError('method', `expected one of ${METHODS.join(', ')}, got "${settings.method}"`);
  }

  return validateRunConfig({
    url: settings.url,
    durationSeconds,
    intervalSeconds,
    timeoutSeconds,
    method,
    expected: settings.expected !== undefined && settings.expected !== '' ? settings.expected : null,
    expectedStatus:
      settings.expectedStatus !== undefined ? parseNumber('expected-status', settings.expectedStatus) : null
  });
}

/**
 * Flags win over environment variables. Empty environment values count as unset.
 */
export function mergeWithEnv(flags: CliSettings, env: NodeJS.ProcessEnv = process.env): CliSettings {
  const merged: CliSettings = {};
  for (const key of SETTING_KEYS) {
    const envValue = env[ENV_KEYS[key]];
    const value = flags[key] ?? (envValue !== undefined && envValue !== '' ? envValue : undefined);
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

export function resolveCliOptions(settings: CliSettings): CliOptions {
  const config = resolveRunConfig(settings);

  let logTail = DEFAULT_LOG_TAIL;
  if (settings.logTail !== undefined) {
    logTail = parseNumber('log-tail', settings.logTail);
    if (!Number.isInteger(logTail) || logTail <= 0) {
      throw new ConfigurationError('log-tail', `must be a positive integer, got ${settings.logTail}`);
    }
  }

  let minAvailability: number | null = null;
  if (settings.minAvailability !== undefined) {
    minAvailability = parseNumber('min-availability', settings.minAvailability);
    if (minAvailability < 0 || minAvailability > 100) {
      throw new ConfigurationError('min-availability', `must be between 0 and 100, got ${minAvailability}`);
    }
  }

  return {
    config,
    output: settings.output ?? null,
    containerId: settings.container ?? null,
    logTail,
    logFile: settings.logFile ?? null,
    minAvailability
  };
}
