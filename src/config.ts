import { DEFAULT_SOCKET_PATH } from './docker/container.js';
import { ConfigurationError } from './errors.js';
import type { Topology } from './types.js';
import { generateRunId, validateRunId } from './utils/run-id.js';
import {
  DEFAULT_TOPOLOGY_FILE,
  MAX_TIMEOUT_MS,
} from './utils/topology-file.js';

export interface CliOptions {
  file?: string;
  socket?: string;
  runId?: string;
  concurrency?: string;
  testTimeout?: string;
  buildTimeout?: string;
}

export interface ResolvedConfig {
  topologyFile: string;
  socketPath: string;
  runId?: string;
}

const ENV_VARS = {
  topologyFile: 'STACKRUN_TOPOLOGY',
  socketPath: 'DOCKER_SOCKET_PATH',
  runId: 'STACKRUN_RUN_ID',
} as const;

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Flags win over environment variables, which win over defaults.
 */
export function resolveConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  const config: ResolvedConfig = {
    topologyFile:
      nonEmpty(options.file) ??
      nonEmpty(env[ENV_VARS.topologyFile]) ??
      DEFAULT_TOPOLOGY_FILE,
    socketPath:
      nonEmpty(options.socket) ??
      nonEmpty(env[ENV_VARS.socketPath]) ??
      DEFAULT_SOCKET_PATH,
  };

  const runId = nonEmpty(options.runId) ?? nonEmpty(env[ENV_VARS.runId]);
  if (runId !== undefined) {
    config.runId = validateRunId(runId);
  }
  return config;
}

export function resolveRunId(
  config: ResolvedConfig,
  topology: Topology,
): string {
  return config.runId ?? generateRunId(topology.project);
}

function parsePositiveInteger(
  value: string,
  option: string,
  max: number = Number.MAX_SAFE_INTEGER,
): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(
      `Invalid ${option}: "${value}" (expected a positive integer)`,
      option,
    );
  }
  if (parsed > max) {
    throw new ConfigurationError(
      `Invalid ${option}: "${value}" (must be at most ${max})`,
      option,
    );
  }
  return parsed;
}

/**
 * Apply command-line overrides on top of the values read from the
 * topology file.
 */
export function applyOverrides(
  topology: Topology,
  options: CliOptions,
): Topology {
  const timeouts = { ...topology.timeouts };
  if (options.testTimeout !== undefined) {
    timeouts.testMs = parsePositiveInteger(
      options.testTimeout,
      '--test-timeout',
      MAX_TIMEOUT_MS,
    );
  }
  if (options.buildTimeout !== undefined) {
    timeouts.buildMs = parsePositiveInteger(
      options.buildTimeout,
      '--build-timeout',
      MAX_TIMEOUT_MS,
    );
  }

  return {
    ...topology,
    timeouts,
    concurrency:
      options.concurrency !== undefined
        ? parsePositiveInteger(options.concurrency, '--concurrency')
        : topology.concurrency,
  };
}
