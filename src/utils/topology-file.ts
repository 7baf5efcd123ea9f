import * as fs from 'fs';
import * as path from 'path';
import type {
  MountConfig,
  ReadinessProbe,
  ServiceSpec,
  TestRunnerSpec,
  Timeouts,
  Topology,
} from '../types.js';
import { TopologyError } from '../errors.js';
import { dependencyLevels } from './dependency-graph.js';

export const DEFAULT_TOPOLOGY_FILE = 'itest.topology.json';

const SERVICE_NAME_PATTERN = /^[a-z0-9][a-z0-9_.-]*$/;
const HOSTNAME_PATTERN = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?$/;
const DEFAULT_READINESS_TIMEOUT_MS = 60_000;
const DEFAULT_READINESS_INTERVAL_MS = 1_000;
const DEFAULT_STOP_SECONDS = 10;
// Largest delay Node's timers take; anything above fires at once.
export const MAX_TIMEOUT_MS = 2_147_483_647;

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, field: string): JsonObject {
  if (!isObject(value)) {
    throw new TopologyError('must be an object', field);
  }
  return value;
}

function expectString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new TopologyError('must be a non-empty string', field);
  }
  return value;
}

function optionalString(value: unknown, field: string): string | undefined {
  return value === undefined ? undefined : expectString(value, field);
}

function expectStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) {
    throw new TopologyError('must be an array of strings', field);
  }
  return value.map((item, i) => expectString(item, `${field}[${i}]`));
}

function optionalStringArray(
  value: unknown,
  field: string,
): string[] | undefined {
  return value === undefined ? undefined : expectStringArray(value, field);
}

function expectStringMap(value: unknown, field: string): Record<string, string> {
  if (value === undefined) {
    return {};
  }
  const obj = expectObject(value, field);
  const result: Record<string, string> = {};
  for (const [key, item] of Object.entries(obj)) {
    if (typeof item !== 'string') {
      throw new TopologyError('must be a string', `${field}.${key}`);
    }
    result[key] = item;
  }
  return result;
}

function optionalPositiveNumber(
  value: unknown,
  field: string,
): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new TopologyError('must be a positive number', field);
  }
  return value;
}

function optionalTimeoutMs(value: unknown, field: string): number | undefined {
  const ms = optionalPositiveNumber(value, field);
  if (ms !== undefined && ms > MAX_TIMEOUT_MS) {
    throw new TopologyError(`must be at most ${MAX_TIMEOUT_MS}`, field);
  }
  return ms;
}

function optionalPositiveInteger(
  value: unknown,
  field: string,
): number | undefined {
  const parsed = optionalPositiveNumber(value, field);
  if (parsed !== undefined && !Number.isInteger(parsed)) {
    throw new TopologyError('must be a positive integer', field);
  }
  return parsed;
}

function parseMounts(
  value: unknown,
  field: string,
  baseDir: string,
): MountConfig[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new TopologyError('must be an array', field);
  }
  return value.map((item, i) => {
    const obj = expectObject(item, `${field}[${i}]`);
    const hostPath = expectString(obj.hostPath, `${field}[${i}].hostPath`);
    const mount: MountConfig = {
      hostPath: path.resolve(baseDir, hostPath),
      containerPath: expectString(
        obj.containerPath,
        `${field}[${i}].containerPath`,
      ),
    };
    if (obj.readOnly !== undefined) {
      if (typeof obj.readOnly !== 'boolean') {
        throw new TopologyError('must be a boolean', `${field}[${i}].readOnly`);
      }
      mount.readOnly = obj.readOnly;
    }
    return mount;
  });
}

function parseReadiness(
  value: unknown,
  field: string,
  defaultTimeoutMs: number,
): ReadinessProbe | undefined {
  if (value === undefined) {
    return undefined;
  }
  const obj = expectObject(value, field);
  const intervalMs =
    optionalTimeoutMs(obj.intervalMs, `${field}.intervalMs`) ??
    DEFAULT_READINESS_INTERVAL_MS;
  const timeoutMs =
    optionalTimeoutMs(obj.timeoutMs, `${field}.timeoutMs`) ??
    defaultTimeoutMs;

  if (obj.type === 'exec') {
    const command = expectStringArray(obj.command, `${field}.command`);
    if (command.length === 0) {
      throw new TopologyError('must not be empty', `${field}.command`);
    }
    return { type: 'exec', command, intervalMs, timeoutMs };
  }
  if (obj.type === 'healthcheck') {
    return { type: 'healthcheck', intervalMs, timeoutMs };
  }
  throw new TopologyError(
    `Invalid readiness type: "${String(obj.type)}". Must be "exec" or "healthcheck"`,
    `${field}.type`,
  );
}

function parseService(
  value: unknown,
  field: string,
  baseDir: string,
  readinessTimeoutMs: number,
): ServiceSpec {
  const obj = expectObject(value, field);
  const name = expectString(obj.name, `${field}.name`);
  if (!SERVICE_NAME_PATTERN.test(name)) {
    throw new TopologyError(
      `Invalid service name "${name}": use lowercase letters, digits, "_", "." or "-"`,
      `${field}.name`,
    );
  }

  const links = expectStringMap(obj.links, `${field}.links`);
  for (const alias of Object.values(links)) {
    if (!HOSTNAME_PATTERN.test(alias)) {
      throw new TopologyError(
        `Invalid link alias "${alias}"`,
        `${field}.links`,
      );
    }
  }

  const spec: ServiceSpec = {
    name,
    image: expectString(obj.image, `${field}.image`),
    dependsOn: optionalStringArray(obj.dependsOn, `${field}.dependsOn`) ?? [],
    links,
    env: expectStringMap(obj.env, `${field}.env`),
    mounts: parseMounts(obj.mounts, `${field}.mounts`, baseDir),
  };

  const context = optionalString(obj.context, `${field}.context`);
  if (context !== undefined) {
    spec.context = path.resolve(baseDir, context);
  }
  const dockerfile = optionalString(obj.dockerfile, `${field}.dockerfile`);
  if (dockerfile !== undefined) {
    if (context === undefined) {
      throw new TopologyError(
        'requires a build context',
        `${field}.dockerfile`,
      );
    }
    spec.dockerfile = dockerfile;
  }
  const command = optionalStringArray(obj.command, `${field}.command`);
  if (command !== undefined) {
    spec.command = command;
  }
  const readiness = parseReadiness(
    obj.readiness,
    `${field}.readiness`,
    readinessTimeoutMs,
  );
  if (readiness !== undefined) {
    spec.readiness = readiness;
  }

  for (const target of Object.keys(links)) {
    if (!spec.dependsOn.includes(target)) {
      throw new TopologyError(
        `Link to "${target}" requires "${target}" in dependsOn`,
        `${field}.links`,
      );
    }
  }

  return spec;
}

function parseTestRunner(value: unknown): TestRunnerSpec {
  const obj = expectObject(value, 'testRunner');
  const runner: TestRunnerSpec = {
    service: expectString(obj.service, 'testRunner.service'),
  };
  const command = optionalStringArray(obj.command, 'testRunner.command');
  if (command !== undefined) {
    runner.command = command;
  }
  return runner;
}

export function parseTopology(content: string, baseDir: string): Topology {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (e) {
    throw new TopologyError(
      `Invalid JSON in topology file: ${e instanceof Error ? e.message : String(e)}`,
    );
  }

  const obj = expectObject(parsed, 'topology');
  const project = expectString(obj.project, 'project');

  const rawTimeouts: JsonObject =
    obj.timeouts === undefined ? {} : expectObject(obj.timeouts, 'timeouts');
  const readinessTimeoutMs =
    optionalTimeoutMs(rawTimeouts.readinessMs, 'timeouts.readinessMs') ??
    DEFAULT_READINESS_TIMEOUT_MS;
  const timeouts: Timeouts = {
    stopSeconds:
      optionalPositiveInteger(
        rawTimeouts.stopSeconds,
        'timeouts.stopSeconds',
      ) ??
      DEFAULT_STOP_SECONDS,
  };
  for (const key of ['buildMs', 'startMs', 'testMs'] as const) {
    const value = optionalTimeoutMs(rawTimeouts[key], `timeouts.${key}`);
    if (value !== undefined) {
      timeouts[key] = value;
    }
  }

  let concurrency = 1;
  if (obj.concurrency !== undefined) {
    if (
      typeof obj.concurrency !== 'number' ||
      !Number.isInteger(obj.concurrency) ||
      obj.concurrency < 1
    ) {
      throw new TopologyError('must be a positive integer', 'concurrency');
    }
    concurrency = obj.concurrency;
  }

  let scopeImagesToRun = false;
  if (obj.scopeImagesToRun !== undefined) {
    if (typeof obj.scopeImagesToRun !== 'boolean') {
      throw new TopologyError('must be a boolean', 'scopeImagesToRun');
    }
    scopeImagesToRun = obj.scopeImagesToRun;
  }

  if (!Array.isArray(obj.services) || obj.services.length === 0) {
    throw new TopologyError('must be a non-empty array', 'services');
  }
  const services = obj.services.map((service, i) =>
    parseService(service, `services[${i}]`, baseDir, readinessTimeoutMs),
  );

  // Rejects duplicates, unknown dependencies and cycles.
  dependencyLevels(services);

  const testRunner = parseTestRunner(obj.testRunner);
  if (!services.some((s) => s.name === testRunner.service)) {
    throw new TopologyError(
      `Unknown service "${testRunner.service}"`,
      'testRunner.service',
    );
  }
  const dependent = services.find((s) =>
    s.dependsOn.includes(testRunner.service),
  );
  if (dependent) {
    throw new TopologyError(
      `Service "${dependent.name}" cannot depend on the test runner "${testRunner.service}"`,
      'testRunner.service',
    );
  }

  return {
    project,
    services,
    testRunner,
    timeouts,
    concurrency,
    scopeImagesToRun,
    baseDir,
  };
}

export function loadTopology(filePath: string): Topology {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new TopologyError(`Topology file does not exist: ${resolved}`);
  }
  const content = fs.readFileSync(resolved, 'utf-8');
  return parseTopology(content, path.dirname(resolved));
}

export function backgroundServices(topology: Topology): ServiceSpec[] {
  return topology.services.filter(
    (service) => service.name !== topology.testRunner.service,
  );
}

export function testRunnerService(topology: Topology): ServiceSpec {
  const runner = topology.services.find(
    (service) => service.name === topology.testRunner.service,
  );
  if (!runner) {
    throw new TopologyError(
      `Unknown service "${topology.testRunner.service}"`,
      'testRunner.service',
    );
  }
  return runner;
}
