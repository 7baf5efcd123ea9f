import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PipelineInterrupted } from '../../src/errors.js';
import {
  EXIT_CODES,
  buildOnly,
  runPipeline,
  startTopology,
} from '../../src/runner/pipeline.js';
import type { StreamChunk } from '../../src/types.js';
import {
  FakeRuntime,
  makeService,
  makeTopology,
} from '../helpers/fake-runtime.js';

const RUN_ID = 'ci-run-1';

describe('runPipeline', () => {
  let runtime: FakeRuntime;

  beforeEach(() => {
    runtime = new FakeRuntime();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('passes and removes every container when the tests pass', async () => {
    const report = await runPipeline({
      runtime,
      topology: makeTopology(),
      runId: RUN_ID,
    });

    expect(report.exitCode).toBe(0);
    expect(report.state).toBe('DONE');
    expect(report.history).toEqual([
      'INIT',
      'BUILDING',
      'LAUNCHING',
      'TESTING',
      'TEARDOWN',
      'DONE',
    ]);
    expect(report.containers).toHaveLength(4);
    expect(report.containers.every((c) => c.status === 'removed')).toBe(true);
    expect(runtime.containers.size).toBe(0);
    expect(runtime.networks.size).toBe(0);
    expect(report.teardown?.networkRemoved).toBe(true);
    expect(report.runResult).toMatchObject({
      container: 'ci-run-1_itest',
      exitCode: 0,
    });
  });

  it('builds in dependency order and starts services in dependency order', async () => {
    await runPipeline({ runtime, topology: makeTopology(), runId: RUN_ID });

    expect(runtime.calls.filter((c) => c.startsWith('build:'))).toEqual([
      'build:zookeeper',
      'build:resource-manager',
      'build:scheduler',
      'build:itest',
    ]);
    expect(runtime.startedServices()).toEqual([
      'zookeeper',
      'resource-manager',
      'scheduler',
    ]);
    expect(runtime.calls.indexOf('run:itest')).toBeGreaterThan(
      runtime.calls.indexOf('start:scheduler'),
    );
  });

  it('links each container to its dependencies by alias on the run network', async () => {
    const topology = makeTopology({
      services: [
        makeService('zookeeper'),
        makeService('itest', ['zookeeper'], { links: { zookeeper: 'zk' } }),
      ],
    });
    runtime.onRun = () => {
      const runner = runtime.containers.get('ci-run-1_itest');
      expect(runner?.request.links).toEqual([
        { container: 'ci-run-1_zookeeper', alias: 'zk' },
      ]);
      expect(runner?.request.network).toBe('ci-run-1_net');
      expect(runner?.request.command).toEqual(['/work/itest/run.sh']);
    };

    const report = await runPipeline({ runtime, topology, runId: RUN_ID });

    expect(report.exitCode).toBe(0);
  });

  it('reports the test runner exit code and still removes everything', async () => {
    runtime.exitCodes.set('itest', 3);

    const report = await runPipeline({
      runtime,
      topology: makeTopology(),
      runId: RUN_ID,
    });

    expect(report.exitCode).toBe(3);
    expect(report.state).toBe('FAILED');
    expect(report.failure).toBeUndefined();
    expect(report.runResult?.exitCode).toBe(3);
    expect(report.containers.every((c) => c.status === 'removed')).toBe(true);
    expect(runtime.containers.size).toBe(0);
  });

  it('never launches anything when an image build fails', async () => {
    runtime.failBuild.add('resource-manager');

    const report = await runPipeline({
      runtime,
      topology: makeTopology(),
      runId: RUN_ID,
    });

    expect(report.exitCode).toBe(EXIT_CODES.buildFailure);
    expect(report.failure).toMatchObject({
      kind: 'build',
      service: 'resource-manager',
    });
    expect(report.history).toEqual(['INIT', 'BUILDING', 'TEARDOWN', 'FAILED']);
    expect(runtime.calls).toEqual(['build:zookeeper', 'build:resource-manager']);
    expect(report.containers).toEqual([]);
  });

  it('reaps exactly the started containers when a launch fails partway', async () => {
    runtime.failCreate.add('scheduler');

    const report = await runPipeline({
      runtime,
      topology: makeTopology(),
      runId: RUN_ID,
    });

    expect(report.exitCode).toBe(EXIT_CODES.launchFailure);
    expect(report.failure).toMatchObject({
      kind: 'launch',
      service: 'scheduler',
    });
    expect(report.history).toEqual([
      'INIT',
      'BUILDING',
      'LAUNCHING',
      'TEARDOWN',
      'FAILED',
    ]);
    expect(report.teardown?.removed).toEqual([
      'ci-run-1_zookeeper',
      'ci-run-1_resource-manager',
    ]);
    expect(report.teardown?.errors).toEqual([]);
    expect(runtime.calls).not.toContain('create:itest');
    expect(runtime.containers.size).toBe(0);
    expect(runtime.networks.size).toBe(0);
  });

  it('removes a container that was created but failed to start', async () => {
    runtime.failStart.add('scheduler');

    const report = await runPipeline({
      runtime,
      topology: makeTopology(),
      runId: RUN_ID,
    });

    expect(report.exitCode).toBe(EXIT_CODES.launchFailure);
    expect(report.teardown?.removed).toEqual([
      'ci-run-1_zookeeper',
      'ci-run-1_resource-manager',
      'ci-run-1_scheduler',
    ]);
    expect(runtime.containers.size).toBe(0);
  });

  it('fails the launch when the run network cannot be created', async () => {
    runtime.failNetworkCreate = true;

    const report = await runPipeline({
      runtime,
      topology: makeTopology(),
      runId: RUN_ID,
    });

    expect(report.exitCode).toBe(EXIT_CODES.launchFailure);
    expect(report.failure).toMatchObject({
      kind: 'launch',
      service: 'network',
    });
    expect(runtime.calls.some((c) => c.startsWith('create:'))).toBe(false);
  });

  it('waits for readiness before starting dependents', async () => {
    const topology = makeTopology({
      services: [
        makeService('zookeeper', [], {
          readiness: {
            type: 'exec',
            command: ['zkOk.sh'],
            intervalMs: 1,
            timeoutMs: 1000,
          },
        }),
        makeService('itest', ['zookeeper']),
      ],
    });
    runtime.probeOutcomes.set('zookeeper', ['pending', 'pending', 'ready']);

    const report = await runPipeline({ runtime, topology, runId: RUN_ID });

    expect(report.exitCode).toBe(0);
    expect(runtime.calls.filter((c) => c === 'probe:zookeeper')).toHaveLength(3);
    expect(runtime.calls.indexOf('create:itest')).toBeGreaterThan(
      runtime.calls.lastIndexOf('probe:zookeeper'),
    );
  });

  it('fails the launch when a service exits before becoming ready', async () => {
    const topology = makeTopology({
      services: [
        makeService('zookeeper', [], {
          readiness: { type: 'healthcheck', intervalMs: 1, timeoutMs: 1000 },
        }),
        makeService('itest', ['zookeeper']),
      ],
    });
    runtime.probeOutcomes.set('zookeeper', ['exited']);

    const report = await runPipeline({ runtime, topology, runId: RUN_ID });

    expect(report.exitCode).toBe(EXIT_CODES.launchFailure);
    expect(report.failure?.message).toBe(
      'Failed to start zookeeper: ci-run-1_zookeeper exited before becoming ready',
    );
    expect(runtime.containers.size).toBe(0);
  });

  it('keeps the test result when teardown hits errors', async () => {
    runtime.failRemove.set(
      'zookeeper',
      new Error('Cannot connect to the Docker daemon'),
    );

    const report = await runPipeline({
      runtime,
      topology: makeTopology(),
      runId: RUN_ID,
    });

    expect(report.exitCode).toBe(0);
    expect(report.state).toBe('DONE');
    expect(report.teardown?.errors).toEqual([
      {
        resource: 'ci-run-1_zookeeper',
        action: 'remove',
        message:
          'Failed to remove ci-run-1_zookeeper: Cannot connect to the Docker daemon',
      },
    ]);
    expect(report.teardown?.removed).toEqual([
      'ci-run-1_resource-manager',
      'ci-run-1_scheduler',
    ]);
  });

  it('tears down and reports an interrupt during the test run', async () => {
    const controller = new AbortController();
    runtime.hang.add('itest');
    runtime.onRun = () => controller.abort(new PipelineInterrupted('SIGINT'));

    const report = await runPipeline({
      runtime,
      topology: makeTopology(),
      runId: RUN_ID,
      signal: controller.signal,
    });

    expect(report.exitCode).toBe(EXIT_CODES.interrupted);
    expect(report.failure?.kind).toBe('interrupted');
    expect(report.history.slice(-2)).toEqual(['TEARDOWN', 'FAILED']);
    expect(runtime.containers.size).toBe(0);
  });

  it('stops a test runner that exceeds its timeout', async () => {
    runtime.hang.add('itest');
    const topology = makeTopology({ timeouts: { stopSeconds: 1, testMs: 20 } });

    const report = await runPipeline({ runtime, topology, runId: RUN_ID });

    expect(report.exitCode).toBe(EXIT_CODES.runnerFailure);
    expect(report.failure?.message).toBe(
      'Test runner itest did not complete: Test run in ci-run-1_itest timed out after 20ms',
    );
    expect(runtime.containers.size).toBe(0);
  });

  it('streams test runner output to the caller', async () => {
    const chunks: StreamChunk[] = [];
    runtime.output.set('itest', [
      { type: 'stdout', data: 'scenario passed\n' },
      { type: 'stderr', data: 'warning: slow\n' },
    ]);

    await runPipeline({
      runtime,
      topology: makeTopology(),
      runId: RUN_ID,
      onOutput: (chunk) => chunks.push(chunk),
    });

    expect(chunks).toEqual([
      { type: 'stdout', data: 'scenario passed\n' },
      { type: 'stderr', data: 'warning: slow\n' },
    ]);
  });

  it('removes run-scoped images after the containers', async () => {
    const report = await runPipeline({
      runtime,
      topology: makeTopology({ scopeImagesToRun: true }),
      runId: RUN_ID,
    });

    expect(report.teardown?.imagesRemoved).toEqual([
      'scheduler-itest/itest:ci-run-1',
      'scheduler-itest/scheduler:ci-run-1',
      'scheduler-itest/resource-manager:ci-run-1',
      'scheduler-itest/zookeeper:ci-run-1',
    ]);
    expect(runtime.images.size).toBe(0);
    expect(runtime.calls.indexOf('rmnet:ci-run-1_net')).toBeLessThan(
      runtime.calls.indexOf('rmi:scheduler-itest/itest:ci-run-1'),
    );
  });

  it('starts independent services of one level together', async () => {
    const topology = makeTopology({
      concurrency: 2,
      services: [
        makeService('zookeeper'),
        makeService('postgres'),
        makeService('scheduler', ['zookeeper', 'postgres']),
        makeService('itest', ['scheduler']),
      ],
    });

    const report = await runPipeline({ runtime, topology, runId: RUN_ID });

    expect(report.exitCode).toBe(0);
    const first = runtime.calls.indexOf('create:zookeeper');
    expect(runtime.calls.slice(first, first + 2)).toEqual([
      'create:zookeeper',
      'create:postgres',
    ]);
    expect(runtime.calls.indexOf('create:scheduler')).toBeGreaterThan(
      runtime.calls.indexOf('start:postgres'),
    );
  });
});

describe('startTopology', () => {
  let runtime: FakeRuntime;

  beforeEach(() => {
    runtime = new FakeRuntime();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('leaves the background services running', async () => {
    const report = await startTopology({
      runtime,
      topology: makeTopology(),
      runId: RUN_ID,
    });

    expect(report.exitCode).toBe(0);
    expect(report.teardown).toBeNull();
    expect([...runtime.containers.keys()]).toEqual([
      'ci-run-1_zookeeper',
      'ci-run-1_resource-manager',
      'ci-run-1_scheduler',
    ]);
    expect(runtime.networks.has('ci-run-1_net')).toBe(true);
  });

  it('tears down what it started when a launch fails', async () => {
    runtime.failStart.add('resource-manager');

    const report = await startTopology({
      runtime,
      topology: makeTopology(),
      runId: RUN_ID,
    });

    expect(report.exitCode).toBe(EXIT_CODES.launchFailure);
    expect(report.teardown?.removed).toEqual([
      'ci-run-1_zookeeper',
      'ci-run-1_resource-manager',
    ]);
    expect(runtime.containers.size).toBe(0);
    expect(runtime.networks.size).toBe(0);
  });
});

describe('buildOnly', () => {
  let runtime: FakeRuntime;

  beforeEach(() => {
    runtime = new FakeRuntime();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps run-scoped images for a later start', async () => {
    const report = await buildOnly({
      runtime,
      topology: makeTopology({ scopeImagesToRun: true }),
      runId: RUN_ID,
    });

    expect(report.exitCode).toBe(0);
    expect(report.images.map((image) => image.tag)).toEqual([
      'scheduler-itest/zookeeper:ci-run-1',
      'scheduler-itest/resource-manager:ci-run-1',
      'scheduler-itest/scheduler:ci-run-1',
      'scheduler-itest/itest:ci-run-1',
    ]);
    expect(runtime.images.size).toBe(4);
  });

  it('reports the first failed build', async () => {
    runtime.failBuild.add('zookeeper');

    const report = await buildOnly({
      runtime,
      topology: makeTopology(),
      runId: RUN_ID,
    });

    expect(report.exitCode).toBe(EXIT_CODES.buildFailure);
    expect(report.failure).toEqual({
      kind: 'build',
      service: 'zookeeper',
      message:
        "Image build failed for zookeeper: The command '/bin/sh -c make' returned a non-zero code: 2",
    });
    expect(report.images).toEqual([]);
  });
});

describe('runPipeline with engine calls still in flight', () => {
  let runtime: FakeRuntime;

  beforeEach(() => {
    runtime = new FakeRuntime();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('removes a container whose create outlived the start timeout', async () => {
    runtime.createDelayMs.set('resource-manager', 50);

    const report = await runPipeline({
      runtime,
      topology: makeTopology({ timeouts: { stopSeconds: 1, startMs: 10 } }),
      runId: RUN_ID,
    });

    expect(report.exitCode).toBe(EXIT_CODES.launchFailure);
    expect(report.failure?.message).toBe(
      'Failed to start resource-manager: Creating ci-run-1_resource-manager timed out after 10ms',
    );
    expect(report.teardown?.removed).toEqual([
      'ci-run-1_zookeeper',
      'ci-run-1_resource-manager',
    ]);
    expect(report.teardown?.missing).toEqual([]);
    expect(runtime.containers.size).toBe(0);
  });

  it('tears everything down when interrupted while a service is being created', async () => {
    const controller = new AbortController();
    runtime.createDelayMs.set('scheduler', 50);
    runtime.onCreate = (service) => {
      if (service === 'scheduler') {
        setTimeout(
          () => controller.abort(new PipelineInterrupted('SIGINT')),
          5,
        );
      }
    };

    const report = await runPipeline({
      runtime,
      topology: makeTopology(),
      runId: RUN_ID,
      signal: controller.signal,
    });

    expect(report.exitCode).toBe(EXIT_CODES.interrupted);
    expect(report.failure).toMatchObject({ kind: 'interrupted' });
    expect(report.history).toEqual([
      'INIT',
      'BUILDING',
      'LAUNCHING',
      'TEARDOWN',
      'FAILED',
    ]);
    expect(report.containers.map((c) => c.status)).toEqual([
      'removed',
      'removed',
      'removed',
    ]);
    expect(runtime.calls).not.toContain('create:itest');
    expect(runtime.containers.size).toBe(0);
    expect(runtime.networks.size).toBe(0);
  });
});

describe('runPipeline with prebuilt images', () => {
  let runtime: FakeRuntime;

  const topology = () =>
    makeTopology({
      scopeImagesToRun: true,
      services: [
        makeService('zookeeper', [], {
          context: undefined,
          image: 'zookeeper:3.9',
        }),
        makeService('itest', ['zookeeper']),
      ],
    });

  beforeEach(() => {
    runtime = new FakeRuntime();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('pulls services without a build context and keeps their tag', async () => {
    let zookeeperImage: string | undefined;
    runtime.onRun = () => {
      zookeeperImage = runtime.containers.get('ci-run-1_zookeeper')?.request
        .image;
    };

    const report = await runPipeline({
      runtime,
      topology: topology(),
      runId: RUN_ID,
    });

    expect(report.exitCode).toBe(0);
    expect(runtime.calls.slice(0, 2)).toEqual([
      'pull:zookeeper:3.9',
      'build:itest',
    ]);
    expect(zookeeperImage).toBe('zookeeper:3.9');
    expect(report.teardown?.imagesRemoved).toEqual([
      'scheduler-itest/itest:ci-run-1',
    ]);
    expect([...runtime.images]).toEqual(['zookeeper:3.9']);
  });

  it('counts a failed pull as a build failure', async () => {
    runtime.failPull.add('zookeeper:3.9');

    const report = await runPipeline({
      runtime,
      topology: topology(),
      runId: RUN_ID,
    });

    expect(report.exitCode).toBe(EXIT_CODES.buildFailure);
    expect(report.failure).toEqual({
      kind: 'build',
      service: 'zookeeper',
      message:
        'Image pull failed for zookeeper: manifest for zookeeper:3.9 not found',
    });
    expect(runtime.calls).toEqual([
      'pull:zookeeper:3.9',
      'rmi:scheduler-itest/itest:ci-run-1',
    ]);
  });
});
