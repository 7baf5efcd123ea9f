import type { ContainerRuntime } from '../docker/runtime.js';
import {
  BuildFailure,
  LaunchFailure,
  PipelineError,
  PipelineInterrupted,
  TestRunnerError,
} from '../errors.js';
import type {
  ContainerHandle,
  FailureSummary,
  PipelineReport,
  PipelineState,
  RunResult,
  StreamChunk,
  TeardownReport,
  Topology,
} from '../types.js';
import { CleanupStack } from '../utils/cleanup-stack.js';
import { HandleTable } from '../utils/handle-table.js';
import { buildImages, type BuiltImage } from './image-builder.js';
import { PipelineStateMachine } from './state-machine.js';
import {
  deferContainerSweep,
  deferImageRelease,
  deferNetworkRelease,
  emptyTeardownReport,
  runScopedImages,
  unwindInto,
} from './teardown.js';
import { runTestContainer } from './test-runner.js';
import { createRunNetwork, launchTopology } from './topology-launcher.js';
import type { RunContext } from './context.js';

export const EXIT_CODES = {
  buildFailure: 90,
  launchFailure: 91,
  runnerFailure: 92,
  interrupted: 130,
} as const;

export interface PipelineOptions {
  runtime: ContainerRuntime;
  topology: Topology;
  runId: string;
  signal?: AbortSignal;
  onOutput?: (chunk: StreamChunk) => void;
}

export interface TopologyStartReport {
  runId: string;
  exitCode: number;
  failure?: FailureSummary;
  containers: ContainerHandle[];
  teardown: TeardownReport | null;
  durationMs: number;
}

export interface BuildReport {
  runId: string;
  exitCode: number;
  failure?: FailureSummary;
  images: BuiltImage[];
  durationMs: number;
}

export function exitCodeFor(error: PipelineError): number {
  switch (error.kind) {
    case 'build':
      return EXIT_CODES.buildFailure;
    case 'launch':
      return EXIT_CODES.launchFailure;
    case 'runner':
      return EXIT_CODES.runnerFailure;
    case 'interrupted':
      return EXIT_CODES.interrupted;
  }
}

// Errors that escaped the components are charged to the stage they hit.
function asPipelineError(
  error: unknown,
  stage: PipelineState,
  topology: Topology,
  signal?: AbortSignal,
): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  if (signal?.aborted) {
    return new PipelineInterrupted();
  }
  switch (stage) {
    case 'LAUNCHING':
      return new LaunchFailure(topology.project, error);
    case 'TESTING':
      return new TestRunnerError(topology.testRunner.service, error);
    default:
      return new BuildFailure(topology.project, error);
  }
}

function summarize(error: PipelineError): FailureSummary {
  const summary: FailureSummary = { kind: error.kind, message: error.message };
  if (error.service) {
    summary.service = error.service;
  }
  return summary;
}

function createContext(
  options: PipelineOptions,
  handles: HandleTable,
): RunContext {
  return {
    runtime: options.runtime,
    topology: options.topology,
    runId: options.runId,
    handles,
    signal: options.signal,
  };
}

/**
 * Build images and start the background services, registering each
 * acquired resource on the cleanup stack as it is created.
 */
async function acquireTopology(
  ctx: RunContext,
  machine: PipelineStateMachine | null,
  cleanup: CleanupStack,
  report: TeardownReport,
): Promise<void> {
  const { runtime, topology, handles } = ctx;

  machine?.transition('BUILDING');
  // Deferred up front so a build cut short by an interrupt is still
  // released; tags that were never built count as already gone.
  for (const tag of runScopedImages(topology, ctx.runId)) {
    deferImageRelease(cleanup, runtime, tag, report);
  }
  await buildImages(ctx);

  machine?.transition('LAUNCHING');
  let network: string;
  try {
    network = await createRunNetwork(ctx);
  } catch (error) {
    throw new LaunchFailure('network', error);
  }
  deferNetworkRelease(cleanup, runtime, network, report);
  deferContainerSweep(
    cleanup,
    runtime,
    handles,
    topology.timeouts.stopSeconds,
    report,
  );

  await launchTopology(ctx);
}

/**
 * Build, launch, test, and always tear down. The run's exit code is the
 * test runner's own when build and launch succeed; otherwise it names the
 * stage that failed.
 */
export async function runPipeline(
  options: PipelineOptions,
): Promise<PipelineReport> {
  const startTime = Date.now();
  const machine = new PipelineStateMachine();
  const handles = new HandleTable(options.runId);
  const ctx = createContext(options, handles);
  const cleanup = new CleanupStack();
  const teardownReport = emptyTeardownReport();

  let runResult: RunResult | null = null;
  let failure: PipelineError | null = null;

  try {
    await acquireTopology(ctx, machine, cleanup, teardownReport);

    machine.transition('TESTING');
    runResult = await runTestContainer(ctx, { onOutput: options.onOutput });
  } catch (error) {
    failure = asPipelineError(
      error,
      machine.state,
      options.topology,
      options.signal,
    );
    console.error(`\n✗ ${failure.message}`);
  } finally {
    machine.transition('TEARDOWN');
    await unwindInto(cleanup, teardownReport);
  }

  if (!failure && options.signal?.aborted) {
    failure = new PipelineInterrupted();
  }

  const passed = failure === null && runResult?.exitCode === 0;
  machine.transition(passed ? 'DONE' : 'FAILED');

  const report: PipelineReport = {
    runId: options.runId,
    state: passed ? 'DONE' : 'FAILED',
    exitCode: failure ? exitCodeFor(failure) : (runResult?.exitCode ?? 1),
    history: machine.history,
    runResult,
    containers: handles.snapshot(),
    teardown: teardownReport,
    durationMs: Date.now() - startTime,
  };
  if (failure) {
    report.failure = summarize(failure);
  }
  return report;
}

/**
 * Build and launch the topology and leave it running. On failure whatever
 * was started is torn down before returning.
 */
export async function startTopology(
  options: PipelineOptions,
): Promise<TopologyStartReport> {
  const startTime = Date.now();
  const handles = new HandleTable(options.runId);
  const ctx = createContext(options, handles);
  const cleanup = new CleanupStack();
  const teardownReport = emptyTeardownReport();

  try {
    await acquireTopology(ctx, null, cleanup, teardownReport);
    cleanup.dismiss();
    return {
      runId: options.runId,
      exitCode: 0,
      containers: handles.snapshot(),
      teardown: null,
      durationMs: Date.now() - startTime,
    };
  } catch (error) {
    const stage: PipelineState =
      handles.all().length > 0 ? 'LAUNCHING' : 'BUILDING';
    const failure = asPipelineError(
      error,
      stage,
      options.topology,
      options.signal,
    );
    console.error(`\n✗ ${failure.message}`);
    await unwindInto(cleanup, teardownReport);
    return {
      runId: options.runId,
      exitCode: exitCodeFor(failure),
      failure: summarize(failure),
      containers: handles.snapshot(),
      teardown: teardownReport,
      durationMs: Date.now() - startTime,
    };
  }
}

/**
 * Build every image and stop there. Built images are kept, run-scoped or
 * not, so a later start-topology with the same run id can use them.
 */
export async function buildOnly(
  options: Omit<PipelineOptions, 'onOutput'>,
): Promise<BuildReport> {
  const startTime = Date.now();
  const images: BuiltImage[] = [];

  try {
    await buildImages(options, (image) => images.push(image));
    return {
      runId: options.runId,
      exitCode: 0,
      images,
      durationMs: Date.now() - startTime,
    };
  } catch (error) {
    const failure = asPipelineError(
      error,
      'BUILDING',
      options.topology,
      options.signal,
    );
    console.error(`\n✗ ${failure.message}`);
    return {
      runId: options.runId,
      exitCode: exitCodeFor(failure),
      failure: summarize(failure),
      images,
      durationMs: Date.now() - startTime,
    };
  }
}
