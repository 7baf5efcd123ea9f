import { ResourceNotFoundError, TestRunnerError } from '../errors.js';
import type { RunResult, StreamChunk } from '../types.js';
import { containerName } from '../utils/run-id.js';
import { throwIfAborted, withTimeout } from '../utils/timeout.js';
import { testRunnerService } from '../utils/topology-file.js';
import { containerRequestFor, type RunContext } from './context.js';

export interface TestRunnerOptions {
  onOutput?: (chunk: StreamChunk) => void;
}

/**
 * Run the test-runner container in the foreground against the live
 * topology and capture its exit code. The container is removed as soon as
 * it exits, whatever the code; a failed removal is left to the teardown
 * sweep.
 */
export async function runTestContainer(
  ctx: RunContext,
  options: TestRunnerOptions = {},
): Promise<RunResult> {
  const { runtime, topology, handles, signal } = ctx;
  const service = testRunnerService(topology);
  const name = containerName(ctx.runId, service.name);
  throwIfAborted(signal);

  console.log(`\nRunning tests in ${name}`);
  const startTime = Date.now();
  handles.register(service.name, name, null);

  let exitCode: number;
  try {
    const id = await runtime.createContainer(
      containerRequestFor(ctx, service, topology.testRunner.command),
    );
    handles.assignId(service.name, id);
    handles.transition(service.name, 'running');

    exitCode = await withTimeout(
      (runSignal) =>
        runtime.runContainer(name, {
          onOutput: options.onOutput,
          signal: runSignal,
          stopSeconds: topology.timeouts.stopSeconds,
        }),
      topology.timeouts.testMs,
      `Test run in ${name}`,
      signal,
    );
  } catch (error) {
    throwIfAborted(signal);
    throw new TestRunnerError(service.name, error);
  }

  handles.transition(service.name, 'stopped');
  try {
    await runtime.removeContainer(name);
    handles.transition(service.name, 'removed');
  } catch (error) {
    if (error instanceof ResourceNotFoundError) {
      handles.transition(service.name, 'removed');
    } else {
      console.warn(
        `  Could not remove ${name} yet: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  const durationMs = Date.now() - startTime;
  if (exitCode === 0) {
    console.log(`  ✓ PASSED (${durationMs}ms)`);
  } else {
    console.log(`  ✗ FAILED with exit code ${exitCode} (${durationMs}ms)`);
  }

  return { container: name, exitCode, durationMs };
}
