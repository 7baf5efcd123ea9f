import { LaunchFailure } from '../errors.js';
import type { ServiceSpec } from '../types.js';
import { dependencyLevels } from '../utils/dependency-graph.js';
import { containerName, networkName } from '../utils/run-id.js';
import { throwIfAborted, withTimeoutSettled } from '../utils/timeout.js';
import { backgroundServices } from '../utils/topology-file.js';
import { containerRequestFor, labelsFor, type RunContext } from './context.js';
import { waitUntilReady } from './readiness.js';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function createRunNetwork(ctx: RunContext): Promise<string> {
  const name = networkName(ctx.runId);
  await ctx.runtime.createNetwork(name, labelsFor(ctx.runId));
  return name;
}

async function startService(
  ctx: RunContext,
  service: ServiceSpec,
): Promise<void> {
  const { runtime, topology, handles, signal } = ctx;
  const name = containerName(ctx.runId, service.name);
  throwIfAborted(signal);

  // Registered before creation so a create that outlives its timeout is
  // still swept by name once it settles.
  handles.register(service.name, name, null);

  try {
    const id = await withTimeoutSettled(
      () => runtime.createContainer(containerRequestFor(ctx, service)),
      topology.timeouts.startMs,
      `Creating ${name}`,
      signal,
    );
    handles.assignId(service.name, id);

    await withTimeoutSettled(
      () => runtime.startContainer(name),
      topology.timeouts.startMs,
      `Starting ${name}`,
      signal,
    );
    handles.transition(service.name, 'running');

    if (service.readiness) {
      await waitUntilReady(runtime, name, service.readiness, signal);
    }
  } catch (error) {
    throwIfAborted(signal);
    console.log(`  ✗ ${service.name}: ${errorMessage(error)}`);
    throw new LaunchFailure(service.name, error);
  }

  console.log(`  ✓ ${service.name} started as ${name}`);
}

/**
 * Start every background service, one dependency level at a time. Up to
 * `concurrency` services of a level start together; a level only begins
 * once every service of the previous one is up.
 */
export async function launchTopology(ctx: RunContext): Promise<void> {
  const services = backgroundServices(ctx.topology);
  const levels = dependencyLevels(services);
  const concurrency = Math.max(1, ctx.topology.concurrency);

  console.log(
    `\nStarting ${services.length} service(s) on ${networkName(ctx.runId)}`,
  );

  for (const level of levels) {
    for (let i = 0; i < level.length; i += concurrency) {
      const batch = level.slice(i, i + concurrency);
      // Let every start in the batch settle so none is left untracked.
      const results = await Promise.allSettled(
        batch.map((service) => startService(ctx, service)),
      );
      const failed = results.find(
        (result): result is PromiseRejectedResult =>
          result.status === 'rejected',
      );
      if (failed) {
        throw failed.reason;
      }
    }
  }
}
