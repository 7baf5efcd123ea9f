import type { ContainerRuntime } from '../docker/runtime.js';
import { ResourceNotFoundError, TeardownFailure } from '../errors.js';
import type { TeardownReport, Topology } from '../types.js';
import { CleanupStack } from '../utils/cleanup-stack.js';
import { topologicalOrder } from '../utils/dependency-graph.js';
import { HandleTable } from '../utils/handle-table.js';
import { containerName, imageTag, networkName } from '../utils/run-id.js';

export function emptyTeardownReport(): TeardownReport {
  return {
    stopped: [],
    removed: [],
    missing: [],
    networkRemoved: false,
    imagesRemoved: [],
    errors: [],
  };
}

function record(report: TeardownReport, failure: TeardownFailure): void {
  console.error(`  ✗ ${failure.message}`);
  report.errors.push({
    resource: failure.resource,
    action: failure.action,
    message: failure.message,
  });
}

/**
 * Best-effort sweep over every container in the table: stop all, then
 * remove all. Containers that are already gone count as done. Other
 * failures are recorded in the report and the sweep moves on; it never
 * throws, and a second sweep over the same table does nothing.
 */
export async function sweepContainers(
  runtime: ContainerRuntime,
  handles: HandleTable,
  stopSeconds: number,
  report: TeardownReport = emptyTeardownReport(),
): Promise<TeardownReport> {
  const toStop = handles.withStatus('building', 'running');
  const toRemove = handles.withStatus('building', 'running', 'stopped');
  if (toRemove.length === 0) {
    return report;
  }
  console.log(`\nTearing down ${toRemove.length} container(s)`);

  for (const handle of toStop) {
    try {
      await runtime.stopContainer(handle.name, stopSeconds);
      report.stopped.push(handle.name);
      handles.transition(handle.service, 'stopped');
    } catch (error) {
      if (error instanceof ResourceNotFoundError) {
        handles.transition(handle.service, 'stopped');
      } else {
        record(report, new TeardownFailure(handle.name, 'stop', error));
      }
    }
  }

  // Removal is forced, so containers that failed to stop are still tried.
  for (const handle of toRemove) {
    try {
      await runtime.removeContainer(handle.name);
      report.removed.push(handle.name);
      handles.transition(handle.service, 'removed');
    } catch (error) {
      if (error instanceof ResourceNotFoundError) {
        report.missing.push(handle.name);
        handles.transition(handle.service, 'removed');
      } else {
        record(report, new TeardownFailure(handle.name, 'remove', error));
      }
    }
  }

  return report;
}

// Resolves false when the network was already gone.
export async function releaseNetwork(
  runtime: ContainerRuntime,
  name: string,
): Promise<boolean> {
  try {
    await runtime.removeNetwork(name);
    return true;
  } catch (error) {
    if (error instanceof ResourceNotFoundError) {
      return false;
    }
    throw new TeardownFailure(name, 'remove', error);
  }
}

export async function releaseImage(
  runtime: ContainerRuntime,
  tag: string,
): Promise<boolean> {
  try {
    await runtime.removeImage(tag);
    return true;
  } catch (error) {
    if (error instanceof ResourceNotFoundError) {
      return false;
    }
    throw new TeardownFailure(tag, 'remove', error);
  }
}

/**
 * Unwind a cleanup stack that holds a run's sweep, network and image
 * releases, folding every release error into the report.
 */
export async function unwindInto(
  cleanup: CleanupStack,
  report: TeardownReport,
): Promise<TeardownReport> {
  const errors = await cleanup.unwind();
  for (const { label, error } of errors) {
    record(
      report,
      error instanceof TeardownFailure
        ? error
        : new TeardownFailure(label, 'remove', error),
    );
  }

  if (report.errors.length === 0) {
    console.log(
      `  ✓ Removed ${report.removed.length} container(s)` +
        (report.missing.length > 0
          ? `, ${report.missing.length} already gone`
          : ''),
    );
  } else {
    console.warn(
      `  Teardown finished with ${report.errors.length} error(s): ${report.errors
        .map((issue) => issue.resource)
        .join(', ')}`,
    );
  }
  return report;
}

/**
 * Register the release of a run's resources in acquisition order so that
 * unwinding removes containers first, then the network, then images.
 */
export function deferImageRelease(
  cleanup: CleanupStack,
  runtime: ContainerRuntime,
  tag: string,
  report: TeardownReport,
): void {
  cleanup.defer(`image ${tag}`, async () => {
    if (await releaseImage(runtime, tag)) {
      report.imagesRemoved.push(tag);
    }
  });
}

export function deferNetworkRelease(
  cleanup: CleanupStack,
  runtime: ContainerRuntime,
  name: string,
  report: TeardownReport,
): void {
  cleanup.defer(`network ${name}`, async () => {
    report.networkRemoved = await releaseNetwork(runtime, name);
  });
}

export function deferContainerSweep(
  cleanup: CleanupStack,
  runtime: ContainerRuntime,
  handles: HandleTable,
  stopSeconds: number,
  report: TeardownReport,
): void {
  cleanup.defer('containers', async () => {
    await sweepContainers(runtime, handles, stopSeconds, report);
  });
}

export function runScopedImages(topology: Topology, runId: string): string[] {
  if (!topology.scopeImagesToRun) {
    return [];
  }
  return topologicalOrder(topology.services)
    .filter((service) => service.context !== undefined)
    .map((service) => imageTag(service.image, runId, true));
}

/**
 * Sweep a run from another process: the handle table is rebuilt from the
 * topology's service names, so no container discovery is needed.
 */
export async function teardownRun(
  runtime: ContainerRuntime,
  topology: Topology,
  runId: string,
): Promise<TeardownReport> {
  const handles = HandleTable.forKnownNames(
    runId,
    topology.services.map((service) => ({
      service: service.name,
      name: containerName(runId, service.name),
    })),
  );
  const report = emptyTeardownReport();
  const cleanup = new CleanupStack();

  for (const tag of runScopedImages(topology, runId)) {
    deferImageRelease(cleanup, runtime, tag, report);
  }
  deferNetworkRelease(cleanup, runtime, networkName(runId), report);
  deferContainerSweep(
    cleanup,
    runtime,
    handles,
    topology.timeouts.stopSeconds,
    report,
  );

  return unwindInto(cleanup, report);
}
