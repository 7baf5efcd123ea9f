import type {
  ContainerRequest,
  ContainerRuntime,
  LinkConfig,
} from '../docker/runtime.js';
import { RUN_LABEL, SERVICE_LABEL } from '../docker/runtime.js';
import type { ServiceSpec, Topology } from '../types.js';
import type { HandleTable } from '../utils/handle-table.js';
import { containerName, imageTag, networkName } from '../utils/run-id.js';

export interface RunContext {
  runtime: ContainerRuntime;
  topology: Topology;
  runId: string;
  handles: HandleTable;
  signal?: AbortSignal;
}

export function labelsFor(
  runId: string,
  service?: string,
): Record<string, string> {
  const labels: Record<string, string> = { [RUN_LABEL]: runId };
  if (service) {
    labels[SERVICE_LABEL] = service;
  }
  return labels;
}

type NamingContext = Pick<RunContext, 'topology' | 'runId'>;

// Pulled images keep their declared tag; only built ones are run-scoped.
export function tagFor(ctx: NamingContext, service: ServiceSpec): string {
  return imageTag(
    service.image,
    ctx.runId,
    ctx.topology.scopeImagesToRun && service.context !== undefined,
  );
}

export function linksFor(runId: string, service: ServiceSpec): LinkConfig[] {
  return Object.entries(service.links).map(([dependency, alias]) => ({
    container: containerName(runId, dependency),
    alias,
  }));
}

export function containerRequestFor(
  ctx: NamingContext,
  service: ServiceSpec,
  command?: string[],
): ContainerRequest {
  return {
    name: containerName(ctx.runId, service.name),
    image: tagFor(ctx, service),
    network: networkName(ctx.runId),
    networkAliases: [service.name],
    links: linksFor(ctx.runId, service),
    env: service.env,
    command: command ?? service.command,
    mounts: service.mounts,
    labels: labelsFor(ctx.runId, service.name),
  };
}
