import { BuildFailure } from '../errors.js';
import { topologicalOrder } from '../utils/dependency-graph.js';
import { throwIfAborted, withTimeoutSettled } from '../utils/timeout.js';
import { labelsFor, tagFor, type RunContext } from './context.js';

export interface BuiltImage {
  service: string;
  tag: string;
  pulled: boolean;
  durationMs: number;
}

/**
 * Build every service image, dependencies first, one at a time. Services
 * without a build context use a prebuilt image, which is pulled instead.
 * The first failure stops the remaining work.
 */
export async function buildImages(
  ctx: Omit<RunContext, 'handles'>,
  onBuilt?: (image: BuiltImage) => void,
): Promise<BuiltImage[]> {
  const { runtime, topology, signal } = ctx;
  const ordered = topologicalOrder(topology.services);
  const built: BuiltImage[] = [];

  for (let i = 0; i < ordered.length; i++) {
    const service = ordered[i];
    const tag = tagFor(ctx, service);
    const contextDir = service.context;
    const pulled = contextDir === undefined;
    throwIfAborted(signal);

    console.log(
      `\n[${i + 1}/${ordered.length}] ${pulled ? 'Pulling' : 'Building'} ${service.name} (${tag})`,
    );
    const startTime = Date.now();

    try {
      await withTimeoutSettled(
        () =>
          contextDir === undefined
            ? runtime.pullImage(tag)
            : runtime.buildImage({
                contextDir,
                dockerfile: service.dockerfile,
                tag,
                labels: labelsFor(ctx.runId, service.name),
              }),
        topology.timeouts.buildMs,
        `${pulled ? 'Pull' : 'Build'} of ${service.name}`,
        signal,
      );
    } catch (error) {
      throwIfAborted(signal);
      console.log(
        `  ✗ FAILED: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new BuildFailure(service.name, error, pulled ? 'pull' : 'build');
    }

    const durationMs = Date.now() - startTime;
    console.log(`  ✓ ${pulled ? 'Pulled' : 'Built'} (${durationMs}ms)`);
    const image: BuiltImage = { service: service.name, tag, pulled, durationMs };
    built.push(image);
    onBuilt?.(image);
  }

  return built;
}
