import type { ContainerRuntime } from '../docker/runtime.js';
import type { ReadinessProbe } from '../types.js';
import { sleep, withTimeout } from '../utils/timeout.js';

export async function waitUntilReady(
  runtime: ContainerRuntime,
  container: string,
  probe: ReadinessProbe,
  signal?: AbortSignal,
): Promise<void> {
  await withTimeout(
    async (probeSignal) => {
      for (;;) {
        const outcome = await runtime.probe(container, probe);
        if (outcome === 'ready') {
          return;
        }
        if (outcome === 'exited') {
          throw new Error(`${container} exited before becoming ready`);
        }
        await sleep(probe.intervalMs, probeSignal);
      }
    },
    probe.timeoutMs,
    `Readiness check for ${container}`,
    signal,
  );
}
