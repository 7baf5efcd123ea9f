import type { ContainerHandle, ContainerStatus } from '../types.js';

const STATUS_ORDER: ContainerStatus[] = [
  'building',
  'running',
  'stopped',
  'removed',
];

/**
 * Every container a run creates, keyed by service. Handles only move
 * forward through their lifecycle and are never reused once removed.
 */
export class HandleTable {
  private readonly handles = new Map<string, ContainerHandle>();

  constructor(public readonly runId: string) {}

  static forKnownNames(
    runId: string,
    entries: Array<{ service: string; name: string }>,
  ): HandleTable {
    const table = new HandleTable(runId);
    for (const entry of entries) {
      // Unknown state: treat as live so the sweep both stops and removes it.
      table.register(entry.service, entry.name, null, 'running');
    }
    return table;
  }

  register(
    service: string,
    name: string,
    id: string | null,
    status: ContainerStatus = 'building',
  ): ContainerHandle {
    if (this.handles.has(service)) {
      throw new Error(
        `Container for ${service} was already created in run ${this.runId}`,
      );
    }
    const handle: ContainerHandle = { service, name, id, status };
    this.handles.set(service, handle);
    return handle;
  }

  assignId(service: string, id: string): ContainerHandle {
    const handle = this.require(service);
    handle.id = id;
    return handle;
  }

  get(service: string): ContainerHandle | undefined {
    return this.handles.get(service);
  }

  transition(service: string, next: ContainerStatus): ContainerHandle {
    const handle = this.require(service);
    const from = STATUS_ORDER.indexOf(handle.status);
    const to = STATUS_ORDER.indexOf(next);
    if (to < from) {
      throw new Error(
        `Container ${handle.name} cannot go from ${handle.status} back to ${next}`,
      );
    }
    handle.status = next;
    return handle;
  }

  private require(service: string): ContainerHandle {
    const handle = this.handles.get(service);
    if (!handle) {
      throw new Error(`No container registered for ${service}`);
    }
    return handle;
  }

  all(): ContainerHandle[] {
    return [...this.handles.values()];
  }

  withStatus(...statuses: ContainerStatus[]): ContainerHandle[] {
    return this.all().filter((handle) => statuses.includes(handle.status));
  }

  snapshot(): ContainerHandle[] {
    return this.all().map((handle) => ({ ...handle }));
  }
}
