import type {
  MountConfig,
  ProbeOutcome,
  ReadinessProbe,
  StreamChunk,
} from '../types.js';

export interface ImageBuildRequest {
  contextDir: string;
  dockerfile?: string;
  tag: string;
  labels: Record<string, string>;
}

export interface LinkConfig {
  container: string;
  alias: string;
}

export interface ContainerRequest {
  name: string;
  image: string;
  network: string;
  networkAliases: string[];
  links: LinkConfig[];
  env: Record<string, string>;
  command?: string[];
  mounts: MountConfig[];
  labels: Record<string, string>;
}

export interface RunContainerOptions {
  onOutput?: (chunk: StreamChunk) => void;
  signal?: AbortSignal;
  stopSeconds: number;
}

/**
 * The container engine operations the orchestrator needs. Operations on a
 * container, network or image that does not exist reject with
 * `ResourceNotFoundError`; stopping an already stopped container resolves.
 */
export interface ContainerRuntime {
  buildImage(request: ImageBuildRequest): Promise<void>;
  pullImage(tag: string): Promise<void>;
  removeImage(tag: string): Promise<void>;

  createNetwork(name: string, labels: Record<string, string>): Promise<void>;
  removeNetwork(name: string): Promise<void>;

  /** Create a container without starting it and return its id. */
  createContainer(request: ContainerRequest): Promise<string>;
  startContainer(name: string): Promise<void>;
  probe(name: string, probe: ReadinessProbe): Promise<ProbeOutcome>;

  /**
   * Start a created container attached, forward its output, and resolve
   * with its exit code once it exits. Aborting the signal stops it.
   */
  runContainer(name: string, options: RunContainerOptions): Promise<number>;

  stopContainer(name: string, timeoutSeconds: number): Promise<void>;
  removeContainer(name: string): Promise<void>;
}

export const RUN_LABEL = 'io.stackrun.run-id';
export const SERVICE_LABEL = 'io.stackrun.service';
