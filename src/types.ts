export interface MountConfig {
  hostPath: string;
  containerPath: string;
  readOnly?: boolean;
}

export type ReadinessProbe =
  | { type: 'exec'; command: string[]; intervalMs: number; timeoutMs: number }
  | { type: 'healthcheck'; intervalMs: number; timeoutMs: number };

export type ProbeOutcome = 'ready' | 'pending' | 'exited';

export interface ServiceSpec {
  name: string;
  // Absent for prebuilt images, which are pulled instead of built.
  context?: string;
  dockerfile?: string;
  image: string;
  dependsOn: string[];
  // dependency service name -> hostname it is reachable by
  links: Record<string, string>;
  env: Record<string, string>;
  command?: string[];
  mounts: MountConfig[];
  readiness?: ReadinessProbe;
}

export interface Timeouts {
  buildMs?: number;
  startMs?: number;
  testMs?: number;
  stopSeconds: number;
}

export interface TestRunnerSpec {
  service: string;
  command?: string[];
}

export interface Topology {
  project: string;
  services: ServiceSpec[];
  testRunner: TestRunnerSpec;
  timeouts: Timeouts;
  concurrency: number;
  scopeImagesToRun: boolean;
  baseDir: string;
}

export type ContainerStatus = 'building' | 'running' | 'stopped' | 'removed';

export interface ContainerHandle {
  service: string;
  name: string;
  id: string | null;
  status: ContainerStatus;
}

export interface RunResult {
  container: string;
  exitCode: number;
  durationMs: number;
}

export type PipelineState =
  | 'INIT'
  | 'BUILDING'
  | 'LAUNCHING'
  | 'TESTING'
  | 'TEARDOWN'
  | 'DONE'
  | 'FAILED';

export type FailureKind = 'build' | 'launch' | 'runner' | 'interrupted';

export interface FailureSummary {
  kind: FailureKind;
  message: string;
  service?: string;
}

export interface TeardownIssue {
  resource: string;
  action: 'stop' | 'remove';
  message: string;
}

export interface TeardownReport {
  stopped: string[];
  removed: string[];
  // already gone when the sweep reached them
  missing: string[];
  networkRemoved: boolean;
  imagesRemoved: string[];
  errors: TeardownIssue[];
}

export interface PipelineReport {
  runId: string;
  state: 'DONE' | 'FAILED';
  exitCode: number;
  history: PipelineState[];
  runResult: RunResult | null;
  failure?: FailureSummary;
  containers: ContainerHandle[];
  teardown: TeardownReport | null;
  durationMs: number;
}

export interface StreamChunk {
  type: 'stdout' | 'stderr';
  data: string;
}
