import type { FailureKind } from './types.js';

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Base class for failures that abort the forward pipeline.
 * `kind` decides the exit code reported for the run.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: FailureKind;

  constructor(
    message: string,
    public readonly service?: string,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export class BuildFailure extends PipelineError {
  readonly kind = 'build';

  constructor(
    service: string,
    cause: unknown,
    public readonly action: 'build' | 'pull' = 'build',
  ) {
    super(
      `Image ${action} failed for ${service}: ${describeCause(cause)}`,
      service,
      cause,
    );
    this.name = 'BuildFailure';
  }
}

export class LaunchFailure extends PipelineError {
  readonly kind = 'launch';

  constructor(service: string, cause: unknown) {
    super(
      `Failed to start ${service}: ${describeCause(cause)}`,
      service,
      cause,
    );
    this.name = 'LaunchFailure';
  }
}

export class TestRunnerError extends PipelineError {
  readonly kind = 'runner';

  constructor(service: string, cause: unknown) {
    super(
      `Test runner ${service} did not complete: ${describeCause(cause)}`,
      service,
      cause,
    );
    this.name = 'TestRunnerError';
  }
}

export class PipelineInterrupted extends PipelineError {
  readonly kind = 'interrupted';

  constructor(public readonly signal: string = 'SIGINT') {
    super(`Interrupted by ${signal}`);
    this.name = 'PipelineInterrupted';
  }
}

export class TimeoutError extends Error {
  constructor(
    label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class TeardownFailure extends Error {
  constructor(
    public readonly resource: string,
    public readonly action: 'stop' | 'remove',
    cause: unknown,
  ) {
    super(`Failed to ${action} ${resource}: ${describeCause(cause)}`);
    this.name = 'TeardownFailure';
  }
}

/**
 * Raised by a runtime when the container, network or image it was asked to
 * act on does not exist.
 */
export class ResourceNotFoundError extends Error {
  constructor(public readonly resource: string) {
    super(`No such resource: ${resource}`);
    this.name = 'ResourceNotFoundError';
  }
}

export class TopologyError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(field ? `${field}: ${message}` : message);
    this.name = 'TopologyError';
  }
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly option?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ReleaseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReleaseError';
  }
}
