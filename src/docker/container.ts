import Docker from 'dockerode';
import { PassThrough } from 'stream';
import type { MountConfig, ProbeOutcome, ReadinessProbe } from '../types.js';
import { ResourceNotFoundError } from '../errors.js';
import { packBuildContext } from './build-context.js';
import type {
  ContainerRequest,
  ContainerRuntime,
  ImageBuildRequest,
  RunContainerOptions,
} from './runtime.js';

export const DEFAULT_SOCKET_PATH = '/var/run/docker.sock';

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    const code = error.statusCode;
    return typeof code === 'number' ? code : undefined;
  }
  return undefined;
}

// Rethrow engine 404s as ResourceNotFoundError so callers can tell them apart.
async function translateNotFound<T>(
  resource: string,
  action: () => Promise<T>,
): Promise<T> {
  try {
    return await action();
  } catch (error) {
    if (statusCodeOf(error) === 404) {
      throw new ResourceNotFoundError(resource);
    }
    throw error;
  }
}

export function toBinds(mounts: MountConfig[]): string[] {
  return mounts.map((mount) => {
    const mode = mount.readOnly ? 'ro' : 'rw';
    return `${mount.hostPath}:${mount.containerPath}:${mode}`;
  });
}

export function toEnvArray(env: Record<string, string>): string[] {
  return Object.entries(env).map(([key, value]) => `${key}=${value}`);
}

export function buildContainerConfig(
  request: ContainerRequest,
): Docker.ContainerCreateOptions {
  const env = toEnvArray(request.env);
  const binds = toBinds(request.mounts);

  return {
    name: request.name,
    Image: request.image,
    Cmd: request.command,
    Env: env.length > 0 ? env : undefined,
    Labels: request.labels,
    Tty: false,
    AttachStdout: true,
    AttachStderr: true,
    HostConfig: {
      Binds: binds.length > 0 ? binds : undefined,
      Links: request.links.map((link) => `${link.container}:${link.alias}`),
      NetworkMode: request.network,
      AutoRemove: false, // removed explicitly so the exit code can be read
    },
    NetworkingConfig: {
      EndpointsConfig: {
        [request.network]: { Aliases: request.networkAliases },
      },
    },
  };
}

/**
 * Pull the first error out of a build progress log. The engine reports a
 * failed build step inside the stream rather than as an HTTP error.
 */
export function findBuildError(events: unknown[]): string | null {
  for (const event of events) {
    if (typeof event !== 'object' || event === null) {
      continue;
    }
    if ('error' in event && typeof event.error === 'string') {
      return event.error;
    }
    if (
      'errorDetail' in event &&
      typeof event.errorDetail === 'object' &&
      event.errorDetail !== null &&
      'message' in event.errorDetail &&
      typeof event.errorDetail.message === 'string'
    ) {
      return event.errorDetail.message;
    }
  }
  return null;
}

async function drain(stream: NodeJS.ReadableStream): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    stream.on('end', () => resolve());
    stream.on('close', () => resolve());
    stream.on('error', reject);
    stream.resume();
  });
}

export class DockerRuntime implements ContainerRuntime {
  private docker: Docker;

  constructor(
    socketPath: string = DEFAULT_SOCKET_PATH,
    docker: Docker = new Docker({ socketPath }),
  ) {
    this.docker = docker;
  }

  async buildImage(request: ImageBuildRequest): Promise<void> {
    const context = packBuildContext(request.contextDir);
    const stream = await this.docker.buildImage(context, {
      t: request.tag,
      dockerfile: request.dockerfile,
      labels: request.labels,
    });

    const events = await new Promise<unknown[]>((resolve, reject) => {
      this.docker.modem.followProgress(
        stream,
        (err: Error | null, output: unknown[]) => {
          if (err) {
            reject(err);
          } else {
            resolve(output);
          }
        },
      );
    });

    const buildError = findBuildError(events);
    if (buildError) {
      throw new Error(buildError.trim());
    }
  }

  async pullImage(tag: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.docker.pull(
        tag,
        (err: Error | null, stream: NodeJS.ReadableStream) => {
          if (err) {
            reject(err);
            return;
          }

          this.docker.modem.followProgress(
            stream,
            (err: Error | null, output: unknown[]) => {
              const pullError = err ? err.message : findBuildError(output);
              if (pullError) {
                reject(new Error(pullError.trim()));
              } else {
                resolve();
              }
            },
          );
        },
      );
    });
  }

  async removeImage(tag: string): Promise<void> {
    await translateNotFound(tag, () =>
      this.docker.getImage(tag).remove({ force: true }),
    );
  }

  async createNetwork(
    name: string,
    labels: Record<string, string>,
  ): Promise<void> {
    await this.docker.createNetwork({
      Name: name,
      Driver: 'bridge',
      CheckDuplicate: true,
      Labels: labels,
    });
  }

  async removeNetwork(name: string): Promise<void> {
    await translateNotFound(name, () => this.docker.getNetwork(name).remove());
  }

  async createContainer(request: ContainerRequest): Promise<string> {
    const container = await this.docker.createContainer(
      buildContainerConfig(request),
    );
    return container.id;
  }

  async startContainer(name: string): Promise<void> {
    await translateNotFound(name, () =>
      this.docker.getContainer(name).start(),
    );
  }

  async probe(name: string, probe: ReadinessProbe): Promise<ProbeOutcome> {
    const container = this.docker.getContainer(name);
    const info = await translateNotFound(name, () => container.inspect());
    if (!info.State.Running) {
      return 'exited';
    }

    if (probe.type === 'healthcheck') {
      const health = info.State.Health?.Status;
      if (health === undefined) {
        throw new Error(`Image for ${name} defines no HEALTHCHECK`);
      }
      return health === 'healthy' ? 'ready' : 'pending';
    }

    const exec = await container.exec({
      Cmd: probe.command,
      AttachStdout: true,
      AttachStderr: true,
    });
    const output = await exec.start({ Detach: false });
    await drain(output);
    const result = await exec.inspect();
    return result.ExitCode === 0 ? 'ready' : 'pending';
  }

  async runContainer(
    name: string,
    options: RunContainerOptions,
  ): Promise<number> {
    const container = this.docker.getContainer(name);

    // Attach to streams before starting
    const stream = await translateNotFound(name, () =>
      container.attach({ stream: true, stdout: true, stderr: true }),
    );

    const stdoutStream = new PassThrough();
    const stderrStream = new PassThrough();
    stdoutStream.on('data', (chunk: Buffer) => {
      options.onOutput?.({ type: 'stdout', data: chunk.toString() });
    });
    stderrStream.on('data', (chunk: Buffer) => {
      options.onOutput?.({ type: 'stderr', data: chunk.toString() });
    });
    this.docker.modem.demuxStream(stream, stdoutStream, stderrStream);

    const stopOnAbort = () => {
      void container.stop({ t: options.stopSeconds }).catch((error: unknown) => {
        if (statusCodeOf(error) !== 304 && statusCodeOf(error) !== 404) {
          console.error(
            `  Failed to stop ${name}: ${error instanceof Error ? error.message : String(error)}`,
          );
        }
      });
    };

    await container.start();
    if (options.signal?.aborted) {
      stopOnAbort();
    } else {
      options.signal?.addEventListener('abort', stopOnAbort, { once: true });
    }

    try {
      const waitResult: { StatusCode: number } = await container.wait();
      // Give streams a moment to flush
      await new Promise((resolve) => setTimeout(resolve, 100));
      return waitResult.StatusCode;
    } finally {
      options.signal?.removeEventListener('abort', stopOnAbort);
    }
  }

  async stopContainer(name: string, timeoutSeconds: number): Promise<void> {
    try {
      await translateNotFound(name, () =>
        this.docker.getContainer(name).stop({ t: timeoutSeconds }),
      );
    } catch (error) {
      // 304: already stopped
      if (statusCodeOf(error) === 304) {
        return;
      }
      throw error;
    }
  }

  async removeContainer(name: string): Promise<void> {
    await translateNotFound(name, () =>
      this.docker.getContainer(name).remove({ force: true, v: true }),
    );
  }
}
