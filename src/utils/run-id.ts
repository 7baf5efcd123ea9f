import { randomBytes } from 'crypto';
import { ConfigurationError } from '../errors.js';

// Docker's container and network name grammar
const NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

function sanitizeProject(project: string): string {
  const cleaned = project
    .toLowerCase()
    .replace(/[^a-z0-9_.-]+/g, '-')
    .replace(/^[^a-z0-9]+/, '');
  return cleaned || 'stackrun';
}

export function generateRunId(project: string, now: number = Date.now()): string {
  const suffix = randomBytes(2).toString('hex');
  return `${sanitizeProject(project)}-${now.toString(36)}-${suffix}`;
}

export function validateRunId(runId: string): string {
  if (!NAME_PATTERN.test(runId)) {
    throw new ConfigurationError(
      `Invalid run id "${runId}": must start with a letter or digit and contain only letters, digits, "_", "." or "-"`,
      'runId',
    );
  }
  return runId;
}

export function containerName(runId: string, service: string): string {
  return `${runId}_${service}`;
}

export function networkName(runId: string): string {
  return `${runId}_net`;
}

/**
 * Resolve the tag an image is built under. Run-scoped images replace the
 * declared tag with the run id so parallel runs never overwrite each other.
 */
export function imageTag(
  image: string,
  runId: string,
  scopeToRun: boolean,
): string {
  const slash = image.lastIndexOf('/');
  const colon = image.lastIndexOf(':');
  const hasTag = colon > slash;
  const repository = hasTag ? image.slice(0, colon) : image;
  if (scopeToRun) {
    return `${repository}:${runId}`;
  }
  return hasTag ? image : `${repository}:latest`;
}
