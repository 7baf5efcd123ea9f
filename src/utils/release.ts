import * as fs from 'fs';
import * as path from 'path';
import { ReleaseError } from '../errors.js';

const RELEASE_PATTERN = /^\d+\.\d+\.\d+(-[A-Za-z0-9.+~]+)?$/;

export interface ReleaseOptions {
  release: string;
  changelogPath: string;
  manifestPath: string;
  commitMessage: string;
  maintainer: string;
  packageName?: string;
  distribution?: string;
  branch?: string;
  date?: Date;
}

export interface ReleasePlan {
  release: string;
  version: string;
  packageName: string;
  entry: string;
  nextSteps: string[];
}

/** The upstream version: everything before the first "-". */
export function upstreamVersion(release: string): string {
  if (!RELEASE_PATTERN.test(release)) {
    throw new ReleaseError(
      `Invalid release "${release}": expected MAJOR.MINOR.PATCH with an optional -suffix`,
    );
  }
  return release.split('-')[0];
}

// RFC 2822 date as Debian changelogs expect it.
export function formatChangelogDate(date: Date): string {
  return date.toUTCString().replace(/GMT$/, '+0000');
}

export function formatChangelogEntry(options: {
  packageName: string;
  release: string;
  version: string;
  distribution: string;
  commitMessage: string;
  maintainer: string;
  date: Date;
}): string {
  const commit = options.commitMessage.trim().split(/\r?\n/)[0] ?? '';
  return [
    `${options.packageName} (${options.release}) ${options.distribution}; urgency=low`,
    '',
    `  * ${options.version} tagged with 'stackrun release'`,
    `    Commit: ${commit}`,
    '',
    ` -- ${options.maintainer}  ${formatChangelogDate(options.date)}`,
    '',
  ].join('\n');
}

export function defaultMaintainer(env: NodeJS.ProcessEnv = process.env): string {
  const name = env.DEBFULLNAME ?? env.NAME ?? 'Release Manager';
  const email = env.DEBEMAIL ?? env.EMAIL ?? 'release@localhost';
  return `${name} <${email}>`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readManifest(manifestPath: string): Record<string, unknown> {
  if (!fs.existsSync(manifestPath)) {
    throw new ReleaseError(`Manifest does not exist: ${manifestPath}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(manifestPath, 'utf-8'));
  } catch (e) {
    throw new ReleaseError(
      `Invalid JSON in ${manifestPath}: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
  if (!isRecord(parsed)) {
    throw new ReleaseError(
      `Manifest must contain a JSON object: ${manifestPath}`,
    );
  }
  return parsed;
}

/**
 * Record a release: prepend a changelog entry, set the manifest version,
 * and return the git steps left for the person cutting the release.
 */
export function prepareRelease(options: ReleaseOptions): ReleasePlan {
  const version = upstreamVersion(options.release);
  const manifest = readManifest(options.manifestPath);

  const packageName =
    options.packageName ??
    (typeof manifest.name === 'string' ? manifest.name : undefined);
  if (!packageName) {
    throw new ReleaseError(
      `No package name given and ${options.manifestPath} has no "name"`,
    );
  }

  const entry = formatChangelogEntry({
    packageName,
    release: options.release,
    version,
    distribution: options.distribution ?? 'unstable',
    commitMessage: options.commitMessage,
    maintainer: options.maintainer,
    date: options.date ?? new Date(),
  });

  const previous = fs.existsSync(options.changelogPath)
    ? fs.readFileSync(options.changelogPath, 'utf-8')
    : '';
  if (previous.startsWith(`${packageName} (${options.release}) `)) {
    throw new ReleaseError(
      `${options.changelogPath} already starts with release ${options.release}`,
    );
  }
  fs.mkdirSync(path.dirname(options.changelogPath), { recursive: true });
  fs.writeFileSync(
    options.changelogPath,
    previous ? `${entry}\n${previous}` : entry,
  );

  manifest.version = version;
  fs.writeFileSync(
    options.manifestPath,
    JSON.stringify(manifest, null, 2) + '\n',
  );

  const branch = options.branch ?? 'main';
  return {
    release: options.release,
    version,
    packageName,
    entry,
    nextSteps: [
      `git commit -a -m "Released ${options.release} via stackrun release"`,
      `git tag --force v${version}`,
      `git push --tags origin ${branch}`,
    ],
  };
}
