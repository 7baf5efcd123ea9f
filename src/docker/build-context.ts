import * as fs from 'fs';
import * as path from 'path';
import * as tar from 'tar-stream';

// Top-level names listed in the context's .dockerignore, one per line.
export function readIgnoredNames(contextDir: string): Set<string> {
  const ignoreFile = path.join(contextDir, '.dockerignore');
  if (!fs.existsSync(ignoreFile)) {
    return new Set();
  }
  const names = fs
    .readFileSync(ignoreFile, 'utf-8')
    .split(/\r?\n/)
    .map((line) => line.trim().replace(/^\.?\//, '').replace(/\/$/, ''))
    .filter((line) => line !== '' && !line.startsWith('#'));
  return new Set(names);
}

export function listContextFiles(contextDir: string): string[] {
  if (!fs.existsSync(contextDir) || !fs.statSync(contextDir).isDirectory()) {
    throw new Error(`Build context is not a directory: ${contextDir}`);
  }
  const ignored = readIgnoredNames(contextDir);
  const files: string[] = [];

  const walk = (dir: string, relative: string) => {
    const entries = fs
      .readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const entryRelative = relative ? `${relative}/${entry.name}` : entry.name;
      if (!relative && ignored.has(entry.name)) {
        continue;
      }
      if (entry.isDirectory()) {
        walk(path.join(dir, entry.name), entryRelative);
      } else if (entry.isFile()) {
        files.push(entryRelative);
      }
    }
  };

  walk(contextDir, '');
  return files;
}

/**
 * Pack a build context directory into a tar stream the engine's build
 * endpoint accepts. File modes are kept so entrypoint scripts stay
 * executable.
 */
export function packBuildContext(contextDir: string): tar.Pack {
  const files = listContextFiles(contextDir);
  const pack = tar.pack();

  for (const file of files) {
    const fullPath = path.join(contextDir, ...file.split('/'));
    const stats = fs.statSync(fullPath);
    pack.entry(
      { name: file, mode: stats.mode & 0o7777, mtime: stats.mtime },
      fs.readFileSync(fullPath),
    );
  }
  pack.finalize();

  return pack;
}
