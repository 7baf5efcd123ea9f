import { Command } from 'commander';
import { execFileSync } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import {
  applyOverrides,
  resolveConfig,
  resolveRunId,
  type CliOptions,
  type ResolvedConfig,
} from './config.js';
import { DockerRuntime } from './docker/container.js';
import type { ContainerRuntime } from './docker/runtime.js';
import { ConfigurationError, PipelineInterrupted } from './errors.js';
import {
  buildOnly,
  runPipeline,
  startTopology,
} from './runner/pipeline.js';
import { teardownRun } from './runner/teardown.js';
import type { StreamChunk, Topology } from './types.js';
import { defaultMaintainer, prepareRelease } from './utils/release.js';
import { loadTopology } from './utils/topology-file.js';

export const VERSION = '1.0.0';

export interface CliDependencies {
  createRuntime: (socketPath: string) => ContainerRuntime;
  exit: (code: number) => void;
  readCommitMessage: () => string;
  writeOutput: (chunk: StreamChunk) => void;
}

function readLastCommitMessage(): string {
  return execFileSync('git', ['log', '-1', '--pretty=%B'], {
    encoding: 'utf-8',
  });
}

function writeToTerminal(chunk: StreamChunk): void {
  if (chunk.type === 'stderr') {
    process.stderr.write(`\x1b[31m${chunk.data}\x1b[0m`);
  } else {
    process.stdout.write(chunk.data);
  }
}

const defaultDependencies: CliDependencies = {
  createRuntime: (socketPath) => new DockerRuntime(socketPath),
  exit: (code) => process.exit(code),
  readCommitMessage: readLastCommitMessage,
  writeOutput: writeToTerminal,
};

function printHeader(title: string, topology: Topology, runId: string): void {
  console.log(`\nstackrun v${VERSION}: ${title}`);
  console.log(`================`);
  console.log(`Project:  ${topology.project}`);
  console.log(`Run id:   ${runId}`);
  console.log(`Services: ${topology.services.map((s) => s.name).join(', ')}`);
}

/**
 * Abort the returned signal on SIGINT/SIGTERM so in-flight work unwinds
 * through teardown instead of the process dying mid-run.
 */
function trapSignals(): { signal: AbortSignal; release: () => void } {
  const controller = new AbortController();
  const handlers = new Map<NodeJS.Signals, () => void>();

  for (const name of ['SIGINT', 'SIGTERM'] as const) {
    const handler = () => {
      console.error(`\nReceived ${name}, tearing down...`);
      controller.abort(new PipelineInterrupted(name));
    };
    handlers.set(name, handler);
    process.once(name, handler);
  }

  return {
    signal: controller.signal,
    release: () => {
      for (const [name, handler] of handlers) {
        process.removeListener(name, handler);
      }
    },
  };
}

function loadRun(options: CliOptions): {
  topology: Topology;
  runId: string;
  socketPath: string;
} {
  const config = resolveConfig(options);
  const topology = applyOverrides(loadTopology(config.topologyFile), options);
  return {
    topology,
    runId: resolveRunId(config, topology),
    socketPath: config.socketPath,
  };
}

export function createProgram(
  overrides: Partial<CliDependencies> = {},
): Command {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };
  const program = new Command();

  const fail = (error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    deps.exit(1);
  };

  program
    .name('stackrun')
    .description(
      'CLI tool for running integration tests against a containerized service topology',
    )
    .version(VERSION);

  program
    .command('build-images')
    .description('Build the image of every service in the topology')
    .option('-f, --file <topology>', 'Topology file')
    .option('--socket <path>', 'Docker socket path')
    .option('--run-id <id>', 'Run id used to tag run-scoped images')
    .option('--build-timeout <ms>', 'Timeout for each image build')
    .action(async (options: CliOptions) => {
      try {
        const { topology, runId, socketPath } = loadRun(options);
        printHeader('build images', topology, runId);

        const trap = trapSignals();
        const report = await buildOnly({
          runtime: deps.createRuntime(socketPath),
          topology,
          runId,
          signal: trap.signal,
        }).finally(() => trap.release());

        if (report.exitCode === 0) {
          console.log(`\nAll ${report.images.length} image(s) built.`);
        }
        deps.exit(report.exitCode);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('start-topology')
    .description(
      'Build images and start the background services, leaving them running',
    )
    .option('-f, --file <topology>', 'Topology file')
    .option('--socket <path>', 'Docker socket path')
    .option('--run-id <id>', 'Run id to namespace containers with')
    .option(
      '--concurrency <n>',
      'Services of one dependency level started at once',
    )
    .option('--build-timeout <ms>', 'Timeout for each image build')
    .action(async (options: CliOptions) => {
      try {
        const { topology, runId, socketPath } = loadRun(options);
        printHeader('start topology', topology, runId);

        const trap = trapSignals();
        const report = await startTopology({
          runtime: deps.createRuntime(socketPath),
          topology,
          runId,
          signal: trap.signal,
        }).finally(() => trap.release());

        if (report.exitCode === 0) {
          console.log(`\nTopology is up. Tear it down with:`);
          console.log(`  stackrun teardown --run-id ${runId}`);
        }
        deps.exit(report.exitCode);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('run-tests')
    .description(
      'Build, start the topology, run the test runner, and tear everything down',
    )
    .option('-f, --file <topology>', 'Topology file')
    .option('--socket <path>', 'Docker socket path')
    .option('--run-id <id>', 'Run id to namespace containers with')
    .option('-o, --output <file>', 'Output JSON report to file')
    .option(
      '--concurrency <n>',
      'Services of one dependency level started at once',
    )
    .option('--build-timeout <ms>', 'Timeout for each image build')
    .option('--test-timeout <ms>', 'Timeout for the test runner')
    .action(async (options: CliOptions & { output?: string }) => {
      try {
        const { topology, runId, socketPath } = loadRun(options);
        printHeader('run tests', topology, runId);

        const trap = trapSignals();
        const report = await runPipeline({
          runtime: deps.createRuntime(socketPath),
          topology,
          runId,
          signal: trap.signal,
          onOutput: deps.writeOutput,
        }).finally(() => trap.release());

        console.log('\n================');
        console.log('Summary');
        console.log('================');
        console.log(`Result:     ${report.state}`);
        console.log(`Stages:     ${report.history.join(' -> ')}`);
        console.log(`Exit code:  ${report.exitCode}`);
        console.log(`Containers: ${report.containers.length} created`);
        console.log(`Time:       ${report.durationMs}ms`);

        if (options.output) {
          const outputPath = path.resolve(options.output);
          fs.writeFileSync(outputPath, JSON.stringify(report, null, 2));
          console.log(`\nReport written to: ${outputPath}`);
        }

        deps.exit(report.exitCode);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('teardown')
    .description('Stop and remove every container of a run')
    .option('--run-id <id>', 'Run id printed by start-topology')
    .option('-f, --file <topology>', 'Topology file')
    .option('--socket <path>', 'Docker socket path')
    .action(async (options: CliOptions) => {
      let config: ResolvedConfig;
      try {
        config = resolveConfig(options);
      } catch (error) {
        fail(error);
        return;
      }
      const runId = config.runId;
      if (runId === undefined) {
        fail(
          new ConfigurationError(
            'teardown needs a run id: pass --run-id or set STACKRUN_RUN_ID',
            'runId',
          ),
        );
        return;
      }

      try {
        const topology = applyOverrides(
          loadTopology(config.topologyFile),
          options,
        );
        printHeader('teardown', topology, runId);
        await teardownRun(
          deps.createRuntime(config.socketPath),
          topology,
          runId,
        );
      } catch (error) {
        // Best effort: a sweep that could not even begin is still exit 0.
        console.error(
          'Teardown incomplete:',
          error instanceof Error ? error.message : error,
        );
      }
      deps.exit(0);
    });

  program
    .command('release')
    .description(
      'Add a changelog entry and bump the manifest version for a release',
    )
    .argument('<release>', 'Release string, e.g. 1.4.0-team1')
    .option(
      '--changelog <file>',
      'Debian changelog to prepend to',
      'debian/changelog',
    )
    .option(
      '--manifest <file>',
      'JSON manifest whose version is bumped',
      'package.json',
    )
    .option('--package <name>', 'Package name (defaults to the manifest name)')
    .option('--distribution <name>', 'Changelog distribution', 'unstable')
    .option('--branch <name>', 'Branch to push the tag to', 'main')
    .action(
      (
        release: string,
        options: {
          changelog: string;
          manifest: string;
          package?: string;
          distribution: string;
          branch: string;
        },
      ) => {
        try {
          const plan = prepareRelease({
            release,
            changelogPath: path.resolve(options.changelog),
            manifestPath: path.resolve(options.manifest),
            commitMessage: deps.readCommitMessage(),
            maintainer: defaultMaintainer(),
            packageName: options.package,
            distribution: options.distribution,
            branch: options.branch,
          });

          console.log(`${plan.release} has the changelog set.`);
          console.log(`\n${plan.entry}`);
          console.log('Now run:');
          for (const step of plan.nextSteps) {
            console.log(`  ${step}`);
          }
          deps.exit(0);
        } catch (error) {
          fail(error);
        }
      },
    );

  return program;
}
