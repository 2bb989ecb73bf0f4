/**
 * Docker launcher
 *
 * Runs the managed service as a labelled container through the docker CLI.
 * The label lets separate processes (parallel test runners, the CLI) find
 * and share one container instead of each starting their own.
 */

import { execa } from 'execa';
import type { Logger } from 'pino';
import { describeError, ServiceStartError } from '../api/errors.js';
import type { ServiceEndpoint, ServiceLauncher, ServiceLaunchSpec } from '../types/service.js';
import { createLogger } from '../utils/logger.js';

/**
 * Runs a command and resolves with its stdout; rejects on non-zero exit.
 */
export type CommandRunner = (file: string, args: readonly string[]) => Promise<string>;

export interface DockerServiceLauncherOptions {
  /** docker executable (default: `docker`) */
  dockerPath?: string;
  logger?: Logger;
  /** Injected for tests */
  run?: CommandRunner;
}

const WILDCARD_HOSTS = new Set(['0.0.0.0', '::', '[::]', '']);

const execaRunner: CommandRunner = async (file, args) => {
  const { stdout } = await execa(file, [...args]);
  return stdout;
};

/**
 * Parse `docker port` output (`0.0.0.0:28001`, one binding per line) into
 * the first reachable endpoint. Wildcard bind addresses map to loopback.
 */
export function parsePortBinding(output: string): { host: string; port: number } | null {
  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim();
    const separator = trimmed.lastIndexOf(':');
    if (separator < 0) {
      continue;
    }
    const port = Number.parseInt(trimmed.slice(separator + 1), 10);
    if (!Number.isInteger(port) || port <= 0) {
      continue;
    }
    const rawHost = trimmed.slice(0, separator);
    return { host: WILDCARD_HOSTS.has(rawHost) ? '127.0.0.1' : rawHost, port };
  }
  return null;
}

/**
 * Arguments for `docker run` (detached, labelled, port-bound, cache mounted).
 */
export function buildRunArgs(spec: ServiceLaunchSpec): string[] {
  const args = [
    'run',
    '-d',
    '--label',
    `${spec.labelKey}=${spec.label}`,
    '-p',
    `${spec.hostPort}:${spec.containerPort}`,
    '-v',
    `${spec.hostCacheDir}:${spec.containerCacheDir}`,
  ];
  for (const [key, value] of Object.entries(spec.env)) {
    args.push('-e', `${key}=${value}`);
  }
  args.push(spec.image);
  return args;
}

export class DockerServiceLauncher implements ServiceLauncher {
  private readonly dockerPath: string;
  private readonly logger: Logger;
  private readonly run: CommandRunner;

  constructor(options: DockerServiceLauncherOptions = {}) {
    this.dockerPath = options.dockerPath ?? 'docker';
    this.logger = options.logger ?? createLogger('docker-launcher');
    this.run = options.run ?? execaRunner;
  }

  public async findRunning(label: string, labelKey: string, containerPort: number): Promise<ServiceEndpoint | null> {
    let stdout: string;
    try {
      stdout = await this.docker(['ps', '-q', '--filter', `label=${labelKey}=${label}`, '--filter', 'status=running']);
    } catch (error) {
      throw new ServiceStartError(label, `Failed to list containers: ${describeError(error)}`, undefined, {
        cause: error,
      });
    }

    const containerId = stdout.split(/\r?\n/).map((line) => line.trim()).find(Boolean);
    if (!containerId) {
      return null;
    }

    const endpoint = await this.resolvePort(label, containerId, containerPort);
    this.logger.info({ label, containerId, ...endpoint }, 'Found running container');
    return endpoint;
  }

  public async launch(spec: ServiceLaunchSpec): Promise<ServiceEndpoint> {
    this.logger.info({ label: spec.label, image: spec.image, hostPort: spec.hostPort }, 'Starting container');

    let stdout: string;
    try {
      stdout = await this.docker(buildRunArgs(spec));
    } catch (error) {
      throw new ServiceStartError(spec.label, `Failed to start container: ${describeError(error)}`, {
        image: spec.image,
      }, { cause: error });
    }

    const containerId = stdout.trim().split(/\r?\n/).pop()?.trim();
    if (!containerId) {
      throw new ServiceStartError(spec.label, 'docker run did not report a container id', { image: spec.image });
    }

    return this.resolvePort(spec.label, containerId, spec.containerPort);
  }

  private async resolvePort(label: string, containerId: string, containerPort: number): Promise<ServiceEndpoint> {
    let stdout: string;
    try {
      stdout = await this.docker(['port', containerId, `${containerPort}/tcp`]);
    } catch (error) {
      throw new ServiceStartError(label, `Failed to resolve published port: ${describeError(error)}`, {
        containerId,
      }, { cause: error });
    }

    const binding = parsePortBinding(stdout);
    if (!binding) {
      throw new ServiceStartError(label, `Container port ${containerPort} is not published`, {
        containerId,
        output: stdout,
      });
    }
    return { ...binding, containerId };
  }

  private async docker(args: readonly string[]): Promise<string> {
    return this.run(this.dockerPath, args);
  }
}
