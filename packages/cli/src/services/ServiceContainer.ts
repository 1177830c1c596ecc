/**
 * ServiceContainer - Composition root for the CLI
 *
 * Reads configuration once and wires the logger and the orchestration
 * facade for the selected backend.
 */

import * as path from 'node:path';
import { createLogger, createOrchestration } from '@harbormaster/core';
import type { HttpTransport, ILogger, Orchestration, ProcessRunner } from '@harbormaster/core';
import { FileConfigAdapter } from '../adapters/FileConfigAdapter';

export interface ServiceContainerOptions {
  /** Command-line values layered over file and environment config */
  overrides?: Readonly<Record<string, unknown>>;
  env?: Readonly<Record<string, string | undefined>>;
  homeDir?: string;
  /** Replaces the child-process runner of the CLI backend */
  runner?: ProcessRunner;
  /** Replaces the socket transport of the API backend */
  transport?: HttpTransport;
  /** Replaces the configured pino logger */
  logger?: ILogger;
}

/**
 * Container for all CLI services.
 */
export class ServiceContainer {
  public readonly config: FileConfigAdapter;
  public readonly logger: ILogger;
  public readonly orchestration: Orchestration;

  constructor(workingDirectory: string, options: ServiceContainerOptions = {}) {
    // Config first: everything else reads from it
    this.config = new FileConfigAdapter(workingDirectory, {
      env: options.env,
      homeDir: options.homeDir,
      overrides: options.overrides,
    });

    const logFile = this.config.get('logFile');
    this.logger =
      options.logger ??
      createLogger({
        level: this.config.get('logLevel'),
        file: logFile ? path.resolve(workingDirectory, logFile) : undefined,
      });

    this.orchestration = createOrchestration({
      backend: this.config.get('backend'),
      config: this.config.adapterConfig(),
      credentials: this.config.get('credentials'),
      logger: this.logger,
      binary: this.config.get('binary'),
      cwd: workingDirectory,
      runner: options.runner,
      socketPath: this.config.get('socketPath'),
      host: this.config.get('host'),
      port: this.config.get('port'),
      apiVersion: this.config.get('apiVersion'),
      transport: options.transport,
    });

    this.logger.debug(
      { backend: this.config.get('backend'), configPath: this.config.path },
      'Service container initialized',
    );
  }

  /**
   * Dispose all resources.
   */
  dispose(): void {
    this.logger.flush();
  }
}

// The container of the command in flight; runCommand disposes it when the
// command settles so a later command starts from fresh configuration.
let containerInstance: ServiceContainer | null = null;

/**
 * Build the container for one command, disposing any left from before.
 */
export function initializeContainer(
  workingDirectory: string,
  options: ServiceContainerOptions = {},
): ServiceContainer {
  containerInstance?.dispose();
  containerInstance = new ServiceContainer(workingDirectory, options);
  return containerInstance;
}

export function disposeContainer(): void {
  containerInstance?.dispose();
  containerInstance = null;
}
