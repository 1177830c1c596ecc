/**
 * Orchestration - backend-agnostic entry point.
 *
 * A thin facade over one Adapter. Every operation is forwarded unchanged;
 * the setters return a new Orchestration around the re-configured adapter.
 */

import type { Adapter, BackendType } from './adapters/Adapter';
import { DockerApiAdapter } from './adapters/DockerApiAdapter';
import { DockerCliAdapter } from './adapters/DockerCliAdapter';
import type { HttpTransport } from './adapters/HttpTransport';
import type { ProcessRunner } from './adapters/ProcessRunner';
import type { Container } from './models/Container';
import type { Network } from './models/Network';
import type { Stats } from './models/Stats';
import type { ILogger } from './services/Logger';
import type { AdapterConfig } from './types/config';
import type {
  CreateNetworkOptions,
  ExecSpec,
  ExecuteResult,
  ListOptions,
  NetworkDisconnectOptions,
  RegistryCredentials,
  RemoveOptions,
  RunSpec,
  StatsOptions,
} from './types/specs';

export class Orchestration {
  constructor(private readonly adapter: Adapter) {}

  getAdapter(): Adapter {
    return this.adapter;
  }

  getConfig(): AdapterConfig {
    return this.adapter.getConfig();
  }

  createNetwork(name: string, options?: CreateNetworkOptions): Promise<void> {
    return this.adapter.createNetwork(name, options);
  }

  removeNetwork(name: string): Promise<void> {
    return this.adapter.removeNetwork(name);
  }

  networkConnect(container: string, network: string): Promise<void> {
    return this.adapter.networkConnect(container, network);
  }

  networkDisconnect(container: string, network: string, options?: NetworkDisconnectOptions): Promise<void> {
    return this.adapter.networkDisconnect(container, network, options);
  }

  listNetworks(): Promise<Network[]> {
    return this.adapter.listNetworks();
  }

  getStats(options?: StatsOptions): Promise<Stats[]> {
    return this.adapter.getStats(options);
  }

  pull(image: string): Promise<void> {
    return this.adapter.pull(image);
  }

  list(options?: ListOptions): Promise<Container[]> {
    return this.adapter.list(options);
  }

  run(spec: RunSpec): Promise<string> {
    return this.adapter.run(spec);
  }

  execute(spec: ExecSpec): Promise<ExecuteResult> {
    return this.adapter.execute(spec);
  }

  remove(name: string, options?: RemoveOptions): Promise<void> {
    return this.adapter.remove(name, options);
  }

  setNamespace(namespace: string): Orchestration {
    return new Orchestration(this.adapter.setNamespace(namespace));
  }

  setCpus(cpus: number): Orchestration {
    return new Orchestration(this.adapter.setCpus(cpus));
  }

  setMemory(mb: number): Orchestration {
    return new Orchestration(this.adapter.setMemory(mb));
  }

  setSwap(mb: number): Orchestration {
    return new Orchestration(this.adapter.setSwap(mb));
  }
}

export interface OrchestrationOptions {
  backend: BackendType;
  config?: Partial<AdapterConfig>;
  credentials?: RegistryCredentials;
  logger?: ILogger;
  /** CLI backend: docker-compatible binary */
  binary?: string;
  /** CLI backend: working directory for every invocation */
  cwd?: string;
  runner?: ProcessRunner;
  /** API backend: engine socket; ignored when `host` is set */
  socketPath?: string;
  host?: string;
  port?: number;
  apiVersion?: string;
  transport?: HttpTransport;
}

/**
 * Build an Orchestration over the requested backend.
 */
export function createOrchestration(options: OrchestrationOptions): Orchestration {
  const { backend, config, credentials, logger } = options;

  switch (backend) {
    case 'cli':
      return new Orchestration(
        new DockerCliAdapter({
          binary: options.binary,
          runner: options.runner,
          cwd: options.cwd,
          config,
          credentials,
          logger,
        }),
      );
    case 'api':
      return new Orchestration(
        new DockerApiAdapter({
          transport: options.transport,
          socketPath: options.socketPath,
          host: options.host,
          port: options.port,
          apiVersion: options.apiVersion,
          config,
          credentials,
          logger,
        }),
      );
  }
}
