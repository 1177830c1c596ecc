/**
 * DockerCliAdapter - drives containers through the `docker` binary.
 *
 * Every operation is one docker invocation built by the argument builders
 * and decoded by the CLI output parsers. Registry credentials, when given,
 * are used once at construction for `docker login --password-stdin`.
 */

import type { Container } from '../models/Container';
import type { Network } from '../models/Network';
import type { Stats } from '../models/Stats';
import {
  TIMEOUT_EXIT_CODE,
  buildExecInvocation,
  buildListArguments,
  buildNetworkCreateArguments,
  buildNetworkDisconnectArguments,
  buildRemoveArguments,
  buildRunArguments,
  buildStatsArguments,
  quoteToken,
} from '../builders/arguments';
import { parseContainerLines, parseNetworkLines, parseStatsLines, splitLines } from '../parsers/cliOutput';
import type { ILogger } from '../services/Logger';
import { AdapterConfig, resolveAdapterConfig } from '../types/config';
import { BackendInvocationError, TimeoutError, errorMessage } from '../types/errors';
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
} from '../types/specs';
import type { Adapter } from './Adapter';
import { NodeProcessRunner, ProcessResult, ProcessRunOptions, ProcessRunner } from './ProcessRunner';

export interface DockerCliAdapterOptions {
  /** docker-compatible binary, default `docker` */
  binary?: string;
  runner?: ProcessRunner;
  config?: Partial<AdapterConfig>;
  credentials?: RegistryCredentials;
  /** Working directory for every invocation */
  cwd?: string;
  logger?: ILogger;
  /** Epoch milliseconds source for provenance labels */
  clock?: () => number;
}

export class DockerCliAdapter implements Adapter {
  readonly type = 'cli';

  private readonly binary: string;
  private readonly runner: ProcessRunner;
  private readonly config: AdapterConfig;
  private readonly cwd?: string;
  private logger?: ILogger;
  private readonly clock: () => number;
  private loginAttempt: Promise<boolean>;

  constructor(options: DockerCliAdapterOptions = {}) {
    this.binary = options.binary ?? 'docker';
    this.runner = options.runner ?? new NodeProcessRunner();
    this.config = resolveAdapterConfig(options.config);
    this.cwd = options.cwd;
    this.logger = options.logger?.child({ component: 'DockerCliAdapter' });
    this.clock = options.clock ?? Date.now;
    this.loginAttempt = options.credentials ? this.login(options.credentials) : Promise.resolve(true);
  }

  /**
   * Outcome of the construction-time `docker login`: true when it succeeded
   * or no credentials were given. Operations never wait for it.
   */
  loginStatus(): Promise<boolean> {
    return this.loginAttempt;
  }

  getConfig(): AdapterConfig {
    return this.config;
  }

  async createNetwork(name: string, options: CreateNetworkOptions = {}): Promise<void> {
    await this.invoke('network create', buildNetworkCreateArguments(name, options.internal));
  }

  async removeNetwork(name: string): Promise<void> {
    await this.invoke('network rm', ['network', 'rm', quoteToken(name)]);
  }

  async networkConnect(container: string, network: string): Promise<void> {
    await this.invoke('network connect', ['network', 'connect', quoteToken(network), quoteToken(container)]);
  }

  async networkDisconnect(
    container: string,
    network: string,
    options: NetworkDisconnectOptions = {},
  ): Promise<void> {
    await this.invoke('network disconnect', buildNetworkDisconnectArguments(container, network, options.force));
  }

  async listNetworks(): Promise<Network[]> {
    const result = await this.invoke('network ls', ['network', 'ls', '--format', 'json']);
    return parseNetworkLines(result.stdout);
  }

  async getStats(options: StatsOptions = {}): Promise<Stats[]> {
    const { container, filters } = options;
    let containerIds: string[];

    if (container === undefined) {
      const containers = await this.list({ filters });
      containerIds = containers.map((c) => c.id);
    } else {
      containerIds = [container];
    }

    if (containerIds.length === 0 && filters !== undefined && Object.keys(filters).length > 0) {
      return [];
    }

    const result = await this.invoke('stats', buildStatsArguments(containerIds));
    return parseStatsLines(result.stdout);
  }

  async pull(image: string): Promise<void> {
    await this.invoke('pull', ['pull', quoteToken(image)]);
  }

  async list(options: ListOptions = {}): Promise<Container[]> {
    const result = await this.invoke('ps', buildListArguments(options.filters));
    return parseContainerLines(result.stdout);
  }

  async run(spec: RunSpec): Promise<string> {
    const result = await this.invoke('run', buildRunArguments(spec, this.config, this.clock()));
    // Pull progress may precede the ID; the ID is always the last line
    const lines = splitLines(result.stdout);
    const containerId = lines[lines.length - 1] ?? '';
    this.logger?.info({ name: spec.name, containerId }, 'Container started');
    return containerId;
  }

  async execute(spec: ExecSpec): Promise<ExecuteResult> {
    const { command, args } = buildExecInvocation(spec, this.binary);
    const result = await this.spawn(command, args);

    if (result.exitCode === TIMEOUT_EXIT_CODE && spec.timeout !== undefined && spec.timeout > 0) {
      this.logger?.warn({ name: spec.name, timeout: spec.timeout }, 'Exec timed out');
      throw new TimeoutError('exec', spec.timeout);
    }
    if (result.exitCode !== 0) {
      throw this.failure('exec', result);
    }
    return { stdout: result.stdout, stderr: result.stderr };
  }

  async remove(name: string, options: RemoveOptions = {}): Promise<void> {
    const result = await this.spawn(this.binary, buildRemoveArguments(name, options.force));

    if (result.exitCode !== 0) {
      throw this.failure('rm', result);
    }
    // docker echoes the removed name; exit 0 without it means nothing was removed
    if (!result.stdout.includes(name)) {
      const diagnostic = result.stderr.trim() || `'${name}' not found in output: ${result.stdout.trim()}`;
      this.logger?.warn({ name }, 'docker rm succeeded without confirming removal');
      throw new BackendInvocationError('rm', diagnostic, { exitCode: result.exitCode });
    }
  }

  setNamespace(namespace: string): DockerCliAdapter {
    return this.withConfig({ namespace });
  }

  setCpus(cpus: number): DockerCliAdapter {
    return this.withConfig({ cpus });
  }

  setMemory(mb: number): DockerCliAdapter {
    return this.withConfig({ memory: mb });
  }

  setSwap(mb: number): DockerCliAdapter {
    return this.withConfig({ swap: mb });
  }

  private withConfig(changes: Partial<AdapterConfig>): DockerCliAdapter {
    const copy = new DockerCliAdapter({
      binary: this.binary,
      runner: this.runner,
      config: resolveAdapterConfig(changes, this.config),
      cwd: this.cwd,
      clock: this.clock,
    });
    copy.logger = this.logger;
    copy.loginAttempt = this.loginAttempt;
    return copy;
  }

  private async login(credentials: RegistryCredentials): Promise<boolean> {
    const args = ['login', '--username', quoteToken(credentials.username), '--password-stdin'];
    if (credentials.serverAddress) {
      args.push(quoteToken(credentials.serverAddress));
    }

    try {
      await this.invoke('login', args, { stdin: credentials.password, cwd: this.cwd ?? '.' });
      return true;
    } catch (error) {
      this.logger?.error({ username: credentials.username }, `docker login failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private spawn(command: string, args: string[], options: ProcessRunOptions = {}): Promise<ProcessResult> {
    this.logger?.debug({ command, subcommand: args[0] }, 'Invoking docker');
    return this.runner.run(command, args, { cwd: this.cwd, ...options });
  }

  /**
   * Run docker and raise BackendInvocationError on a non-zero exit.
   */
  private async invoke(operation: string, args: string[], options?: ProcessRunOptions): Promise<ProcessResult> {
    const result = await this.spawn(this.binary, args, options);
    if (result.exitCode !== 0) {
      throw this.failure(operation, result);
    }
    return result;
  }

  private failure(operation: string, result: ProcessResult): BackendInvocationError {
    this.logger?.warn({ operation, exitCode: result.exitCode }, 'docker command failed');
    return new BackendInvocationError(operation, result.stderr || result.stdout, { exitCode: result.exitCode });
  }
}
