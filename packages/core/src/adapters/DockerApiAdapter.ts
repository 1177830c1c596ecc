/**
 * DockerApiAdapter - drives containers through the Docker Engine HTTP API.
 *
 * Each operation expects one specific status code (201 created, 204 no
 * content, 200 ok); anything else raises BackendInvocationError with the
 * raw response body. Credentials travel as base64 JSON in the
 * X-Registry-Auth header of every request.
 */

import type { Container } from '../models/Container';
import { parseJson } from '../models/decode';
import type { Network } from '../models/Network';
import type { Stats } from '../models/Stats';
import {
  buildCreateContainerBody,
  buildExecCreateBody,
  encodeFilters,
  encodeRegistryAuth,
} from '../builders/requestBody';
import {
  decodeApiContainers,
  decodeApiNetworks,
  decodeApiStats,
  decodeCreatedId,
  decodeExecInspect,
} from '../parsers/apiResponses';
import { splitLines } from '../parsers/cliOutput';
import { demuxStream } from '../parsers/multiplexed';
import type { ILogger } from '../services/Logger';
import { AdapterConfig, resolveAdapterConfig } from '../types/config';
import { BackendInvocationError, TimeoutError, ValidationError } from '../types/errors';
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
import { HttpRequest, HttpResponse, HttpTransport, NodeHttpTransport } from './HttpTransport';

export interface DockerApiAdapterOptions {
  /** Defaults to a NodeHttpTransport on the given socket/host */
  transport?: HttpTransport;
  socketPath?: string;
  host?: string;
  port?: number;
  /** Prefix every path with `/v<apiVersion>`, e.g. "1.43" */
  apiVersion?: string;
  config?: Partial<AdapterConfig>;
  credentials?: RegistryCredentials;
  logger?: ILogger;
  clock?: () => number;
}

const STATUS = {
  ok: 200,
  created: 201,
  noContent: 204,
  notModified: 304,
} as const;

function segment(value: string): string {
  return encodeURIComponent(value);
}

export class DockerApiAdapter implements Adapter {
  readonly type = 'api';

  private readonly transport: HttpTransport;
  private readonly apiVersion?: string;
  private readonly config: AdapterConfig;
  private registryAuth?: string;
  private logger?: ILogger;
  private readonly clock: () => number;

  constructor(options: DockerApiAdapterOptions = {}) {
    this.transport =
      options.transport ??
      new NodeHttpTransport({ socketPath: options.socketPath, host: options.host, port: options.port });
    this.apiVersion = options.apiVersion;
    this.config = resolveAdapterConfig(options.config);
    this.registryAuth = options.credentials ? encodeRegistryAuth(options.credentials) : undefined;
    this.logger = options.logger?.child({ component: 'DockerApiAdapter' });
    this.clock = options.clock ?? Date.now;
  }

  getConfig(): AdapterConfig {
    return this.config;
  }

  async createNetwork(name: string, options: CreateNetworkOptions = {}): Promise<void> {
    if (name.trim() === '') {
      throw new ValidationError('network must not be empty', 'network');
    }
    await this.call(
      'network create',
      { method: 'POST', path: '/networks/create', body: { Name: name, Internal: options.internal ?? false } },
      [STATUS.created],
    );
  }

  async removeNetwork(name: string): Promise<void> {
    await this.call('network rm', { method: 'DELETE', path: `/networks/${segment(name)}` }, [STATUS.noContent]);
  }

  async networkConnect(container: string, network: string): Promise<void> {
    await this.call(
      'network connect',
      { method: 'POST', path: `/networks/${segment(network)}/connect`, body: { Container: container } },
      [STATUS.ok],
    );
  }

  async networkDisconnect(
    container: string,
    network: string,
    options: NetworkDisconnectOptions = {},
  ): Promise<void> {
    await this.call(
      'network disconnect',
      {
        method: 'POST',
        path: `/networks/${segment(network)}/disconnect`,
        body: { Container: container, Force: options.force ?? false },
      },
      [STATUS.ok],
    );
  }

  async listNetworks(): Promise<Network[]> {
    const response = await this.call('network ls', { method: 'GET', path: '/networks' }, [STATUS.ok]);
    return decodeApiNetworks(parseJson(response.body.toString('utf-8'), 'network list'));
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

    if (containerIds.length === 0) {
      return [];
    }

    return Promise.all(
      containerIds.map(async (id) => {
        const response = await this.call(
          'stats',
          { method: 'GET', path: `/containers/${segment(id)}/stats?stream=false` },
          [STATUS.ok],
        );
        return decodeApiStats(parseJson(response.body.toString('utf-8'), 'stats'));
      }),
    );
  }

  /**
   * Pull an image. The engine reports pull failures inside a 200 progress
   * stream, so each progress line is checked for an `error` field.
   */
  async pull(image: string): Promise<void> {
    const response = await this.call(
      'pull',
      { method: 'POST', path: `/images/create?fromImage=${encodeURIComponent(image)}` },
      [STATUS.ok],
    );

    for (const line of splitLines(response.body.toString('utf-8'))) {
      const progress = parseJson(line, 'pull progress');
      if (typeof progress === 'object' && progress !== null && 'error' in progress) {
        throw new BackendInvocationError('pull', String(progress.error), { statusCode: response.statusCode });
      }
    }
  }

  async list(options: ListOptions = {}): Promise<Container[]> {
    const query = new URLSearchParams({ all: 'true' });
    if (options.filters !== undefined && Object.keys(options.filters).length > 0) {
      query.set('filters', encodeFilters(options.filters));
    }

    const response = await this.call('ps', { method: 'GET', path: `/containers/json?${query.toString()}` }, [
      STATUS.ok,
    ]);
    return decodeApiContainers(parseJson(response.body.toString('utf-8'), 'container list'));
  }

  async run(spec: RunSpec): Promise<string> {
    if (spec.name.trim() === '') {
      throw new ValidationError('name must not be empty', 'name');
    }

    const body = buildCreateContainerBody(spec, this.config, this.clock());
    const created = await this.call(
      'run',
      { method: 'POST', path: `/containers/create?name=${encodeURIComponent(spec.name)}`, body },
      [STATUS.created],
    );
    const containerId = decodeCreatedId(parseJson(created.body.toString('utf-8'), 'container'), 'container');

    await this.call('start', { method: 'POST', path: `/containers/${segment(containerId)}/start` }, [
      STATUS.noContent,
      STATUS.notModified,
    ]);

    this.logger?.info({ name: spec.name, containerId }, 'Container started');
    return containerId;
  }

  async execute(spec: ExecSpec): Promise<ExecuteResult> {
    const created = await this.call(
      'exec',
      { method: 'POST', path: `/containers/${segment(spec.name)}/exec`, body: buildExecCreateBody(spec) },
      [STATUS.created],
    );
    const execId = decodeCreatedId(parseJson(created.body.toString('utf-8'), 'exec'), 'exec');

    const timeoutSeconds = spec.timeout !== undefined && spec.timeout > 0 ? spec.timeout : undefined;
    let started: HttpResponse;
    try {
      started = await this.call(
        'exec',
        {
          method: 'POST',
          path: `/exec/${segment(execId)}/start`,
          body: { Detach: false, Tty: false },
          timeoutMs: timeoutSeconds === undefined ? undefined : timeoutSeconds * 1000,
        },
        [STATUS.ok],
      );
    } catch (error) {
      if (error instanceof TimeoutError && timeoutSeconds !== undefined) {
        this.logger?.warn({ name: spec.name, timeout: timeoutSeconds }, 'Exec timed out');
        throw new TimeoutError('exec', timeoutSeconds);
      }
      throw error;
    }
    const output = demuxStream(started.body);

    const inspected = await this.call('exec', { method: 'GET', path: `/exec/${segment(execId)}/json` }, [
      STATUS.ok,
    ]);
    const { ExitCode } = decodeExecInspect(parseJson(inspected.body.toString('utf-8'), 'exec inspect'));
    if (ExitCode !== null && ExitCode !== 0) {
      throw new BackendInvocationError('exec', output.stderr || output.stdout, { exitCode: ExitCode });
    }

    return output;
  }

  async remove(name: string, options: RemoveOptions = {}): Promise<void> {
    await this.call(
      'rm',
      { method: 'DELETE', path: `/containers/${segment(name)}?force=${options.force === true}` },
      [STATUS.noContent],
    );
  }

  setNamespace(namespace: string): DockerApiAdapter {
    return this.withConfig({ namespace });
  }

  setCpus(cpus: number): DockerApiAdapter {
    return this.withConfig({ cpus });
  }

  setMemory(mb: number): DockerApiAdapter {
    return this.withConfig({ memory: mb });
  }

  setSwap(mb: number): DockerApiAdapter {
    return this.withConfig({ swap: mb });
  }

  private withConfig(changes: Partial<AdapterConfig>): DockerApiAdapter {
    const copy = new DockerApiAdapter({
      transport: this.transport,
      apiVersion: this.apiVersion,
      config: resolveAdapterConfig(changes, this.config),
      clock: this.clock,
    });
    copy.logger = this.logger;
    copy.registryAuth = this.registryAuth;
    return copy;
  }

  /**
   * Send a request and raise BackendInvocationError unless the status is
   * one of `expected`.
   */
  private async call(operation: string, request: HttpRequest, expected: readonly number[]): Promise<HttpResponse> {
    const headers: Record<string, string> = { ...request.headers };
    if (this.registryAuth) {
      headers['X-Registry-Auth'] = this.registryAuth;
    }
    const path = this.apiVersion ? `/v${this.apiVersion}${request.path}` : request.path;

    this.logger?.debug({ operation, method: request.method, path }, 'Calling Docker API');
    const response = await this.transport.request({ ...request, path, headers });

    if (!expected.includes(response.statusCode)) {
      this.logger?.warn({ operation, statusCode: response.statusCode }, 'Docker API call failed');
      throw new BackendInvocationError(operation, response.body.toString('utf-8'), {
        statusCode: response.statusCode,
      });
    }
    return response;
  }
}
