/**
 * Adapter interface - one implementation per container backend.
 *
 * Callers program against this interface and pick a backend at
 * construction time (DockerCliAdapter or DockerApiAdapter). Every mutating
 * operation fails fast with BackendInvocationError; nothing is retried.
 */

import type { Container } from '../models/Container';
import type { Network } from '../models/Network';
import type { Stats } from '../models/Stats';
import type { AdapterConfig } from '../types/config';
import type {
  CreateNetworkOptions,
  ExecSpec,
  ExecuteResult,
  ListOptions,
  NetworkDisconnectOptions,
  RemoveOptions,
  RunSpec,
  StatsOptions,
} from '../types/specs';

export type BackendType = 'cli' | 'api';

export interface Adapter {
  /** The backend this adapter drives */
  readonly type: BackendType;

  /** Resource limits and namespace applied by `run` */
  getConfig(): AdapterConfig;

  createNetwork(name: string, options?: CreateNetworkOptions): Promise<void>;

  removeNetwork(name: string): Promise<void>;

  networkConnect(container: string, network: string): Promise<void>;

  networkDisconnect(container: string, network: string, options?: NetworkDisconnectOptions): Promise<void>;

  listNetworks(): Promise<Network[]>;

  /**
   * Usage statistics for one container, or for every container matching
   * `filters`. Resolves to [] when filters match no container.
   */
  getStats(options?: StatsOptions): Promise<Stats[]>;

  pull(image: string): Promise<void>;

  /** All containers, running or not */
  list(options?: ListOptions): Promise<Container[]>;

  /**
   * Create and start a detached container.
   * @returns The new container's ID
   */
  run(spec: RunSpec): Promise<string>;

  /**
   * Run a command in a running container.
   * Raises TimeoutError when `spec.timeout` elapses.
   */
  execute(spec: ExecSpec): Promise<ExecuteResult>;

  remove(name: string, options?: RemoveOptions): Promise<void>;

  // Configuration. Each returns a new adapter on the same backend with the
  // changed setting; the receiver is left untouched.
  setNamespace(namespace: string): Adapter;
  setCpus(cpus: number): Adapter;
  setMemory(mb: number): Adapter;
  setSwap(mb: number): Adapter;
}
