/**
 * Request payloads for the Docker Engine API.
 */

import type { AdapterConfig } from '../types/config';
import { ValidationError } from '../types/errors';
import type { ExecSpec, Filters, RegistryCredentials, RunSpec } from '../types/specs';
import { filterEnvKey } from './arguments';

const DEFAULT_REGISTRY = 'https://index.docker.io/v1/';
const BYTES_PER_MB = 1024 * 1024;
const NANO_CPUS = 1e9;

export interface HostConfigBody {
  Binds?: string[];
  AutoRemove?: boolean;
  NetworkMode?: string;
  NanoCpus?: number;
  Memory?: number;
  MemorySwap?: number;
}

/**
 * Body of `POST /containers/create`.
 */
export interface CreateContainerBody {
  Image: string;
  Cmd?: string[];
  Entrypoint?: string[];
  WorkingDir?: string;
  Hostname?: string;
  Env?: string[];
  Labels: Record<string, string>;
  HostConfig: HostConfigBody;
}

export interface ExecCreateBody {
  AttachStdout: true;
  AttachStderr: true;
  Cmd: string[];
  Env?: string[];
}

/**
 * `KEY=VALUE` strings with filtered keys; empty keys are dropped.
 */
export function envList(env: Readonly<Record<string, string>> = {}): string[] {
  return Object.entries(env)
    .map(([key, value]) => [filterEnvKey(key), value] as const)
    .filter(([key]) => key !== '')
    .map(([key, value]) => `${key}=${value}`);
}

/**
 * Build the create-container payload. Carries the same fields as the CLI
 * `run` arguments, resource limits included.
 */
export function buildCreateContainerBody(
  spec: RunSpec,
  config: AdapterConfig,
  createdAt: number,
): CreateContainerBody {
  if (spec.image.trim() === '') {
    throw new ValidationError('image must not be empty', 'image');
  }

  const hostConfig: HostConfigBody = {};
  const binds = [
    ...(spec.mountFolder ? [`${spec.mountFolder}:/tmp:rw`] : []),
    ...(spec.volumes ?? []).filter((volume) => volume !== ''),
  ];
  if (binds.length > 0) {
    hostConfig.Binds = binds;
  }
  if (spec.remove) {
    hostConfig.AutoRemove = true;
  }
  if (spec.network) {
    hostConfig.NetworkMode = spec.network;
  }
  if (config.cpus > 0) {
    hostConfig.NanoCpus = Math.round(config.cpus * NANO_CPUS);
  }
  if (config.memory > 0) {
    hostConfig.Memory = config.memory * BYTES_PER_MB;
  }
  if (config.swap > 0) {
    hostConfig.MemorySwap = config.swap * BYTES_PER_MB;
  }

  const body: CreateContainerBody = {
    Image: spec.image,
    Labels: {
      [`${config.namespace}-created`]: String(createdAt),
      ...spec.labels,
    },
    HostConfig: hostConfig,
  };

  const command = (spec.command ?? []).filter((token) => token !== '');
  if (command.length > 0) {
    body.Cmd = command;
  }
  if (spec.entrypoint) {
    body.Entrypoint = [spec.entrypoint];
  }
  if (spec.workdir) {
    body.WorkingDir = spec.workdir;
  }
  if (spec.hostname) {
    body.Hostname = spec.hostname;
  }
  const env = envList(spec.env);
  if (env.length > 0) {
    body.Env = env;
  }

  return body;
}

export function buildExecCreateBody(spec: ExecSpec): ExecCreateBody {
  const body: ExecCreateBody = {
    AttachStdout: true,
    AttachStderr: true,
    Cmd: spec.command.filter((token) => token !== ''),
  };
  const env = envList(spec.env);
  if (env.length > 0) {
    body.Env = env;
  }
  return body;
}

/**
 * Base64 JSON credentials for the `X-Registry-Auth` header.
 */
export function encodeRegistryAuth(credentials: RegistryCredentials): string {
  const payload: Record<string, string> = {
    username: credentials.username,
    password: credentials.password,
    serveraddress: credentials.serverAddress ?? DEFAULT_REGISTRY,
  };
  if (credentials.email) {
    payload.email = credentials.email;
  }
  return Buffer.from(JSON.stringify(payload), 'utf-8').toString('base64');
}

/**
 * Engine filter encoding: `{ "label": ["a=b"] }` as JSON.
 */
export function encodeFilters(filters: Filters): string {
  const encoded: Record<string, string[]> = {};
  for (const [key, value] of Object.entries(filters)) {
    encoded[key] = [value];
  }
  return JSON.stringify(encoded);
}
