/**
 * Argument construction for the docker CLI.
 *
 * The CLI backend runs docker through a shell, so every caller-supplied
 * value passes through quoteToken here and reaches docker as one argument.
 * Flags whose value is empty are left out entirely; no builder ever returns
 * an empty token.
 */

import type { AdapterConfig } from '../types/config';
import { ValidationError } from '../types/errors';
import type { ExecSpec, Filters, RunSpec } from '../types/specs';

/** Exit status of coreutils `timeout` when the command ran too long */
export const TIMEOUT_EXIT_CODE = 124;

const ENV_KEY_DISALLOWED = /[^A-Za-z0-9_.-]/g;
const SHELL_SAFE = /^[A-Za-z0-9_\-.,:/@%+=]+$/;
const DOUBLE_QUOTE_SPECIAL = /(["\\$`])/g;

/**
 * A command and its arguments.
 */
export interface Invocation {
  command: string;
  args: string[];
}

/**
 * Strip every character outside `[A-Za-z0-9_.-]` from an environment key.
 */
export function filterEnvKey(key: string): string {
  return key.replace(ENV_KEY_DISALLOWED, '');
}

/**
 * Escape a token for a POSIX shell. Tokens made only of characters the shell
 * treats literally pass through; anything else is single-quoted, with each
 * embedded `'` written as `'\''`.
 */
export function quoteToken(token: string): string {
  if (SHELL_SAFE.test(token)) {
    return token;
  }
  return `'${token.replace(/'/g, "'\\''")}'`;
}

/** `"value"` with the characters still special inside double quotes escaped */
function doubleQuote(value: string): string {
  return `"${value.replace(DOUBLE_QUOTE_SPECIAL, '\\$1')}"`;
}

function requireValue(value: string, field: string): string {
  if (value.trim() === '') {
    throw new ValidationError(`${field} must not be empty`, field);
  }
  return value;
}

function commandTokens(command: readonly string[] = []): string[] {
  return command.filter((token) => token !== '').map(quoteToken);
}

/**
 * `--env KEY=VALUE` pairs. Keys are filtered; a key with nothing left after
 * filtering is skipped.
 */
export function envArguments(env: Readonly<Record<string, string>> = {}): string[] {
  const args: string[] = [];
  for (const [rawKey, value] of Object.entries(env)) {
    const key = filterEnvKey(rawKey);
    if (key !== '') {
      args.push('--env', quoteToken(`${key}=${value}`));
    }
  }
  return args;
}

/**
 * `--label key=value` pairs. Single quotes are removed from values before
 * quoting.
 */
export function labelArguments(labels: Readonly<Record<string, string>> = {}): string[] {
  const args: string[] = [];
  for (const [key, value] of Object.entries(labels)) {
    if (key !== '') {
      args.push('--label', `${quoteToken(key)}=${quoteToken(value.replace(/'/g, ''))}`);
    }
  }
  return args;
}

/**
 * `--filter key=value` pairs for listing commands.
 */
export function filterArguments(filters: Filters = {}): string[] {
  return Object.entries(filters).flatMap(([key, value]) => ['--filter', quoteToken(`${key}=${value}`)]);
}

/**
 * Build `docker run` arguments.
 *
 * Order: detach, auto-remove, network, entrypoint, cpu/memory/swap limits
 * (only when > 0), provenance label, name, mount folder, volumes, labels,
 * workdir, hostname, env, image, command.
 *
 * @param createdAt - Epoch milliseconds for the `<namespace>-created` label
 */
export function buildRunArguments(spec: RunSpec, config: AdapterConfig, createdAt: number): string[] {
  const image = requireValue(spec.image, 'image');
  const name = requireValue(spec.name, 'name');
  const args = ['run', '-d'];

  if (spec.remove) {
    args.push('--rm');
  }
  if (spec.network) {
    args.push(`--network=${doubleQuote(spec.network)}`);
  }
  if (spec.entrypoint) {
    args.push(`--entrypoint=${doubleQuote(spec.entrypoint)}`);
  }
  if (config.cpus > 0) {
    args.push(`--cpus=${config.cpus}`);
  }
  if (config.memory > 0) {
    args.push(`--memory=${config.memory}m`);
  }
  if (config.swap > 0) {
    args.push(`--memory-swap=${config.swap}m`);
  }

  args.push(quoteToken(`--label=${config.namespace}-created=${createdAt}`), quoteToken(`--name=${name}`));

  if (spec.mountFolder) {
    args.push('--volume', quoteToken(`${spec.mountFolder}:/tmp:rw`));
  }
  for (const volume of spec.volumes ?? []) {
    if (volume !== '') {
      args.push('--volume', quoteToken(volume));
    }
  }
  args.push(...labelArguments(spec.labels));
  if (spec.workdir) {
    args.push('--workdir', quoteToken(spec.workdir));
  }
  if (spec.hostname) {
    args.push('--hostname', quoteToken(spec.hostname));
  }
  args.push(...envArguments(spec.env));

  args.push(quoteToken(image), ...commandTokens(spec.command));
  return args;
}

/**
 * Build a `docker exec` invocation. A positive timeout wraps it in
 * `timeout <seconds>`, which exits with TIMEOUT_EXIT_CODE when it fires.
 */
export function buildExecInvocation(spec: ExecSpec, binary: string): Invocation {
  const name = requireValue(spec.name, 'name');
  const args = ['exec', ...envArguments(spec.env), quoteToken(name), ...commandTokens(spec.command)];

  if (spec.timeout !== undefined && spec.timeout > 0) {
    return { command: 'timeout', args: [String(spec.timeout), binary, ...args] };
  }
  return { command: binary, args };
}

export function buildListArguments(filters?: Filters): string[] {
  return ['ps', '--all', '--format', 'json', ...filterArguments(filters)];
}

export function buildStatsArguments(containerIds: readonly string[]): string[] {
  return ['stats', '--no-trunc', '--format', 'json', '--no-stream', ...containerIds.map(quoteToken)];
}

export function buildNetworkCreateArguments(name: string, internal = false): string[] {
  const args = ['network', 'create', quoteToken(requireValue(name, 'network'))];
  if (internal) {
    args.push('--internal');
  }
  return args;
}

export function buildNetworkDisconnectArguments(container: string, network: string, force = false): string[] {
  const args = ['network', 'disconnect'];
  if (force) {
    args.push('--force');
  }
  args.push(quoteToken(network), quoteToken(container));
  return args;
}

export function buildRemoveArguments(name: string, force = false): string[] {
  const args = ['rm'];
  if (force) {
    args.push('--force');
  }
  args.push(quoteToken(requireValue(name, 'name')));
  return args;
}
