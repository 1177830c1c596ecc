/**
 * FileConfigAdapter - File-based configuration for the CLI
 *
 * Reads configuration from the first JSON file found of:
 * 1. .harbormaster/config.json (project-local)
 * 2. ~/.config/harbormaster/config.json (user global)
 *
 * Values are layered defaults < file < environment < command line, and
 * every layer is validated before it is applied.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULT_ADAPTER_CONFIG, DEFAULT_DOCKER_SOCKET, ValidationError, errorMessage } from '@harbormaster/core';
import type { AdapterConfig } from '@harbormaster/core';

const CONFIG_DIR = 'harbormaster';
const CONFIG_FILE = 'config.json';

export const CliConfigSchema = z
  .object({
    backend: z.enum(['cli', 'api']).default('cli'),
    /** docker-compatible binary for the CLI backend */
    binary: z.string().min(1).default('docker'),
    socketPath: z.string().min(1).default(DEFAULT_DOCKER_SOCKET),
    host: z.string().min(1).optional(),
    port: z.number().int().positive().optional(),
    apiVersion: z
      .string()
      .regex(/^\d+\.\d+$/, 'Expected a version like "1.43"')
      .optional(),
    namespace: z.string().min(1).default(DEFAULT_ADAPTER_CONFIG.namespace),
    cpus: z.number().nonnegative().default(DEFAULT_ADAPTER_CONFIG.cpus),
    memory: z.number().int().nonnegative().default(DEFAULT_ADAPTER_CONFIG.memory),
    swap: z.number().int().nonnegative().default(DEFAULT_ADAPTER_CONFIG.swap),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
    /** Relative paths resolve against the working directory */
    logFile: z.string().min(1).optional(),
    credentials: z
      .object({
        username: z.string(),
        password: z.string(),
        email: z.string().optional(),
        serverAddress: z.string().optional(),
      })
      .optional(),
  })
  .strict();

export type CliConfig = z.output<typeof CliConfigSchema>;

const ConfigLayerSchema = CliConfigSchema.partial();

export type ConfigLayer = z.output<typeof ConfigLayerSchema>;

/** Environment variables and the setting each overrides */
export const ENV_OVERRIDES = {
  HARBORMASTER_BACKEND: 'backend',
  HARBORMASTER_SOCKET: 'socketPath',
  HARBORMASTER_LOG_LEVEL: 'logLevel',
} as const;

export interface FileConfigOptions {
  /** Defaults to process.env */
  env?: Readonly<Record<string, string | undefined>>;
  /** Defaults to os.homedir() */
  homeDir?: string;
  /** Highest-priority values, e.g. from command-line flags; validated like the file */
  overrides?: Readonly<Record<string, unknown>>;
}

function validateLayer(value: unknown, source: string): ConfigLayer {
  const result = ConfigLayerSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : '';
    throw new ValidationError(
      `Invalid configuration in ${source}${field ? ` at ${field}` : ''}: ${issue?.message ?? 'unknown error'}`,
      field,
    );
  }
  return result.data;
}

function mergeLayers(...layers: ConfigLayer[]): ConfigLayer {
  const merged: ConfigLayer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  return merged;
}

export class FileConfigAdapter {
  private readonly config: CliConfig;
  private readonly configPath: string | null;

  /**
   * @param projectPath - Optional project directory for project-local config
   */
  constructor(projectPath?: string, options: FileConfigOptions = {}) {
    const env = options.env ?? process.env;
    this.configPath = this.findConfigPath(projectPath, options.homeDir ?? os.homedir());

    const fileLayer = this.configPath ? this.loadConfig(this.configPath) : {};
    const envLayer = validateLayer(this.readEnv(env), 'environment');
    const overrideLayer = validateLayer(options.overrides ?? {}, 'command line');

    this.config = CliConfigSchema.parse(mergeLayers(fileLayer, envLayer, overrideLayer));
  }

  /**
   * Find the configuration file. Checks project-local first, then user global.
   */
  private findConfigPath(projectPath: string | undefined, homeDir: string): string | null {
    if (projectPath) {
      const projectConfig = path.join(projectPath, `.${CONFIG_DIR}`, CONFIG_FILE);
      if (fs.existsSync(projectConfig)) {
        return projectConfig;
      }
    }

    const userConfig = path.join(homeDir, '.config', CONFIG_DIR, CONFIG_FILE);
    if (fs.existsSync(userConfig)) {
      return userConfig;
    }

    return null;
  }

  private loadConfig(configPath: string): ConfigLayer {
    const content = fs.readFileSync(configPath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ValidationError(`Malformed configuration JSON in ${configPath}: ${errorMessage(error)}`, '');
    }
    return validateLayer(parsed, configPath);
  }

  private readEnv(env: Readonly<Record<string, string | undefined>>): Record<string, string> {
    const values: Record<string, string> = {};
    for (const [name, key] of Object.entries(ENV_OVERRIDES)) {
      const value = env[name];
      if (value !== undefined && value !== '') {
        values[key] = value;
      }
    }
    return values;
  }

  get<K extends keyof CliConfig>(key: K): CliConfig[K] {
    return this.config[key];
  }

  getAll(): CliConfig {
    return { ...this.config };
  }

  /**
   * The resource limits and namespace handed to the adapter.
   */
  adapterConfig(): AdapterConfig {
    const { namespace, cpus, memory, swap } = this.config;
    return { namespace, cpus, memory, swap };
  }

  /**
   * Path of the config file in use, or null when running on defaults.
   */
  get path(): string | null {
    return this.configPath;
  }
}
