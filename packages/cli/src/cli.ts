/**
 * CLI entry point using Commander.js
 *
 * Every command resolves configuration, initializes the ServiceContainer
 * and forwards to the orchestration facade. Failures map to exit codes by
 * error class; see EXIT_CODES.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import { OrchestrationError, ValidationError, errorMessage } from '@harbormaster/core';
import type { HttpTransport, ILogger, OrchestrationErrorCode, ProcessRunner } from '@harbormaster/core';
import { disposeContainer, initializeContainer } from './services/ServiceContainer';
import type { ServiceContainer } from './services/ServiceContainer';
import { captureOutput, output, outputError } from './io/CliOutput';
import { formatContainers, formatNetworks, formatStats } from './format';

const VERSION = '0.1.0';

/** Process exit status for each error class */
export const EXIT_CODES = {
  BACKEND_INVOCATION: 1,
  VALIDATION: 2,
  PARSE: 3,
  TIMEOUT: 124,
} as const satisfies Record<OrchestrationErrorCode, number>;

/**
 * Everything the CLI would otherwise take from the process.
 */
export interface CliDependencies {
  cwd?: string;
  env?: Readonly<Record<string, string | undefined>>;
  homeDir?: string;
  runner?: ProcessRunner;
  transport?: HttpTransport;
  logger?: ILogger;
  /** Commander's own output (help, version, usage errors) */
  writeOut?: (text: string) => void;
  writeErr?: (text: string) => void;
}

type GlobalOptions = {
  backend?: string;
  socket?: string;
  namespace?: string;
  cpus?: number;
  memory?: number;
  swap?: number;
  json?: boolean;
  logLevel?: string;
};

/**
 * Parse `KEY=VALUE` entries. The value may itself contain '='.
 */
export function parsePairs(entries: readonly string[], flag: string): Record<string, string> {
  const pairs: Record<string, string> = {};
  for (const entry of entries) {
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      throw new ValidationError(`${flag} expects KEY=VALUE, got "${entry}"`, flag);
    }
    pairs[entry.slice(0, separator)] = entry.slice(separator + 1);
  }
  return pairs;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function printJson(value: unknown): void {
  output(JSON.stringify(value, null, 2));
}

/**
 * Build the program. Each call returns an independent Command tree.
 */
export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('harbormaster')
    .description('Run and inspect containers through the docker CLI or the Engine API')
    .version(VERSION)
    .exitOverride() // Throw instead of process.exit() - enables testing
    // Global options go before the command; everything after it belongs to the command
    .enablePositionalOptions()
    .configureOutput({
      writeOut: deps.writeOut ?? ((str) => process.stdout.write(str)),
      writeErr: deps.writeErr ?? ((str) => process.stderr.write(str)),
    })
    .addOption(new Option('--backend <type>', 'Backend to drive').choices(['cli', 'api']))
    .option('--socket <path>', 'Engine socket for the api backend')
    .option('--namespace <name>', 'Namespace for created resources')
    .option('--cpus <count>', 'CPU limit for new containers', parseNumber)
    .option('--memory <mb>', 'Memory limit for new containers, in MB', parseNumber)
    .option('--swap <mb>', 'Swap limit for new containers, in MB', parseNumber)
    .option('--json', 'Print results as JSON')
    .addOption(
      new Option('--log-level <level>', 'Log verbosity').choices(['debug', 'info', 'warn', 'error', 'silent']),
    );

  /**
   * Initialize the ServiceContainer from the global options of a command.
   */
  const containerFor = (command: Command): { container: ServiceContainer; json: boolean } => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const container = initializeContainer(deps.cwd ?? process.cwd(), {
      overrides: {
        backend: globals.backend,
        socketPath: globals.socket,
        namespace: globals.namespace,
        cpus: globals.cpus,
        memory: globals.memory,
        swap: globals.swap,
        logLevel: globals.logLevel,
      },
      env: deps.env,
      homeDir: deps.homeDir,
      runner: deps.runner,
      transport: deps.transport,
      logger: deps.logger,
    });
    return { container, json: globals.json === true };
  };

  program
    .command('ps')
    .description('List containers')
    .option('--filter <key=value>', 'Backend filter (repeatable)', collect)
    .action(async (options: { filter?: string[] }, command: Command) => {
      const { container, json } = containerFor(command);
      const containers = await container.orchestration.list({
        filters: parsePairs(options.filter ?? [], '--filter'),
      });

      if (json) {
        printJson(containers.map((c) => c.toJson()));
      } else if (containers.length === 0) {
        output(chalk.yellow('No containers found.'));
      } else {
        output(formatContainers(containers));
      }
    });

  program
    .command('run')
    .description('Start a detached container')
    .argument('<image>', 'Image to run')
    .argument('[command...]', 'Command and arguments')
    .requiredOption('--name <name>', 'Container name')
    .option('-e, --env <key=value>', 'Environment variable (repeatable)', collect)
    .option('-l, --label <key=value>', 'Label (repeatable)', collect)
    .option('-v, --volume <bind>', 'Bind mount source:target[:mode] (repeatable)', collect)
    .option('--network <name>', 'Network to join')
    .option('--rm', 'Remove the container when it exits')
    .option('-w, --workdir <dir>', 'Working directory inside the container')
    .option('--hostname <name>', 'Container hostname')
    .option('--entrypoint <path>', 'Override the image entrypoint')
    .option('--mount-folder <path>', 'Host folder mounted at /tmp')
    .action(
      async (
        image: string,
        args: string[],
        options: {
          name: string;
          env?: string[];
          label?: string[];
          volume?: string[];
          network?: string;
          rm?: boolean;
          workdir?: string;
          hostname?: string;
          entrypoint?: string;
          mountFolder?: string;
        },
        command: Command,
      ) => {
        const { container, json } = containerFor(command);
        const id = await container.orchestration.run({
          image,
          name: options.name,
          command: args.length > 0 ? args : undefined,
          entrypoint: options.entrypoint,
          workdir: options.workdir,
          volumes: options.volume,
          env: parsePairs(options.env ?? [], '--env'),
          mountFolder: options.mountFolder,
          labels: parsePairs(options.label ?? [], '--label'),
          hostname: options.hostname,
          remove: options.rm === true,
          network: options.network,
        });

        if (json) {
          printJson({ id });
        } else {
          output(id);
        }
      },
    );

  program
    .command('exec')
    .description('Run a command in a running container (put the command after --)')
    .argument('<container>', 'Container name or id')
    .argument('<command...>', 'Command and arguments')
    .option('-e, --env <key=value>', 'Environment variable (repeatable)', collect)
    .option('--timeout <seconds>', 'Fail when the command runs longer', parseNumber)
    .action(
      async (
        name: string,
        args: string[],
        options: { env?: string[]; timeout?: number },
        command: Command,
      ) => {
        const { container, json } = containerFor(command);
        const result = await container.orchestration.execute({
          name,
          command: args,
          env: parsePairs(options.env ?? [], '--env'),
          timeout: options.timeout,
        });

        if (json) {
          printJson(result);
          return;
        }
        if (result.stdout) {
          output(result.stdout.replace(/\n$/, ''));
        }
        if (result.stderr) {
          outputError(result.stderr.replace(/\n$/, ''));
        }
      },
    );

  program
    .command('rm')
    .description('Remove a container')
    .argument('<container>', 'Container name or id')
    .option('-f, --force', 'Remove even if running')
    .action(async (name: string, options: { force?: boolean }, command: Command) => {
      const { container } = containerFor(command);
      await container.orchestration.remove(name, { force: options.force === true });
      output(name);
    });

  program
    .command('pull')
    .description('Pull an image')
    .argument('<image>', 'Image reference')
    .action(async (image: string, _options: unknown, command: Command) => {
      const { container } = containerFor(command);
      await container.orchestration.pull(image);
      output(chalk.green(`Pulled ${image}`));
    });

  program
    .command('stats')
    .description('Sample resource usage')
    .argument('[container]', 'Only this container')
    .option('--filter <key=value>', 'Backend filter (repeatable)', collect)
    .action(async (name: string | undefined, options: { filter?: string[] }, command: Command) => {
      const { container, json } = containerFor(command);
      const stats = await container.orchestration.getStats({
        container: name,
        filters: parsePairs(options.filter ?? [], '--filter'),
      });

      if (json) {
        printJson(stats.map((s) => s.toJson()));
      } else if (stats.length === 0) {
        output(chalk.yellow('No containers to sample.'));
      } else {
        output(formatStats(stats));
      }
    });

  const network = program.command('network').description('Manage networks');

  network
    .command('ls')
    .description('List networks')
    .action(async (_options: unknown, command: Command) => {
      const { container, json } = containerFor(command);
      const networks = await container.orchestration.listNetworks();

      if (json) {
        printJson(networks.map((n) => n.toJson()));
      } else {
        output(formatNetworks(networks));
      }
    });

  network
    .command('create')
    .description('Create a network')
    .argument('<name>', 'Network name')
    .option('--internal', 'Restrict external access')
    .action(async (name: string, options: { internal?: boolean }, command: Command) => {
      const { container } = containerFor(command);
      await container.orchestration.createNetwork(name, { internal: options.internal === true });
      output(name);
    });

  network
    .command('rm')
    .description('Remove a network')
    .argument('<name>', 'Network name')
    .action(async (name: string, _options: unknown, command: Command) => {
      const { container } = containerFor(command);
      await container.orchestration.removeNetwork(name);
      output(name);
    });

  network
    .command('connect')
    .description('Connect a container to a network')
    .argument('<network>', 'Network name')
    .argument('<container>', 'Container name or id')
    .action(async (networkName: string, name: string, _options: unknown, command: Command) => {
      const { container } = containerFor(command);
      await container.orchestration.networkConnect(name, networkName);
    });

  network
    .command('disconnect')
    .description('Disconnect a container from a network')
    .argument('<network>', 'Network name')
    .argument('<container>', 'Container name or id')
    .option('-f, --force', 'Force the disconnect')
    .action(
      async (networkName: string, name: string, options: { force?: boolean }, command: Command) => {
        const { container } = containerFor(command);
        await container.orchestration.networkDisconnect(name, networkName, { force: options.force === true });
      },
    );

  return program;
}

/**
 * Parse and run `argv` (node-style, script path included).
 * Resolves to the process exit code.
 */
export async function main(argv: readonly string[] = process.argv, deps: CliDependencies = {}): Promise<number> {
  const program = createProgram(deps);

  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (err: unknown) {
    // Commander throws on exitOverride; help and version carry exit code 0
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    if (err instanceof OrchestrationError) {
      outputError(chalk.red(`Error: ${err.message}`));
      return EXIT_CODES[err.code];
    }
    outputError(chalk.red(`Error: ${errorMessage(err)}`));
    return 1;
  } finally {
    disposeContainer();
  }
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Run a command and capture its output - for testing.
 */
export async function runCommand(args: readonly string[], deps: CliDependencies = {}): Promise<CommandResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];

  const restoreOutput = captureOutput(
    (msg) => stdout.push(msg),
    (msg) => stderr.push(msg),
  );

  try {
    const exitCode = await main(['node', 'harbormaster', ...args], {
      ...deps,
      writeOut: (str) => stdout.push(str.trimEnd()),
      writeErr: (str) => stderr.push(str.trimEnd()),
    });
    return { stdout: stdout.join('\n'), stderr: stderr.join('\n'), exitCode };
  } finally {
    restoreOutput();
  }
}
