/**
 * CLI tests
 *
 * Commands run in-process through runCommand; the docker binary and the
 * engine socket are replaced by recording fakes.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import chalk from 'chalk';
import { createNullLogger } from '@harbormaster/core';
import { runCommand, parsePairs } from '../cli';
import type { CliDependencies } from '../cli';
import { MockHttpTransport, MockProcessRunner } from './fixtures/mockAdapters';

describe('harbormaster CLI', () => {
  let tempDir: string;
  let runner: MockProcessRunner;
  let transport: MockHttpTransport;
  let deps: CliDependencies;

  beforeEach(() => {
    chalk.level = 0;
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'harbormaster-cli-'));
    runner = new MockProcessRunner();
    transport = new MockHttpTransport();
    deps = { cwd: tempDir, homeDir: tempDir, env: {}, runner, transport, logger: createNullLogger() };
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('ps', () => {
    it('prints a table of containers', async () => {
      runner.respond('ps --all', {
        stdout: '{"ID":"0123456789abcdef","Names":"web","Status":"Up 2 minutes","Labels":"tier=web,utopia-created=1"}\n',
      });

      const result = await runCommand(['ps'], deps);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe(
        'CONTAINER ID  NAME  STATUS        LABELS\n0123456789ab  web   Up 2 minutes  tier=web,utopia-created=1',
      );
      expect(runner.calls[0].command).toBe('docker');
      expect(runner.calls[0].options?.cwd).toBe(tempDir);
    });

    it('prints JSON with --json', async () => {
      runner.respond('ps --all', { stdout: '{"ID":"abc","Names":"db","Status":"Exited (0)","Labels":""}\n' });

      const result = await runCommand(['--json', 'ps', '--filter', 'label=tier'], deps);

      expect(JSON.parse(result.stdout)).toEqual([{ id: 'abc', name: 'db', status: 'Exited (0)', labels: {} }]);
      expect(runner.calls[0].args).toEqual(['ps', '--all', '--format', 'json', '--filter', 'label=tier']);
    });

    it('reports an empty listing', async () => {
      const result = await runCommand(['ps'], deps);

      expect(result.stdout).toBe('No containers found.');
    });
  });

  describe('run', () => {
    it('passes the run flags to docker and prints the id', async () => {
      runner.respond('run -d', { stdout: 'abc123\n' });

      const result = await runCommand(
        ['run', '--name', 'web', '-e', 'FOO=a=b', '-l', 'tier=web', '--rm', '--network', 'backend', 'alpine', 'sleep', '60'],
        deps,
      );

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe('abc123');
      const args = runner.calls[0].args;
      expect(args.slice(0, 4)).toEqual(['run', '-d', '--rm', '--network="backend"']);
      expect(args).toContain('--name=web');
      expect(args.slice(-7)).toEqual(['--label', 'tier=web', '--env', 'FOO=a=b', 'alpine', 'sleep', '60']);
    });

    it('applies global resource limits', async () => {
      runner.respond('run -d', { stdout: 'abc123\n' });

      await runCommand(['--cpus', '1.5', '--memory', '256', '--namespace', 'ci', 'run', '--name', 'web', 'alpine'], deps);

      const args = runner.calls[0].args;
      expect(args).toContain('--cpus=1.5');
      expect(args).toContain('--memory=256m');
      expect(args.some((token) => token.startsWith('--label=ci-created='))).toBe(true);
    });

    it('rejects a malformed env pair with the validation exit code', async () => {
      const result = await runCommand(['run', '--name', 'web', '-e', 'NOVALUE', 'alpine'], deps);

      expect(result.exitCode).toBe(2);
      expect(result.stderr).toBe('Error: --env expects KEY=VALUE, got "NOVALUE"');
      expect(runner.calls).toHaveLength(0);
    });

    it('rejects fractional memory limits before invoking docker', async () => {
      const result = await runCommand(['--memory', '1.5', 'run', '--name', 'web', 'alpine'], deps);

      expect(result.exitCode).toBe(2);
      expect(result.stderr).toContain('Error: Invalid configuration in command line at memory:');
      expect(runner.calls).toHaveLength(0);
    });
  });

  describe('exec', () => {
    it('prints the command output', async () => {
      runner.respond('exec', { stdout: 'hi\n' });

      const result = await runCommand(['exec', 'web', '--', 'echo', 'hi'], deps);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe('hi');
      expect(runner.calls[0].args).toEqual(['exec', 'web', 'echo', 'hi']);
    });

    it('passes option-like tokens after -- to the container', async () => {
      await runCommand(['exec', 'web', '--', 'ls', '-la'], deps);

      expect(runner.calls[0].args).toEqual(['exec', 'web', 'ls', '-la']);
    });

    it('exits 124 when the command times out', async () => {
      runner.respond('timeout 5', { exitCode: 124 });

      const result = await runCommand(['exec', 'web', '--timeout', '5', '--', 'sleep', '60'], deps);

      expect(result.exitCode).toBe(124);
      expect(result.stderr).toBe('Error: Command timed out after 5s (exec)');
      expect(runner.calls[0].command).toBe('timeout');
    });
  });

  describe('rm', () => {
    it('prints the removed name', async () => {
      runner.respond('rm', { stdout: 'web\n' });

      const result = await runCommand(['rm', '-f', 'web'], deps);

      expect(result.stdout).toBe('web');
      expect(runner.calls[0].args).toEqual(['rm', '--force', 'web']);
    });

    it('fails when docker does not confirm the removal', async () => {
      runner.respond('rm', { stdout: 'other\n' });

      const result = await runCommand(['rm', 'web'], deps);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("Error: Docker error (rm): 'web' not found in output: other");
    });
  });

  describe('stats', () => {
    it('prints a table with unreported percentages dashed', async () => {
      runner.respond('stats', {
        stdout:
          '{"ID":"abc123","Name":"web","CPUPerc":"45.00%","MemPerc":"--","MemUsage":"1MiB / 2MiB","NetIO":"0B / 0B","BlockIO":"0B / 0B"}\n',
      });

      const result = await runCommand(['stats', 'abc123'], deps);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe(
        'CONTAINER  NAME  CPU %   MEM %  MEM USAGE / LIMIT  NET I/O    BLOCK I/O\n' +
          'abc123     web   45.00%  --     1.0 MiB / 2.0 MiB  0 B / 0 B  0 B / 0 B',
      );
    });

    it('exits 3 on undecodable output', async () => {
      runner.respond('stats', { stdout: '{"ID":"abc123","MemUsage":"lots / more"}\n' });

      const result = await runCommand(['stats', 'abc123'], deps);

      expect(result.exitCode).toBe(3);
    });
  });

  describe('network', () => {
    it('connects with docker argument order', async () => {
      const result = await runCommand(['network', 'connect', 'backend', 'web'], deps);

      expect(result.exitCode).toBe(0);
      expect(runner.calls[0].args).toEqual(['network', 'connect', 'backend', 'web']);
    });

    it('lists networks over the API backend', async () => {
      transport.respond('GET', '/networks', 200, [
        { Id: 'f00dbeef00112233', Name: 'bridge', Driver: 'bridge', Scope: 'local' },
      ]);

      const result = await runCommand(['--backend', 'api', 'network', 'ls'], deps);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe('NETWORK ID    NAME    DRIVER  SCOPE\nf00dbeef0011  bridge  bridge  local');
      expect(runner.calls).toHaveLength(0);
    });
  });

  describe('configuration', () => {
    it('reads the project config file', async () => {
      const configDir = path.join(tempDir, '.harbormaster');
      fs.mkdirSync(configDir, { recursive: true });
      fs.writeFileSync(path.join(configDir, 'config.json'), JSON.stringify({ binary: 'podman', cpus: 2 }));
      runner.respond('run -d', { stdout: 'abc123\n' });

      await runCommand(['run', '--name', 'web', 'alpine'], deps);

      expect(runner.calls[0].command).toBe('podman');
      expect(runner.calls[0].args).toContain('--cpus=2');
    });

    it('selects the backend from the environment', async () => {
      transport.respond('GET', '/containers/json?all=true', 200, []);

      const result = await runCommand(['ps'], { ...deps, env: { HARBORMASTER_BACKEND: 'api' } });

      expect(result.exitCode).toBe(0);
      expect(transport.requests).toHaveLength(1);
    });

    it('disposes the service container after each command', async () => {
      const logger = createNullLogger();
      const flush = vi.spyOn(logger, 'flush');

      await runCommand(['ps'], { ...deps, logger });

      expect(flush).toHaveBeenCalledTimes(1);
    });
  });

  describe('commander errors', () => {
    it('rejects an unknown command', async () => {
      const result = await runCommand(['frobnicate'], deps);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain("unknown command 'frobnicate'");
    });

    it('rejects an unknown backend', async () => {
      const result = await runCommand(['--backend', 'podman', 'ps'], deps);

      expect(result.exitCode).toBe(1);
      expect(runner.calls).toHaveLength(0);
    });

    it('prints the version', async () => {
      const result = await runCommand(['--version'], deps);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe('0.1.0');
    });
  });
});

describe('parsePairs', () => {
  it('splits on the first "="', () => {
    expect(parsePairs(['A=1', 'B=x=y', 'C='], '--env')).toEqual({ A: '1', B: 'x=y', C: '' });
  });

  it('rejects entries without a key', () => {
    expect(() => parsePairs(['=1'], '--label')).toThrow('--label expects KEY=VALUE, got "=1"');
  });
});
