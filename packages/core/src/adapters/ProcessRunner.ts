/**
 * ProcessRunner - seam between the CLI adapter and child processes.
 *
 * The CLI adapter only ever talks to this interface, so tests substitute a
 * recording fake and never need a docker binary.
 */

import { spawn } from 'node:child_process';

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ProcessRunOptions {
  /** Working directory; defaults to the current process's */
  cwd?: string;
  /** Text written to the child's stdin before it is closed */
  stdin?: string;
}

export interface ProcessRunner {
  /**
   * Run a command to completion. Resolves with its exit code and output
   * whatever the exit code; rejects only if the process could not start.
   */
  run(command: string, args: readonly string[], options?: ProcessRunOptions): Promise<ProcessResult>;
}

/**
 * Runs commands through the system shell with `child_process.spawn`.
 */
export class NodeProcessRunner implements ProcessRunner {
  run(command: string, args: readonly string[], options: ProcessRunOptions = {}): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        shell: true,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', reject);
      child.on('close', (code) => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });

      // The child may exit before reading stdin; EPIPE is not a failure here
      child.stdin.on('error', () => undefined);
      child.stdin.end(options.stdin ?? '');
    });
  }
}
