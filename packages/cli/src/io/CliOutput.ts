/**
 * CliOutput - user-facing output for the harbormaster CLI
 *
 * Command results go to stdout, diagnostics to stderr. This is the only
 * module that writes to the console; everything else logs through pino.
 */

import { format } from 'node:util';

type Writer = (message: string) => void;

const defaultStdout: Writer = (message) => console.log(message);
const defaultStderr: Writer = (message) => console.error(message);

let stdoutWriter: Writer = defaultStdout;
let stderrWriter: Writer = defaultStderr;

/**
 * Write a line to stdout.
 */
export function output(...args: unknown[]): void {
  stdoutWriter(format(...args));
}

/**
 * Write a line to stderr.
 */
export function outputError(...args: unknown[]): void {
  stderrWriter(format(...args));
}

/**
 * Redirect output, e.g. for tests.
 * Returns a function that restores the console writers.
 */
export function captureOutput(onStdout: Writer, onStderr: Writer): () => void {
  stdoutWriter = onStdout;
  stderrWriter = onStderr;
  return () => {
    stdoutWriter = defaultStdout;
    stderrWriter = defaultStderr;
  };
}
