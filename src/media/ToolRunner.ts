/**
 * Runs an external command-line tool and collects its output.
 */

import { spawn } from 'node:child_process';
import { ToolError } from '../core/errors';

export interface ToolResult {
  /** Exit code, or null when the process was killed by a signal */
  code: number | null;
  stdout: string;
  stderr: string;
}

export type ToolRunner = (command: string, args: readonly string[]) => Promise<ToolResult>;

/**
 * Spawn `command` with `args` (no shell) and wait for it to exit.
 * Rejects with ToolError only when the process cannot be started; a
 * non-zero exit is reported through `code`.
 */
export const runTool: ToolRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', err => {
      reject(new ToolError(command, err.message));
    });
    child.on('close', code => {
      resolve({ code, stdout, stderr });
    });
  });
