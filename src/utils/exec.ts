/**
 * Utilities for executing system commands
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Execute a command without a shell and return the result.
 * Never rejects: failures are reported through a non-zero exitCode.
 */
export async function executeCommand(
  command: string,
  args: string[] = [],
  options?: { timeout?: number; cwd?: string }
): Promise<ExecResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      timeout: options?.timeout || 30000,
      cwd: options?.cwd,
      maxBuffer: 10 * 1024 * 1024, // 10MB
      encoding: 'utf8',
    });

    return {
      stdout: stdout.trim(),
      stderr: stderr.trim(),
      exitCode: 0,
    };
  } catch (error) {
    return toExecResult(error);
  }
}

/**
 * Map a rejected execFile call onto an ExecResult
 */
function toExecResult(error: unknown): ExecResult {
  if (typeof error !== 'object' || error === null) {
    return { stdout: '', stderr: String(error), exitCode: 1 };
  }

  const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout.trim() : '';
  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
  const message = error instanceof Error ? error.message : '';
  // `code` is the exit status, or an errno string such as ENOENT when the binary is missing
  const exitCode = 'code' in error && typeof error.code === 'number' && error.code !== 0 ? error.code : 1;

  return {
    stdout,
    stderr: stderr || message,
    exitCode,
  };
}
