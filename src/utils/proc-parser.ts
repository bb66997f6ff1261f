/**
 * Utilities for reading the /proc filesystem
 */

import * as fs from 'fs/promises';
import { join } from 'path';
import { ErrorCode, ExternalToolError } from '../errors/index.js';

/**
 * Read a file below the given procfs mount
 */
export async function readProcFile(procfsPath: string, name: string): Promise<string> {
  const path = join(procfsPath, name);
  try {
    return await fs.readFile(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExternalToolError(
      `Failed to read ${path}: ${reason}`,
      ErrorCode.CMDLINE_READ_ERROR,
      { path },
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Read the kernel boot parameters (<procfs>/cmdline)
 */
export async function readKernelCmdline(procfsPath: string): Promise<string> {
  return readProcFile(procfsPath, 'cmdline');
}
