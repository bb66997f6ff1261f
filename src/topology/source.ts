/**
 * Host-backed topology source: lscpu and /proc/cmdline
 */

import type { Config } from '../config/index.js';
import { ErrorCode, ExternalToolError } from '../errors/index.js';
import type { TopologySource } from '../types/topology.js';
import { executeCommand } from '../utils/exec.js';
import { readKernelCmdline } from '../utils/proc-parser.js';

export class HostTopologySource implements TopologySource {
  constructor(private readonly config: Config['topology']) {}

  /**
   * Arguments for `lscpu`; with a sysfs override lscpu describes that
   * snapshot instead of the running host
   */
  lscpuArgs(): string[] {
    const args = ['-p'];
    if (this.config.lscpuSysfsPath) {
      args.push('-s', this.config.lscpuSysfsPath);
    }
    return args;
  }

  async readTopology(): Promise<string> {
    const command = this.config.lscpuCommand;
    const args = this.lscpuArgs();
    const result = await executeCommand(command, args, { timeout: this.config.commandTimeout });

    if (result.exitCode !== 0) {
      throw new ExternalToolError(
        `${[command, ...args].join(' ')} exited with code ${result.exitCode}: ${result.stderr}`,
        ErrorCode.LSCPU_ERROR,
        { command, args, exitCode: result.exitCode, stderr: result.stderr }
      );
    }

    return result.stdout;
  }

  async readKernelCmdline(): Promise<string> {
    return readKernelCmdline(this.config.procfsPath);
  }
}
