/**
 * Isolated CPU detection from kernel boot parameters
 */

import { getLogger } from '../logger/index.js';

const INTEGER = /^\d+$/;

/** Widest A-B range expanded; CONFIG_NR_CPUS tops out at 8192 */
export const MAX_CPU_RANGE = 8192;

function parseId(token: string): number | null {
  if (!INTEGER.test(token)) {
    return null;
  }
  const id = parseInt(token, 10);
  if (!Number.isSafeInteger(id)) {
    getLogger().debug('Skipping out-of-range cpu id', { token });
    return null;
  }
  return id;
}

/**
 * Expand a kernel cpu list ("0,2-4,7") into ids. Tokens that are neither an
 * integer nor an A-B range (flags such as "nohz", "1-2-3", ""), ids beyond
 * the safe integer range and ranges wider than MAX_CPU_RANGE are skipped.
 */
export function parseCpuList(tokens: readonly string[]): number[] {
  const cpus: number[] = [];

  for (const token of tokens) {
    if (!token.includes('-')) {
      const id = parseId(token);
      if (id !== null) {
        cpus.push(id);
      }
      continue;
    }

    const bounds = token.split('-');
    if (bounds.length !== 2) {
      continue;
    }
    const first = parseId(bounds[0] ?? '');
    const last = parseId(bounds[1] ?? '');
    if (first === null || last === null) {
      continue;
    }
    if (last - first + 1 > MAX_CPU_RANGE) {
      getLogger().debug('Skipping oversized cpu range', { token });
      continue;
    }

    for (let cpu = first; cpu <= last; cpu++) {
      cpus.push(cpu);
    }
  }

  return cpus;
}

/**
 * Return the isolated CPU ids named by a /proc/cmdline line, ascending.
 *
 * A CPU counts as isolated only when both isolcpus and rcu_nocbs are given;
 * the result is then the rcu_nocbs CPUs that isolcpus does not list.
 */
export function parseIsolatedCpus(cmdline: string): number[] {
  const isolCpus: number[] = [];
  const nocbsCpus: number[] = [];

  const fields = cmdline.trimEnd().split(/\s+/).filter(field => field.length > 0);

  for (const field of fields) {
    const pair = field.split('=');
    const key = pair[0];
    const value = pair[1];
    if (pair.length !== 2 || key === undefined || value === undefined) {
      continue;
    }

    if (key === 'isolcpus') {
      for (const cpu of parseCpuList(value.split(','))) {
        isolCpus.push(cpu);
      }
    }
    if (key === 'rcu_nocbs') {
      for (const cpu of parseCpuList(value.split(','))) {
        nocbsCpus.push(cpu);
      }
    }
  }

  const cpus = new Set<number>();
  if (isolCpus.length > 0 && nocbsCpus.length > 0) {
    const isolated = new Set(isolCpus);
    for (const cpu of nocbsCpus) {
      if (!isolated.has(cpu)) {
        cpus.add(cpu);
      }
    }
  }

  return [...cpus].sort((a, b) => a - b);
}
