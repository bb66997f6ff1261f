/**
 * Core allocation orders over per-socket core lists
 */

/**
 * Concatenate the lists in socket order: every core of one socket comes
 * before any core of the next.
 */
export function allocatePacked<T>(perSocket: ReadonlyMap<number, readonly T[]>): T[] {
  const cores: T[] = [];
  for (const socketCores of perSocket.values()) {
    cores.push(...socketCores);
  }
  return cores;
}

/**
 * Round-robin over the sockets, taking the head of each list per round.
 * A socket leaves the rotation once its list is exhausted; the remaining
 * sockets keep their relative order.
 */
export function allocateSpread<T>(perSocket: ReadonlyMap<number, readonly T[]>): T[] {
  const remaining = new Map<number, T[]>();
  for (const [socketId, socketCores] of perSocket) {
    remaining.set(socketId, [...socketCores]);
  }

  const cores: T[] = [];
  while (remaining.size > 0) {
    for (const [socketId, socketCores] of [...remaining]) {
      const head = socketCores.shift();
      if (head === undefined) {
        remaining.delete(socketId);
        continue;
      }
      cores.push(head);
    }
  }
  return cores;
}
