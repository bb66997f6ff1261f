import { AllocationModeSchema, type AllocationMode, type SerializedSocket } from '../types/topology.js';
import { getLogger } from '../logger/index.js';
import { allocatePacked, allocateSpread } from './allocation.js';
import type { Core } from './core.js';
import type { Socket } from './socket.js';

/**
 * Discovered CPU topology of a host.
 *
 * Sockets iterate in the order they were first seen in the topology source
 * (ascending on every lscpu seen so far, but not re-sorted); cores within a
 * socket always iterate by ascending core id.
 */
export class Platform {
  public readonly sockets: ReadonlyMap<number, Socket>;

  constructor(sockets: Iterable<Socket> = []) {
    this.sockets = new Map([...sockets].map(socket => [socket.socketId, socket]));
  }

  hasIsolatedCores(): boolean {
    for (const socket of this.sockets.values()) {
      if (socket.hasIsolatedCores()) {
        return true;
      }
    }
    return false;
  }

  getSocket(id: number): Socket | null {
    return this.sockets.get(id) ?? null;
  }

  getCores(mode: string = 'packed'): Core[] {
    return this.getCoresGeneral(mode, false);
  }

  getIsolatedCores(mode: string = 'packed'): Core[] {
    return this.getCoresGeneral(mode, true);
  }

  /**
   * Order the (isolated) cores for allocation. Unknown modes fall back to
   * packed with a warning.
   */
  getCoresGeneral(mode: string, isolated: boolean = false): Core[] {
    const parsed = AllocationModeSchema.safeParse(mode);
    let allocationMode: AllocationMode = 'packed';
    if (parsed.success) {
      allocationMode = parsed.data;
    } else {
      getLogger().warn(`Unknown allocation mode "${mode}", falling back to packed`);
    }

    return allocationMode === 'spread' ? this.allocateSpread(isolated) : this.allocatePacked(isolated);
  }

  allocatePacked(isolated: boolean = false): Core[] {
    return allocatePacked(this.coresBySocket(isolated));
  }

  allocateSpread(isolated: boolean = false): Core[] {
    return allocateSpread(this.coresBySocket(isolated));
  }

  getSharedCores(): Core[] {
    return [...this.sockets.values()].flatMap(socket => socket.getSharedCores());
  }

  getCoresFromPool(pool: string | null): Core[] {
    return [...this.sockets.values()].flatMap(socket => socket.getCoresFromPool(pool));
  }

  toObject(includePool: boolean = true): SerializedSocket[] {
    return [...this.sockets.values()].map(socket => socket.toObject(includePool));
  }

  private coresBySocket(isolated: boolean): Map<number, Core[]> {
    const perSocket = new Map<number, Core[]>();
    for (const [socketId, socket] of this.sockets) {
      perSocket.set(socketId, isolated ? socket.getIsolatedCores() : socket.getCores());
    }
    return perSocket;
  }
}
