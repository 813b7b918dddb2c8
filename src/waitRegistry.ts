import { RegistrationConflictError } from "./errors";
import { Deferred } from "./promise";
import type { Direction, SocketId } from "./types";

export type WaitHandle = Deferred<void>;

/**
 * Pending readiness waiters for one direction, at most one per socket.
 *
 * Every method is a single synchronous map operation, so an entry can never
 * be observed half-removed by another task.
 */
export class WaitRegistry {
  readonly direction: Direction;
  private waiters: Map<SocketId, WaitHandle> = new Map();

  constructor(direction: Direction) {
    this.direction = direction;
  }

  register(socketId: SocketId, handle: WaitHandle) {
    const existing = this.waiters.get(socketId);
    if (existing && !existing.settled) {
      throw new RegistrationConflictError(socketId, this.direction);
    }
    this.waiters.set(socketId, handle);
  }

  takeAndRemove(socketId: SocketId): WaitHandle | undefined {
    const handle = this.waiters.get(socketId);
    if (handle) {
      this.waiters.delete(socketId);
    }
    return handle;
  }

  has(socketId: SocketId): boolean {
    return this.waiters.has(socketId);
  }

  get size(): number {
    return this.waiters.size;
  }

  socketIds(): SocketId[] {
    return [...this.waiters.keys()];
  }

  /** Remove and return every pending handle. */
  drain(): WaitHandle[] {
    const handles = [...this.waiters.values()];
    this.waiters.clear();
    return handles;
  }
}
