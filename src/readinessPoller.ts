import { EventEmitter } from "events";
import { resolveConfig, type PollerConfigType } from "./config";
import {
  PollerShutdownError,
  ReadinessQueryError,
  SocketClosedError,
} from "./errors";
import { logger, type Logger } from "./logger";
import { Deferred } from "./promise";
import {
  DIRECTIONS,
  type Direction,
  type ReadinessQuery,
  type ReadinessReport,
  type SocketId,
} from "./types";
import { WaitRegistry } from "./waitRegistry";

export type PollerState = "idle" | "running" | "stopping" | "stopped" | "failed";

export interface PollerStats {
  iterations: number;
  fulfilled: number;
  unmatched: number;
  failed: number;
}

/**
 * Watches transport sockets for readiness on a single background loop and
 * wakes the one task waiting on each (socket, direction) pair.
 *
 * Events:
 * - `"fatal"` (error) when the loop gives up: a ReadinessQueryError when
 *   the readiness query throws, otherwise whatever broke the loop.
 *   A listener that throws is logged and does not affect shutdown.
 * - `"stopped"` once the loop has exited after {@link stop}.
 */
export class ReadinessPoller<H = unknown> extends EventEmitter {
  readonly pollTimeoutMs: number;

  private readonly log: Logger;
  private readonly readiness: ReadinessQuery<H>;
  private readonly registries: { [direction in Direction]: WaitRegistry } = {
    read: new WaitRegistry("read"),
    write: new WaitRegistry("write"),
  };
  private readonly abort = new AbortController();
  private readonly counters: PollerStats = {
    iterations: 0,
    fulfilled: 0,
    unmatched: 0,
    failed: 0,
  };

  private _state: PollerState = "idle";
  private session: { handle: H } | null = null;
  private loop: Promise<void> = Promise.resolve();
  private stopping: Promise<void> | null = null;
  private fatalError: Error | null = null;

  constructor(
    readiness: ReadinessQuery<H>,
    config: Partial<PollerConfigType> = {},
    log: Logger = logger
  ) {
    super();
    this.readiness = readiness;
    this.log = log;
    this.pollTimeoutMs = resolveConfig(config).pollTimeoutMs;
  }

  get state(): PollerState {
    return this._state;
  }

  /**
   * Create the readiness handle and launch the loop. Calling it on a running
   * poller does nothing; a poller that has been stopped cannot be restarted.
   */
  start() {
    switch (this._state) {
      case "running":
        return;
      case "failed":
        throw this.fatalError ?? new PollerShutdownError();
      case "stopping":
      case "stopped":
        throw new PollerShutdownError("Readiness poller cannot be restarted");
      case "idle":
        break;
    }
    const session = { handle: this.readiness.create() };
    this.session = session;
    this._state = "running";
    this.log.info(
      `🚀 [Poller] Started (poll timeout ${this.pollTimeoutMs} ms).`
    );
    this.loop = this.run(session.handle);
  }

  /** Suspend until `socketId` can be read without blocking. */
  waitForRead(socketId: SocketId): Promise<void> {
    return this.waitFor("read", socketId);
  }

  /** Suspend until `socketId` can be written without blocking. */
  waitForWrite(socketId: SocketId): Promise<void> {
    return this.waitFor("write", socketId);
  }

  /**
   * Drop a socket from the readiness set and fail whatever is waiting on it.
   * Used when the socket is closed.
   */
  forget(socketId: SocketId) {
    const error = new SocketClosedError(socketId);
    for (const direction of DIRECTIONS) {
      const handle = this.registries[direction].takeAndRemove(socketId);
      if (handle && handle.reject(error)) {
        this.counters.failed++;
      }
      if (this.session) {
        this.disarm(this.session.handle, socketId, direction);
      }
    }
  }

  /**
   * Stop the loop and fail every pending wait with PollerShutdownError.
   * Resolves once the loop has exited and the readiness handle is released.
   */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    this.stopping = this.shutdown();
    return this.stopping;
  }

  isWaiting(socketId: SocketId, direction: Direction): boolean {
    return this.registries[direction].has(socketId);
  }

  pending(direction: Direction): SocketId[] {
    return this.registries[direction].socketIds();
  }

  stats(): PollerStats {
    return { ...this.counters };
  }

  private async waitFor(direction: Direction, socketId: SocketId) {
    if (this._state === "idle") {
      this.start();
    }
    if (this._state === "failed") {
      throw this.fatalError ?? new PollerShutdownError();
    }
    if (this._state !== "running" || !this.session) {
      throw new PollerShutdownError();
    }

    const registry = this.registries[direction];
    const handle = new Deferred<void>();
    registry.register(socketId, handle);
    try {
      this.readiness.arm(this.session.handle, socketId, direction);
    } catch (error) {
      registry.takeAndRemove(socketId);
      throw error;
    }
    this.log.debug(`⏳ [Poller] Socket ${socketId} waiting for ${direction}.`);
    return handle.promise;
  }

  private async run(handle: H) {
    const signal = this.abort.signal;
    try {
      while (!signal.aborted) {
        let report: ReadinessReport;
        try {
          report = await this.readiness.query(
            handle,
            this.pollTimeoutMs,
            signal
          );
        } catch (error) {
          if (signal.aborted) break;
          throw new ReadinessQueryError(error);
        }
        if (signal.aborted) break;
        this.counters.iterations++;
        this.dispatch(handle, "read", report.readReady);
        this.dispatch(handle, "write", report.writeReady);
      }
    } catch (error) {
      this.fail(
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  private dispatch(
    handle: H,
    direction: Direction,
    ready: ReadonlySet<SocketId>
  ) {
    const registry = this.registries[direction];
    for (const socketId of ready) {
      const waiter = registry.takeAndRemove(socketId);
      // re-armed by the next waitFor on this socket
      this.disarm(handle, socketId, direction);
      if (waiter) {
        if (waiter.resolve()) this.counters.fulfilled++;
      } else {
        this.counters.unmatched++;
        this.log.debug(
          `[Poller] Socket ${socketId} ready for ${direction} with no waiter.`
        );
      }
    }
  }

  private disarm(handle: H, socketId: SocketId, direction: Direction) {
    try {
      this.readiness.disarm(handle, socketId, direction);
    } catch (error) {
      this.log.warn(
        `⚠️ [Poller] Could not disarm socket ${socketId} for ${direction}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  private fail(error: Error) {
    this.fatalError = error;
    this._state = "failed";
    this.log.error(`❌ [Poller] ${error.message}. Loop terminated.`);
    this.failAll(error);
    try {
      this.releaseSession();
    } catch (releaseError) {
      this.log.warn(
        `⚠️ [Poller] Could not release readiness handle: ${
          releaseError instanceof Error
            ? releaseError.message
            : String(releaseError)
        }`
      );
    }
    try {
      this.emit("fatal", error);
    } catch (listenerError) {
      this.log.error(
        `❌ [Poller] A fatal listener threw: ${
          listenerError instanceof Error
            ? listenerError.message
            : String(listenerError)
        }`
      );
    }
  }

  private failAll(error: Error) {
    for (const direction of DIRECTIONS) {
      for (const handle of this.registries[direction].drain()) {
        if (handle.reject(error)) this.counters.failed++;
      }
    }
  }

  private releaseSession() {
    const session = this.session;
    this.session = null;
    if (session) {
      this.readiness.release(session.handle);
    }
  }

  private async shutdown() {
    if (this._state === "idle") {
      this._state = "stopped";
      return;
    }
    const wasRunning = this._state === "running";
    if (wasRunning) this._state = "stopping";
    this.abort.abort();
    this.failAll(new PollerShutdownError());
    await this.loop;
    if (!wasRunning) return;
    this.releaseSession();
    this._state = "stopped";
    this.log.info(`🛑 [Poller] Stopped after ${this.counters.iterations} polls.`);
    this.emit("stopped");
  }
}
