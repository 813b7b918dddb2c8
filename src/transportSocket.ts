import { EventEmitter } from "events";
import { DEFAULT_CONFIG } from "./config";
import { Endpoint } from "./endpoint";
import {
  IoRetryExhaustedError,
  TransportError,
  checkTransportErrors,
  type ErrorContext,
} from "./errors";
import { logger, type Logger } from "./logger";
import type { ReadinessPoller } from "./readinessPoller";
import {
  ERROR,
  INVALID_SOCKET,
  TransportErrorCode,
  type Direction,
  type SocketId,
  type TransportLibrary,
} from "./types";

export interface TransportSocketOptions {
  maxIoRetries?: number;
  logger?: Logger;
}

/**
 * A transport socket whose reads and writes suspend on the poller instead
 * of failing with "would block".
 *
 * Every call that would block is retried as soon as the poller reports the
 * socket ready, up to `maxIoRetries` consecutive would-block outcomes.
 *
 * Emits `"close"` (socketId) once the socket has been released.
 */
export class TransportSocket extends EventEmitter {
  private readonly lib: TransportLibrary;
  private readonly poller: ReadinessPoller;
  private readonly maxIoRetries: number;
  private readonly log: Logger;
  private _id: SocketId;
  private _eof = false;

  constructor(
    lib: TransportLibrary,
    poller: ReadinessPoller,
    options: TransportSocketOptions = {},
    id: SocketId = INVALID_SOCKET
  ) {
    super();
    this.lib = lib;
    this.poller = poller;
    this.maxIoRetries = options.maxIoRetries ?? DEFAULT_CONFIG.maxIoRetries;
    this.log = options.logger ?? logger;
    this._id = id;
  }

  get id(): SocketId {
    return this._id;
  }

  isOpen(): boolean {
    return this._id !== INVALID_SOCKET;
  }

  open() {
    if (this.isOpen()) return;
    const id = this.lib.socket();
    if (id === INVALID_SOCKET) {
      throw this.failure("open", {});
    }
    this._id = id;
    this._eof = false;
    this.log.debug(`🔌 [Socket ${id}] Opened.`);
  }

  connectTo(remote: Endpoint) {
    // connecting implicitly binds to an ephemeral local endpoint
    if (this.lib.connect(this._id, remote.toNative()) === ERROR) {
      throw this.failure("connectTo", { remoteEndpoint: remote.toString() });
    }
    this.log.debug(`📡 [Socket ${this._id}] Connected to ${remote}.`);
  }

  bind(local: Endpoint) {
    if (this.lib.bind(this._id, local.toNative()) === ERROR) {
      throw this.failure("bind", { localEndpoint: local.toString() });
    }
  }

  listen(backlog = 16) {
    if (this.lib.listen(this._id, backlog) === ERROR) {
      throw this.failure("listen", { backlog });
    }
  }

  /** Wait for and return the next incoming connection on a listening socket. */
  async accept(): Promise<TransportSocket> {
    const id = await this.retryWhileBlocked(
      "accept",
      "read",
      TransportErrorCode.EASYNCRCV,
      () => this.lib.accept(this._id),
      (result) => result !== INVALID_SOCKET
    );
    this.log.debug(`🔌 [Socket ${this._id}] Accepted socket ${id}.`);
    return new TransportSocket(
      this.lib,
      this.poller,
      { maxIoRetries: this.maxIoRetries, logger: this.log },
      id
    );
  }

  remoteEndpoint(): Endpoint {
    const native = this.lib.getPeerName(this._id);
    if (native === null) {
      throw this.failure("remoteEndpoint", {});
    }
    return Endpoint.fromNative(native);
  }

  localEndpoint(): Endpoint {
    const native = this.lib.getSockName(this._id);
    if (native === null) {
      throw this.failure("localEndpoint", {});
    }
    return Endpoint.fromNative(native);
  }

  /**
   * Read up to `max` bytes into `buffer`, waiting until at least one byte is
   * available. Returns 0 once the peer has closed the connection.
   */
  async readSome(buffer: Uint8Array, max = buffer.length): Promise<number> {
    const limit = Math.min(max, buffer.length);
    const bytesRead = await this.retryWhileBlocked(
      "readSome",
      "read",
      TransportErrorCode.EASYNCRCV,
      () => this.lib.recv(this._id, buffer, limit),
      (result) => result !== ERROR,
      { max: limit }
    );
    if (bytesRead === 0 && limit > 0) {
      this._eof = true;
    }
    return bytesRead;
  }

  /**
   * Send as much of `data` as the transport takes, waiting until it takes
   * at least one byte.
   */
  async writeSome(data: Uint8Array): Promise<number> {
    if (data.length === 0) return 0;
    return this.retryWhileBlocked(
      "writeSome",
      "write",
      TransportErrorCode.EASYNCSND,
      () => this.lib.send(this._id, data),
      // a zero-byte send is a full send buffer, same as would-block
      (result) => result !== ERROR && result > 0,
      { len: data.length }
    );
  }

  /** Send every byte of `data`. */
  async write(data: Uint8Array): Promise<void> {
    let offset = 0;
    while (offset < data.length) {
      offset += await this.writeSome(data.subarray(offset));
    }
  }

  eof(): boolean {
    return this._eof;
  }

  flush() {}

  close() {
    if (!this.isOpen()) return;
    const id = this._id;
    this.poller.forget(id);
    this._id = INVALID_SOCKET;
    const result = this.lib.close(id);
    this.emit("close", id);
    if (result === ERROR) {
      throw this.failure("close", { socket: id });
    }
    this.log.debug(`👋 [Socket ${id}] Closed.`);
  }

  /**
   * Run `attempt` until `done` accepts its result. While the transport
   * reports `wouldBlock`, suspend on the poller for `direction` and retry.
   */
  private async retryWhileBlocked(
    operation: string,
    direction: Direction,
    wouldBlock: number,
    attempt: () => number,
    done: (result: number) => boolean,
    context: ErrorContext = {}
  ): Promise<number> {
    for (let retries = 0; ; retries++) {
      const result = attempt();
      if (done(result)) return result;

      const info = this.lib.getLastError();
      if (result === ERROR && info.code !== wouldBlock) {
        throw this.failure(operation, context);
      }
      this.lib.clearLastError();
      if (retries >= this.maxIoRetries) {
        throw new IoRetryExhaustedError(operation, this._id, retries);
      }
      if (direction === "read") {
        await this.poller.waitForRead(this._id);
      } else {
        await this.poller.waitForWrite(this._id);
      }
    }
  }

  private failure(operation: string, context: ErrorContext): TransportError {
    try {
      checkTransportErrors(this.lib);
    } catch (error) {
      return TransportError.wrap(error, operation, context);
    }
    return new TransportError(
      `${operation} failed without a transport error`,
      TransportErrorCode.SUCCESS,
      context
    );
  }
}
