// Identifier the transport library hands out for an open socket.
export type SocketId = number;

export const INVALID_SOCKET: SocketId = -1;
export const ERROR = -1;

export type Direction = "read" | "write";

export const DIRECTIONS: readonly Direction[] = ["read", "write"];

export const AF_INET = 2;

/** IPv4 socket address as the transport library sees it (network byte order). */
export interface NativeAddress {
  family: number;
  port: number;
  address: number;
}

export interface TransportErrorInfo {
  code: number;
  message: string;
}

/**
 * Error codes reported through {@link TransportLibrary.getLastError}.
 */
export const TransportErrorCode = {
  SUCCESS: 0,
  ECONNSETUP: 1000,
  ENOSERVER: 1001,
  ECONNREJ: 1002,
  ECONNFAIL: 2000,
  ECONNLOST: 2001,
  ENOCONN: 2002,
  EINVPARAM: 5003,
  EINVSOCK: 5004,
  EUNBOUNDSOCK: 5005,
  ENOLISTEN: 5006,
  EASYNCSND: 6001,
  EASYNCRCV: 6002,
} as const;

/**
 * Non-blocking socket primitives of the external transport.
 *
 * Calls report failure with {@link ERROR} or {@link INVALID_SOCKET} and
 * leave the reason in the last-error record, which stays set until
 * clearLastError() is called.
 */
export interface TransportLibrary {
  socket(): SocketId;
  connect(id: SocketId, address: NativeAddress): number;
  bind(id: SocketId, address: NativeAddress): number;
  listen(id: SocketId, backlog: number): number;
  accept(id: SocketId): SocketId;
  recv(id: SocketId, buffer: Uint8Array, max: number): number;
  send(id: SocketId, data: Uint8Array): number;
  close(id: SocketId): number;
  getPeerName(id: SocketId): NativeAddress | null;
  getSockName(id: SocketId): NativeAddress | null;
  getLastError(): TransportErrorInfo;
  clearLastError(): void;
}

export interface ReadinessReport {
  readReady: ReadonlySet<SocketId>;
  writeReady: ReadonlySet<SocketId>;
}

/**
 * OS-level readiness set. `query` resolves with whatever is ready once
 * something is, or with empty sets after `timeoutMs` or an abort.
 */
export interface ReadinessQuery<H = unknown> {
  create(): H;
  arm(handle: H, id: SocketId, direction: Direction): void;
  disarm(handle: H, id: SocketId, direction: Direction): void;
  query(
    handle: H,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<ReadinessReport>;
  release(handle: H): void;
}
