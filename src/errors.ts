import { canonicalize } from "json-canonicalize";
import {
  TransportErrorCode,
  type Direction,
  type SocketId,
  type TransportLibrary,
} from "./types";

export class TransportPollerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RegistrationConflictError extends TransportPollerError {
  readonly socketId: SocketId;
  readonly direction: Direction;

  constructor(socketId: SocketId, direction: Direction) {
    super(`Socket ${socketId} already has a pending ${direction} waiter`);
    this.socketId = socketId;
    this.direction = direction;
  }
}

export class PollerShutdownError extends TransportPollerError {
  constructor(message = "Readiness poller has been shut down") {
    super(message);
  }
}

export class ReadinessQueryError extends TransportPollerError {
  constructor(cause: unknown) {
    super(
      `Readiness query failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause }
    );
  }
}

export class SocketClosedError extends TransportPollerError {
  readonly socketId: SocketId;

  constructor(socketId: SocketId) {
    super(`Socket ${socketId} was closed while waiting for readiness`);
    this.socketId = socketId;
  }
}

export class IoRetryExhaustedError extends TransportPollerError {
  constructor(operation: string, socketId: SocketId, attempts: number) {
    super(
      `${operation} on socket ${socketId} still would block after ${attempts} retries`
    );
  }
}

export class ConfigError extends TransportPollerError {
  readonly key: string;

  constructor(key: string, detail: string) {
    super(`Invalid configuration for ${key}: ${detail}`);
    this.key = key;
  }
}

export type ErrorContext = { [key: string]: string | number | boolean | null };

/**
 * A failed transport call, with the native error code and whatever the
 * call site captured about its arguments.
 */
export class TransportError extends TransportPollerError {
  readonly code: number;
  readonly context: ErrorContext;

  constructor(
    message: string,
    code: number,
    context: ErrorContext = {},
    options?: { cause?: unknown }
  ) {
    const rendered =
      Object.keys(context).length > 0 ? ` ${canonicalize(context)}` : "";
    super(`${message}${rendered}`, options);
    this.code = code;
    this.context = context;
  }

  /**
   * Rethrow `error` as a TransportError naming the failed operation. A
   * TransportError keeps its code; anything else is reported with code 0.
   */
  static wrap(
    error: unknown,
    operation: string,
    context: ErrorContext = {}
  ): TransportError {
    if (error instanceof TransportError) {
      return new TransportError(
        `${operation} failed: ${error.message}`,
        error.code,
        context,
        { cause: error }
      );
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new TransportError(
      `${operation} failed: ${detail}`,
      TransportErrorCode.SUCCESS,
      context,
      { cause: error }
    );
  }
}

/**
 * Throw if the transport has a pending error, clearing it first so the
 * next call starts clean.
 */
export function checkTransportErrors(lib: TransportLibrary): void {
  const info = lib.getLastError();
  if (info.code !== TransportErrorCode.SUCCESS) {
    lib.clearLastError();
    throw new TransportError(info.message, info.code);
  }
}
