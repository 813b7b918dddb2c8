export { DEFAULT_CONFIG, loadConfig, resolveConfig } from "./config";
export type { PollerConfigType } from "./config";
export { Endpoint } from "./endpoint";
export {
  ConfigError,
  IoRetryExhaustedError,
  PollerShutdownError,
  ReadinessQueryError,
  RegistrationConflictError,
  SocketClosedError,
  TransportError,
  TransportPollerError,
  checkTransportErrors,
} from "./errors";
export type { ErrorContext } from "./errors";
export { Logger, logger } from "./logger";
export type { LogLevel } from "./logger";
export { NetworkService } from "./network";
export type { NetworkServiceOptions } from "./network";
export { Deferred } from "./promise";
export { ReadinessPoller } from "./readinessPoller";
export type { PollerState, PollerStats } from "./readinessPoller";
export { TransportSocket } from "./transportSocket";
export type { TransportSocketOptions } from "./transportSocket";
export {
  AF_INET,
  DIRECTIONS,
  ERROR,
  INVALID_SOCKET,
  TransportErrorCode,
} from "./types";
export type {
  Direction,
  NativeAddress,
  ReadinessQuery,
  ReadinessReport,
  SocketId,
  TransportErrorInfo,
  TransportLibrary,
} from "./types";
export { WaitRegistry } from "./waitRegistry";
export type { WaitHandle } from "./waitRegistry";
