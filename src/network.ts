import { loadConfig, resolveConfig, type PollerConfigType } from "./config";
import { Logger } from "./logger";
import { ReadinessPoller } from "./readinessPoller";
import { TransportSocket } from "./transportSocket";
import type { ReadinessQuery, TransportLibrary } from "./types";

export interface NetworkServiceOptions<H> {
  transport: TransportLibrary;
  readiness: ReadinessQuery<H>;
  /** Overrides applied on top of the environment (see loadConfig). */
  config?: Partial<PollerConfigType>;
}

/**
 * Owns the readiness poller and every open socket created through it, so
 * that shutdown closes sockets before the poller goes away. Each service
 * logs through its own Logger at the configured level.
 */
export class NetworkService<H = unknown> {
  readonly config: PollerConfigType;
  readonly poller: ReadinessPoller<H>;
  readonly logger: Logger;
  private readonly transport: TransportLibrary;
  private sockets: Set<TransportSocket> = new Set();

  constructor(options: NetworkServiceOptions<H>) {
    this.config = resolveConfig({ ...loadConfig(), ...options.config });
    this.transport = options.transport;
    this.logger = new Logger(this.config.logLevel);
    this.poller = new ReadinessPoller(
      options.readiness,
      this.config,
      this.logger
    );
  }

  start() {
    this.poller.start();
  }

  /** Open a new socket bound to this service's poller. */
  socket(): TransportSocket {
    const socket = new TransportSocket(this.transport, this.poller, {
      maxIoRetries: this.config.maxIoRetries,
      logger: this.logger,
    });
    socket.open();
    this.track(socket);
    return socket;
  }

  /** Accept on `listener` and track the new socket for shutdown. */
  async accept(listener: TransportSocket): Promise<TransportSocket> {
    const socket = await listener.accept();
    this.track(socket);
    return socket;
  }

  /** Number of sockets opened through this service and not yet closed. */
  openSockets(): number {
    return this.sockets.size;
  }

  async shutdown() {
    this.logger.info(
      `🛑 [Network] Shutting down ${this.sockets.size} socket(s)...`
    );
    const sockets = [...this.sockets];
    this.sockets.clear();
    for (const socket of sockets) {
      try {
        socket.close();
      } catch (error) {
        this.logger.warn(
          `⚠️ [Network] Failed to close socket: ${
            error instanceof Error ? error.message : String(error)
          }`
        );
      }
    }
    await this.poller.stop();
  }

  private track(socket: TransportSocket) {
    this.sockets.add(socket);
    socket.once("close", () => this.sockets.delete(socket));
  }
}
