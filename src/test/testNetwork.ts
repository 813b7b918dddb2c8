import { afterEach, describe, expect, it, vi } from "vitest";
import { Endpoint } from "../endpoint";
import { ReadinessQueryError, SocketClosedError } from "../errors";
import { logger } from "../logger";
import { NetworkService } from "../network";
import { MemoryTransport } from "./memoryTransport";

function settle<T>(promise: Promise<T>): Promise<unknown> {
  return promise.then(
    (value) => value,
    (error: unknown) => error
  );
}

describe("NetworkService", () => {
  let service: NetworkService<number>;
  let transport: MemoryTransport;

  function setup() {
    transport = new MemoryTransport(64);
    service = new NetworkService({
      transport,
      readiness: transport,
      config: { pollTimeoutMs: 1000, logLevel: "error" },
    });
  }

  afterEach(async () => {
    vi.restoreAllMocks();
    await service.shutdown();
  });

  it("carries bytes between two sockets it opened", async () => {
    setup();
    service.start();
    const server = service.socket();
    server.bind(Endpoint.parse("127.0.0.1:7000"));
    server.listen();

    const client = service.socket();
    client.connectTo(Endpoint.parse("127.0.0.1:7000"));
    const peer = await service.accept(server);

    const buffer = new Uint8Array(32);
    const read = peer.readSome(buffer);
    await client.write(new TextEncoder().encode("ping"));

    expect(await read).toBe(4);
    expect(new TextDecoder().decode(buffer.subarray(0, 4))).toBe("ping");
    expect(service.poller.state).toBe("running");
  });

  it("closes its sockets before stopping the poller", async () => {
    setup();
    const server = service.socket();
    server.bind(Endpoint.parse("127.0.0.1:7001"));
    server.listen();
    const client = service.socket();
    client.connectTo(Endpoint.parse("127.0.0.1:7001"));
    const peer = await service.accept(server);

    const pending = settle(peer.readSome(new Uint8Array(8)));
    await service.shutdown();

    expect(await pending).toBeInstanceOf(SocketClosedError);
    expect([server, client, peer].map((socket) => socket.isOpen())).toEqual([
      false,
      false,
      false,
    ]);
    expect(service.poller.state).toBe("stopped");
  });

  it("stops tracking sockets once they are closed", async () => {
    setup();
    for (let i = 0; i < 100; i++) {
      service.socket().close();
    }
    expect(service.openSockets()).toBe(0);

    const server = service.socket();
    server.bind(Endpoint.parse("127.0.0.1:7003"));
    server.listen();
    const client = service.socket();
    client.connectTo(Endpoint.parse("127.0.0.1:7003"));
    const peer = await service.accept(server);
    expect(service.openSockets()).toBe(3);

    peer.close();
    client.close();
    expect(service.openSockets()).toBe(1);
  });

  it("logs at its own level without touching the shared logger", () => {
    transport = new MemoryTransport(64);
    const shared = logger.level;
    const info = vi.spyOn(console, "log").mockImplementation(() => {});
    const verbose = new NetworkService({
      transport,
      readiness: transport,
      config: { pollTimeoutMs: 1000, logLevel: "info" },
    });
    service = new NetworkService({
      transport,
      readiness: transport,
      config: { pollTimeoutMs: 1000, logLevel: "warn" },
    });

    expect(verbose.logger.level).toBe("info");
    expect(service.logger.level).toBe("warn");
    expect(logger.level).toBe(shared);

    verbose.start();
    service.start();
    expect(info).toHaveBeenCalledTimes(1);
    expect(String(info.mock.calls[0][0])).toContain(
      "[Poller] Started (poll timeout 1000 ms)."
    );
    return verbose.shutdown();
  });

  it("fails waiting sockets when the readiness query breaks", async () => {
    setup();
    vi.spyOn(console, "error").mockImplementation(() => {});
    const server = service.socket();
    server.bind(Endpoint.parse("127.0.0.1:7002"));
    server.listen();

    const accepting = settle(server.accept());
    transport.failNextQuery(new Error("readiness set corrupted"));

    const outcome = await accepting;
    expect(outcome).toBeInstanceOf(ReadinessQueryError);
    expect(service.poller.state).toBe("failed");
  });
});
