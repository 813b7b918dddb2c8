import { AF_INET, type NativeAddress } from "./types";

function swap16(value: number): number {
  return ((value & 0xff) << 8) | ((value >>> 8) & 0xff);
}

function swap32(value: number): number {
  return (
    (((value & 0xff) << 24) |
      ((value & 0xff00) << 8) |
      ((value >>> 8) & 0xff00) |
      ((value >>> 24) & 0xff)) >>>
    0
  );
}

/**
 * IPv4 address and port. The address is kept as an unsigned 32-bit integer
 * in host order, `10.0.0.1` being `0x0a000001`.
 */
export class Endpoint {
  readonly address: number;
  readonly port: number;

  constructor(address: number, port: number) {
    if (!Endpoint.isValidAddress(address)) {
      throw new RangeError(`Invalid IPv4 address: ${address}`);
    }
    if (!Endpoint.isValidPort(port)) {
      throw new RangeError(`Invalid port: ${port}`);
    }
    this.address = address;
    this.port = port;
  }

  static isValidAddress(address: number): boolean {
    return address % 1 === 0 && address >= 0 && address <= 0xffffffff;
  }

  static isValidPort(port: number): boolean {
    return port % 1 === 0 && port >= 0 && port <= 65535;
  }

  static parseAddress(host: string): number {
    const parts = host.split(".");
    if (parts.length !== 4) {
      throw new RangeError(`Invalid IPv4 address: '${host}'`);
    }
    let address = 0;
    for (const part of parts) {
      // Each part must be a numeric string and in the range [0, 255].
      if (!/^\d{1,3}$/.test(part) || parseInt(part, 10) > 255) {
        throw new RangeError(`Invalid IPv4 address: '${host}'`);
      }
      address = address * 256 + parseInt(part, 10);
    }
    return address;
  }

  /** Parse `"a.b.c.d:port"`. */
  static parse(text: string): Endpoint {
    const separator = text.lastIndexOf(":");
    if (separator < 0) {
      throw new RangeError(`Missing port in endpoint '${text}'`);
    }
    const host = text.slice(0, separator);
    const portText = text.slice(separator + 1);
    if (!/^\d+$/.test(portText)) {
      throw new RangeError(`Invalid port in endpoint '${text}'`);
    }
    return new Endpoint(Endpoint.parseAddress(host), parseInt(portText, 10));
  }

  /** Convert from the transport's native record, which is in network order. */
  static fromNative(native: NativeAddress): Endpoint {
    if (native.family !== AF_INET) {
      throw new RangeError(`Unsupported address family: ${native.family}`);
    }
    return new Endpoint(swap32(native.address), swap16(native.port));
  }

  toNative(): NativeAddress {
    return {
      family: AF_INET,
      port: swap16(this.port),
      address: swap32(this.address),
    };
  }

  host(): string {
    return [24, 16, 8, 0]
      .map((shift) => (this.address >>> shift) & 0xff)
      .join(".");
  }

  equals(other: Endpoint): boolean {
    return this.address === other.address && this.port === other.port;
  }

  toString(): string {
    return `${this.host()}:${this.port}`;
  }
}
