import dgram from "node:dgram";
import net from "node:net";
import { ConfigurationError, OutputOpenError, OutputWriteError } from "@/core/error.core.js";
import type { Sink, SinkHandle } from "@/types/output.js";

// Largest UDP payload over IPv4
export const MAX_UDP_PAYLOAD = 65507;

type Transport = "udp" | "tcp";

interface NetTarget {
  transport: Transport;
  host: string;
  port: number;
}

export interface NetHandle extends SinkHandle {
  readonly path: string;
  readonly target: NetTarget;
  socket: dgram.Socket | net.Socket | null;
  lastError: Error | null;
}

export function isNetworkOutput(output: string): boolean {
  return /^(udp|tcp):\/\//.test(output);
}

export function parseNetTarget(output: string): NetTarget {
  const match = /^(udp|tcp):\/\/(\[[^\]]+\]|[^:/]+):(\d+)\/?$/.exec(output);
  if (!match) {
    throw new ConfigurationError(`Invalid network output "${output}", expected udp://host:port or tcp://host:port`);
  }

  const [, transport, host, port] = match;
  const portNumber = Number(port);
  if (portNumber < 1 || portNumber > 65535) {
    throw new ConfigurationError(`Invalid port in network output "${output}"`);
  }

  return {
    transport: transport === "udp" ? "udp" : "tcp",
    host: host.replace(/^\[|\]$/g, ""),
    port: portNumber,
  };
}

/**
 * Best-effort network output. Socket errors arrive asynchronously; they are
 * logged and make the following write fail.
 */
export class NetSink implements Sink<NetHandle> {
  readonly kind = "net";
  private readonly target: NetTarget;

  constructor(private readonly output: string) {
    this.target = parseNetTarget(output);
  }

  open(): NetHandle {
    const handle: NetHandle = { path: this.output, target: this.target, socket: null, lastError: null };
    const onError = (err: Error) => {
      console.error(`[NetSink] ${this.output}:`, err.message);
      handle.lastError = err;
    };

    try {
      if (this.target.transport === "udp") {
        const socket = dgram.createSocket(net.isIPv6(this.target.host) ? "udp6" : "udp4");
        socket.on("error", onError);
        handle.socket = socket;
      } else {
        const socket = net.createConnection({ host: this.target.host, port: this.target.port });
        socket.setNoDelay(true);
        socket.on("error", onError);
        handle.socket = socket;
      }
    } catch (err) {
      throw new OutputOpenError(this.output, { cause: err });
    }

    console.log(`[NetSink] Streaming to ${this.output}`);
    return handle;
  }

  write(handle: NetHandle, bytes: Uint8Array): void {
    if (handle.lastError) {
      throw new OutputWriteError(handle.path, { cause: handle.lastError });
    }
    if (!handle.socket) {
      throw new OutputWriteError(handle.path, { cause: new Error("Socket is closed") });
    }

    // The caller's buffer is only borrowed for this call
    const payload = Buffer.from(bytes);

    if (handle.socket instanceof dgram.Socket) {
      for (let offset = 0; offset < payload.byteLength; offset += MAX_UDP_PAYLOAD) {
        const chunk = payload.subarray(offset, offset + MAX_UDP_PAYLOAD);
        handle.socket.send(chunk, handle.target.port, handle.target.host, (err) => {
          if (err) {
            console.error(`[NetSink] UDP send to ${handle.path} failed:`, err.message);
            handle.lastError = err;
          }
        });
      }
      return;
    }

    handle.socket.write(payload);
  }

  close(handle: NetHandle): void {
    const socket = handle.socket;
    handle.socket = null;
    if (!socket) return;

    if (socket instanceof dgram.Socket) {
      socket.close();
    } else {
      socket.end();
    }
  }

  isOpen(handle: NetHandle): boolean {
    return handle.socket !== null;
  }
}
