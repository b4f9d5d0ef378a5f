import dgram from "node:dgram";
import net from "node:net";

/**
 * Bidirectional byte transport a client runs over. `stream` transports may split or
 * join messages arbitrarily; each `datagram` chunk carries exactly one frame.
 */
export type StunConnection = {
  framing: "stream" | "datagram";
  write: (data: Uint8Array) => void;
  close: () => void;
  onData: (handler: (chunk: Uint8Array) => void) => () => void;
  onClose: (handler: (error?: Error) => void) => () => void;
};

export type StunNetwork = "tcp" | "tcp4" | "tcp6" | "udp" | "udp4" | "udp6";

const NETWORKS: readonly StunNetwork[] = ["tcp", "tcp4", "tcp6", "udp", "udp4", "udp6"];

export interface ParsedAddress {
  host: string;
  port: number;
}

export function isStunNetwork(value: string): value is StunNetwork {
  return (NETWORKS as readonly string[]).includes(value);
}

export function parseAddress(address: string): ParsedAddress {
  const trimmed = address.trim();
  const bracketed = /^\[([^\]]+)\]:(\d+)$/.exec(trimmed);
  const plain = /^([^:\s]+):(\d+)$/.exec(trimmed);
  const match = bracketed ?? plain;
  if (!match) {
    throw new Error(`Invalid address "${address}": expected host:port`);
  }
  const [, host, rawPort] = match;
  const port = Number.parseInt(rawPort ?? "", 10);
  if (!host || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid address "${address}": port must be between 1 and 65535`);
  }
  return { host, port };
}

/**
 * Close listeners fire at most once. A listener added after the connection
 * already closed is invoked immediately.
 */
function createCloseSignal() {
  const handlers = new Set<(error?: Error) => void>();
  let closed = false;
  let closeError: Error | undefined;

  return {
    get closed() {
      return closed;
    },
    emit(error?: Error) {
      if (closed) return;
      closed = true;
      closeError = error;
      for (const handler of handlers) {
        handler(error);
      }
      handlers.clear();
    },
    subscribe(handler: (error?: Error) => void): () => void {
      if (closed) {
        handler(closeError);
        return () => {};
      }
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },
  };
}

export function wrapSocket(socket: net.Socket): StunConnection {
  const closeSignal = createCloseSignal();
  let lastError: Error | undefined;

  socket.on("error", (error) => {
    lastError = error;
  });
  socket.on("close", () => closeSignal.emit(lastError));

  return {
    framing: "stream",
    write: (data) => {
      if (closeSignal.closed || socket.destroyed) {
        throw new Error("Socket is closed");
      }
      socket.write(data);
    },
    close: () => {
      socket.destroy();
    },
    onData: (handler) => {
      const listener = (chunk: Buffer) => handler(new Uint8Array(chunk));
      socket.on("data", listener);
      return () => {
        socket.off("data", listener);
      };
    },
    onClose: (handler) => closeSignal.subscribe(handler),
  };
}

/** Wraps a UDP socket that has already been `connect()`ed to its peer. */
export function wrapUdpSocket(socket: dgram.Socket): StunConnection {
  const closeSignal = createCloseSignal();
  let lastError: Error | undefined;
  let closing = false;

  const closeSocket = () => {
    if (closing) return;
    closing = true;
    socket.close();
  };

  socket.on("error", (error) => {
    lastError = error;
    closeSocket();
  });
  socket.on("close", () => closeSignal.emit(lastError));

  return {
    framing: "datagram",
    write: (data) => {
      if (closing) {
        throw new Error("Socket is closed");
      }
      socket.send(data);
    },
    close: closeSocket,
    onData: (handler) => {
      const listener = (datagram: Buffer) => handler(new Uint8Array(datagram));
      socket.on("message", listener);
      return () => {
        socket.off("message", listener);
      };
    },
    onClose: (handler) => closeSignal.subscribe(handler),
  };
}

function udpSocketType(network: StunNetwork, host: string): dgram.SocketType {
  if (network === "udp6") return "udp6";
  if (network === "udp4") return "udp4";
  return net.isIPv6(host) ? "udp6" : "udp4";
}

function tcpFamily(network: StunNetwork): 0 | 4 | 6 {
  if (network === "tcp4") return 4;
  if (network === "tcp6") return 6;
  return 0;
}

export async function dialConnection(network: string, address: string): Promise<StunConnection> {
  if (!isStunNetwork(network)) {
    throw new Error(`Unsupported network "${network}": expected one of ${NETWORKS.join(", ")}`);
  }
  const { host, port } = parseAddress(address);

  if (network.startsWith("udp")) {
    const socket = dgram.createSocket(udpSocketType(network, host));
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        socket.close();
        reject(error);
      };
      socket.once("error", onError);
      socket.once("connect", () => {
        socket.off("error", onError);
        resolve();
      });
      socket.connect(port, host);
    });
    return wrapUdpSocket(socket);
  }

  const socket = await new Promise<net.Socket>((resolve, reject) => {
    const pending = net.connect({ host, port, family: tcpFamily(network) });
    const onError = (error: Error) => {
      pending.destroy();
      reject(error);
    };
    pending.once("error", onError);
    pending.once("connect", () => {
      pending.off("error", onError);
      resolve(pending);
    });
  });
  return wrapSocket(socket);
}
