import type { StunConnection } from "../connection.js";

export interface FakeConnection {
  connection: StunConnection;
  written: Uint8Array[];
  readonly closeCalls: number;
  readonly closed: boolean;
  push(chunk: Uint8Array): void;
  emitClose(error?: Error): void;
  failWrites(error: Error): void;
}

export interface FakeConnectionOptions {
  framing?: StunConnection["framing"];
}

/** In-memory connection: tests push inbound bytes and inspect what the client wrote. */
export function createFakeConnection(options: FakeConnectionOptions = {}): FakeConnection {
  const dataHandlers = new Set<(chunk: Uint8Array) => void>();
  const closeHandlers = new Set<(error?: Error) => void>();
  const written: Uint8Array[] = [];
  let closed = false;
  let closeCalls = 0;
  let writeError: Error | null = null;

  const emitClose = (error?: Error) => {
    if (closed) return;
    closed = true;
    for (const handler of closeHandlers) {
      handler(error);
    }
    closeHandlers.clear();
  };

  const connection: StunConnection = {
    framing: options.framing ?? "stream",
    write: (data) => {
      if (writeError) {
        throw writeError;
      }
      if (closed) {
        throw new Error("Socket is closed");
      }
      written.push(data);
    },
    close: () => {
      closeCalls += 1;
      emitClose();
    },
    onData: (handler) => {
      dataHandlers.add(handler);
      return () => {
        dataHandlers.delete(handler);
      };
    },
    onClose: (handler) => {
      if (closed) {
        handler();
        return () => {};
      }
      closeHandlers.add(handler);
      return () => {
        closeHandlers.delete(handler);
      };
    },
  };

  return {
    connection,
    written,
    get closeCalls() {
      return closeCalls;
    },
    get closed() {
      return closed;
    },
    push(chunk) {
      for (const handler of dataHandlers) {
        handler(chunk);
      }
    },
    emitClose,
    failWrites(error) {
      writeError = error;
    },
  };
}
