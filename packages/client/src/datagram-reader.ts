import type { StunConnection } from "./connection.js";
import { ConnectionClosedError, MessageDecodeError } from "./errors.js";
import { FrameReader, type ConnectionReader } from "./frame-reader.js";

interface PendingRead {
  size: number;
  resolve: (bytes: Uint8Array) => void;
  reject: (error: Error) => void;
}

/**
 * Byte source for datagram transports: every datagram is one whole frame.
 *
 * The first read of a frame takes the next queued datagram; later reads stay inside
 * it and fail with a decode error when it runs out. `finishFrame` and
 * `discardBuffered` drop whatever is left of the current datagram, so a malformed
 * datagram never bleeds into the next one.
 */
export class DatagramReader implements ConnectionReader {
  private queue: Uint8Array[] = [];
  private current: Uint8Array | null = null;
  private offset = 0;
  private pending: PendingRead | null = null;
  private closedError: ConnectionClosedError | null = null;
  private cleanup: Array<() => void> = [];

  constructor(connection: StunConnection) {
    this.cleanup.push(connection.onData((datagram) => this.push(datagram)));
    this.cleanup.push(connection.onClose((error) => this.end(error)));
  }

  get queuedDatagrams(): number {
    return this.queue.length;
  }

  get closed(): boolean {
    return this.closedError !== null;
  }

  readExact(size: number): Promise<Uint8Array> {
    if (!Number.isInteger(size) || size < 0) {
      return Promise.reject(new RangeError(`Invalid read size: ${size}`));
    }
    if (this.pending) {
      return Promise.reject(new Error("DatagramReader already has a pending read"));
    }
    if (this.current) {
      return this.readCurrent(size);
    }
    const next = this.queue.shift();
    if (next) {
      this.startFrame(next);
      return this.readCurrent(size);
    }
    if (this.closedError) {
      return Promise.reject(this.closedError);
    }
    return new Promise((resolve, reject) => {
      this.pending = { size, resolve, reject };
    });
  }

  discardBuffered(): number {
    return this.dropCurrent();
  }

  finishFrame(): number {
    return this.dropCurrent();
  }

  end(error?: Error): void {
    if (this.closedError) {
      return;
    }
    this.closedError = new ConnectionClosedError(
      error ? `Connection closed: ${error.message}` : undefined
    );
    const cleanup = this.cleanup;
    this.cleanup = [];
    for (const dispose of cleanup) {
      dispose();
    }
    const pending = this.pending;
    this.pending = null;
    pending?.reject(this.closedError);
  }

  private push(datagram: Uint8Array): void {
    if (this.closedError || datagram.byteLength === 0) {
      return;
    }
    const pending = this.pending;
    if (!pending) {
      this.queue.push(datagram);
      return;
    }
    this.pending = null;
    this.startFrame(datagram);
    this.readCurrent(pending.size).then(pending.resolve, pending.reject);
  }

  private startFrame(datagram: Uint8Array): void {
    this.current = datagram;
    this.offset = 0;
  }

  private readCurrent(size: number): Promise<Uint8Array> {
    const datagram = this.current;
    if (!datagram) {
      return Promise.reject(new Error("DatagramReader has no current datagram"));
    }
    const remaining = datagram.byteLength - this.offset;
    if (remaining < size) {
      return Promise.reject(
        new MessageDecodeError(
          `Datagram of ${datagram.byteLength} bytes ended ${size - remaining} bytes short`
        )
      );
    }
    const out = datagram.slice(this.offset, this.offset + size);
    this.offset += size;
    return Promise.resolve(out);
  }

  private dropCurrent(): number {
    const dropped = this.current ? this.current.byteLength - this.offset : 0;
    this.current = null;
    this.offset = 0;
    return dropped;
  }
}

/** Picks the reader that matches how the connection frames its input. */
export function createConnectionReader(connection: StunConnection): ConnectionReader {
  return connection.framing === "datagram"
    ? new DatagramReader(connection)
    : new FrameReader(connection);
}
