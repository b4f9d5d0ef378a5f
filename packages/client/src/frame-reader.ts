import type { StunConnection } from "./connection.js";
import { ConnectionClosedError } from "./errors.js";

/** Byte-level view of a connection that the message decoder pulls from. */
export interface ByteSource {
  readExact(size: number): Promise<Uint8Array>;
  /** Drops input after a decode failure and returns the number of bytes dropped. */
  discardBuffered(): number;
  /** Marks the end of a decoded message; returns the number of trailing bytes dropped. */
  finishFrame(): number;
}

/** A byte source fed by a connection, ended once the connection goes away. */
export interface ConnectionReader extends ByteSource {
  readonly closed: boolean;
  end(error?: Error): void;
}

interface PendingRead {
  size: number;
  resolve: (bytes: Uint8Array) => void;
  reject: (error: Error) => void;
}

/**
 * Buffers connection chunks so a decoder can read exact byte counts regardless of
 * how the transport split them. Only one read may be outstanding at a time.
 */
export class FrameReader implements ConnectionReader {
  private chunks: Uint8Array[] = [];
  private buffered = 0;
  private pending: PendingRead | null = null;
  private closedError: ConnectionClosedError | null = null;
  private cleanup: Array<() => void> = [];

  constructor(connection: StunConnection) {
    this.cleanup.push(connection.onData((chunk) => this.push(chunk)));
    this.cleanup.push(connection.onClose((error) => this.end(error)));
  }

  get bufferedBytes(): number {
    return this.buffered;
  }

  get closed(): boolean {
    return this.closedError !== null;
  }

  readExact(size: number): Promise<Uint8Array> {
    if (!Number.isInteger(size) || size < 0) {
      return Promise.reject(new RangeError(`Invalid read size: ${size}`));
    }
    if (this.pending) {
      return Promise.reject(new Error("FrameReader already has a pending read"));
    }
    if (this.buffered >= size) {
      return Promise.resolve(this.take(size));
    }
    if (this.closedError) {
      return Promise.reject(this.closedError);
    }
    return new Promise((resolve, reject) => {
      this.pending = { size, resolve, reject };
    });
  }

  discardBuffered(): number {
    const dropped = this.buffered;
    this.chunks = [];
    this.buffered = 0;
    return dropped;
  }

  /** Stream framing has no boundary beyond the message itself. */
  finishFrame(): number {
    return 0;
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

  private push(chunk: Uint8Array): void {
    if (this.closedError || chunk.byteLength === 0) {
      return;
    }
    this.chunks.push(chunk);
    this.buffered += chunk.byteLength;

    const pending = this.pending;
    if (pending && this.buffered >= pending.size) {
      this.pending = null;
      pending.resolve(this.take(pending.size));
    }
  }

  private take(size: number): Uint8Array {
    const out = new Uint8Array(size);
    let offset = 0;
    while (offset < size) {
      const head = this.chunks[0];
      if (!head) {
        break;
      }
      const needed = size - offset;
      if (head.byteLength <= needed) {
        out.set(head, offset);
        offset += head.byteLength;
        this.chunks.shift();
      } else {
        out.set(head.subarray(0, needed), offset);
        this.chunks[0] = head.subarray(needed);
        offset += needed;
      }
    }
    this.buffered -= size;
    return out;
  }
}
