import { randomBytes } from "node:crypto";

export const TRANSACTION_ID_SIZE = 12;

const HEX_PATTERN = /^[0-9a-f]{24}$/;

/**
 * 96-bit transaction identifier shared by a request and its response.
 * Two ids are equal when their bytes are equal; the hex form is the registry key.
 */
export class TransactionId {
  private readonly raw: Uint8Array;
  private readonly hex: string;

  private constructor(raw: Uint8Array) {
    this.raw = raw;
    this.hex = Buffer.from(raw).toString("hex");
  }

  static fromBytes(bytes: Uint8Array): TransactionId {
    if (bytes.byteLength !== TRANSACTION_ID_SIZE) {
      throw new RangeError(
        `Transaction id must be ${TRANSACTION_ID_SIZE} bytes, got ${bytes.byteLength}`
      );
    }
    const copy = new Uint8Array(TRANSACTION_ID_SIZE);
    copy.set(bytes);
    return new TransactionId(copy);
  }

  static fromHex(hex: string): TransactionId {
    const normalized = hex.trim().toLowerCase();
    if (!HEX_PATTERN.test(normalized)) {
      throw new RangeError(`Invalid transaction id hex: ${hex}`);
    }
    return new TransactionId(new Uint8Array(Buffer.from(normalized, "hex")));
  }

  static random(): TransactionId {
    return new TransactionId(new Uint8Array(randomBytes(TRANSACTION_ID_SIZE)));
  }

  get bytes(): Uint8Array {
    return this.raw.slice();
  }

  equals(other: TransactionId): boolean {
    return this.hex === other.hex;
  }

  toHex(): string {
    return this.hex;
  }

  toString(): string {
    return this.hex;
  }
}
