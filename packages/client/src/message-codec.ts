import { MessageDecodeError } from "./errors.js";
import type { ByteSource } from "./frame-reader.js";
import { TRANSACTION_ID_SIZE, TransactionId } from "./transaction-id.js";

export const MAGIC_COOKIE = 0x2112a442;
export const HEADER_SIZE = 20;
const MAX_BODY_SIZE = 0xffff;
const MAX_MESSAGE_TYPE = 0x3fff;

export const StunMessageType = {
  BindingRequest: 0x0001,
  BindingIndication: 0x0011,
  BindingSuccess: 0x0101,
  BindingError: 0x0111,
} as const;

export type StunMessageClass = "request" | "indication" | "success" | "error";

/**
 * A decoded inbound (or encodable outbound) unit. The body is opaque: attributes
 * are left to the caller.
 */
export interface StunMessage {
  type: number;
  transactionId: TransactionId;
  payload: Uint8Array;
}

export interface MessageDecoder {
  /** Resolves with the next complete message or rejects with `MessageDecodeError`. */
  decode(source: ByteSource): Promise<StunMessage>;
}

export interface StunHeader {
  type: number;
  length: number;
  transactionId: TransactionId;
}

export function messageClassOf(type: number): StunMessageClass {
  const bits = ((type & 0x0100) >> 7) | ((type & 0x0010) >> 4);
  switch (bits) {
    case 0:
      return "request";
    case 1:
      return "indication";
    case 2:
      return "success";
    default:
      return "error";
  }
}

export function messageMethodOf(type: number): number {
  return ((type & 0x3e00) >> 2) | ((type & 0x00e0) >> 1) | (type & 0x000f);
}

export function formatMessageType(type: number): string {
  return `0x${type.toString(16).padStart(4, "0")}`;
}

export function encodeMessage(message: StunMessage): Uint8Array {
  const { type, payload } = message;
  if (!Number.isInteger(type) || type < 0 || type > MAX_MESSAGE_TYPE) {
    throw new RangeError(`Invalid message type: ${type}`);
  }
  if (payload.byteLength > MAX_BODY_SIZE || payload.byteLength % 4 !== 0) {
    throw new RangeError(
      `Message body must be a multiple of 4 bytes up to ${MAX_BODY_SIZE}, got ${payload.byteLength}`
    );
  }

  const out = new Uint8Array(HEADER_SIZE + payload.byteLength);
  const view = new DataView(out.buffer, out.byteOffset, out.byteLength);
  view.setUint16(0, type);
  view.setUint16(2, payload.byteLength);
  view.setUint32(4, MAGIC_COOKIE);
  out.set(message.transactionId.bytes, 8);
  out.set(payload, HEADER_SIZE);
  return out;
}

export function decodeHeader(header: Uint8Array): StunHeader {
  if (header.byteLength !== HEADER_SIZE) {
    throw new MessageDecodeError(
      `Header must be ${HEADER_SIZE} bytes, got ${header.byteLength}`
    );
  }
  const view = new DataView(header.buffer, header.byteOffset, header.byteLength);
  const type = view.getUint16(0);
  const length = view.getUint16(2);
  const cookie = view.getUint32(4);

  if ((type & 0xc000) !== 0) {
    throw new MessageDecodeError(`Invalid message type ${formatMessageType(type)}`);
  }
  if (cookie !== MAGIC_COOKIE) {
    throw new MessageDecodeError(`Invalid magic cookie 0x${cookie.toString(16)}`);
  }
  if (length % 4 !== 0) {
    throw new MessageDecodeError(`Body length ${length} is not a multiple of 4`);
  }

  return {
    type,
    length,
    transactionId: TransactionId.fromBytes(header.subarray(8, 8 + TRANSACTION_ID_SIZE)),
  };
}

export const stunMessageDecoder: MessageDecoder = {
  async decode(source) {
    const header = decodeHeader(await source.readExact(HEADER_SIZE));
    const payload =
      header.length > 0 ? await source.readExact(header.length) : new Uint8Array(0);
    return { type: header.type, transactionId: header.transactionId, payload };
  },
};
